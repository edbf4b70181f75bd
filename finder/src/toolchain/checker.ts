/**
 * ToolchainChecker: one install-and-run cycle of the check command per release.
 * @module toolchain/checker
 */

import { rmSync } from 'fs';
import { join } from 'path';

import { Err, Ok, type Result } from '../types/result.js';
import { InfrastructureError, InfrastructureErrorCode, toError } from '../types/errors.js';
import { NOOP_LOGGER, type Logger } from '../logging/logger.js';
import type { Release } from '../releases/types.js';
import type { Reporter } from '../reporter/types.js';
import { diagnosticText } from './process.js';
import { toolchainSpec } from './target.js';
import type { CheckOutcome, Checker, ToolchainManager } from './types.js';

/** Command run when none is configured */
export const DEFAULT_CHECK_COMMAND: readonly string[] = ['cargo', 'build', '--all'];

export const LOCKFILE_NAME = 'Cargo.lock';

export interface ToolchainCheckerOptions {
  /** Target triple appended to every toolchain identifier */
  target: string;
  command: readonly string[];
  /** Directory the command runs in */
  projectPath: string;
  /** Delete the lockfile before each check */
  removeLockfile?: boolean;
  /** Uninstall each toolchain once its check has run */
  uninstallAfterCheck?: boolean;
  /** True once the run has been asked to stop; an interrupted check is never a failure */
  isInterrupted?: () => boolean;
  logger?: Logger;
}

function interruptedError(toolchain: string): InfrastructureError {
  return new InfrastructureError(
    `Check under ${toolchain} was interrupted`,
    InfrastructureErrorCode.CHECK_INTERRUPTED,
    { toolchain }
  );
}

export class ToolchainChecker implements Checker {
  private readonly logger: Logger;

  constructor(
    private readonly manager: ToolchainManager,
    private readonly reporter: Reporter,
    private readonly options: ToolchainCheckerOptions
  ) {
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  async check(release: Release): Promise<Result<CheckOutcome, InfrastructureError>> {
    const version = release.version.version;
    const toolchain = toolchainSpec(version, this.options.target);

    if (this.interrupted()) return Err(interruptedError(toolchain));

    this.reporter.progress({ kind: 'installing', version, toolchain });
    const installed = await this.manager.ensureInstalled(toolchain);
    if (this.interrupted()) return Err(interruptedError(toolchain));
    if (!installed.ok) return installed;

    if (this.options.removeLockfile) {
      const removed = this.removeLockfile();
      if (!removed.ok) return removed;
    }

    this.reporter.progress({ kind: 'checking', version, toolchain });
    const { command, projectPath } = this.options;
    const output = await this.manager.run(toolchain, command, projectPath);
    if (this.interrupted()) {
      this.logger.warn('check interrupted', { version, toolchain });
      return Err(interruptedError(toolchain));
    }
    const passed = output.exitCode === 0 && output.error === undefined;

    this.logger.info('check finished', { version, toolchain, passed, exitCode: output.exitCode });

    if (this.options.uninstallAfterCheck && this.manager.uninstall) {
      const uninstalled = await this.manager.uninstall(toolchain);
      if (!uninstalled.ok) return uninstalled;
    }

    return Ok({
      release,
      toolchain,
      passed,
      exitCode: output.exitCode,
      diagnostic: passed ? '' : diagnosticText(output),
    });
  }

  private interrupted(): boolean {
    return this.options.isInterrupted?.() ?? false;
  }

  private removeLockfile(): Result<void, InfrastructureError> {
    const path = join(this.options.projectPath, LOCKFILE_NAME);
    try {
      rmSync(path, { force: true });
      return Ok(undefined);
    } catch (error) {
      return Err(
        new InfrastructureError(
          `Unable to remove lockfile ${path}`,
          InfrastructureErrorCode.LOCKFILE_REMOVAL_FAILED,
          { path },
          { cause: toError(error) }
        )
      );
    }
  }
}
