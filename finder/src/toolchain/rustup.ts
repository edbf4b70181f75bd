/**
 * Toolchain manager backed by the rustup installer.
 * @module toolchain/rustup
 */

import { Err, Ok, type Result } from '../types/result.js';
import { InfrastructureError, InfrastructureErrorCode } from '../types/errors.js';
import { NOOP_LOGGER, type Logger } from '../logging/logger.js';
import { diagnosticText, runProcess } from './process.js';
import type { ProcessOutput, ToolchainManager } from './types.js';

/**
 * Runs an executable with arguments; swapped out in tests.
 */
export type ProcessRunner = (
  executable: string,
  args: readonly string[],
  options?: { cwd?: string }
) => Promise<ProcessOutput>;

export interface RustupOptions {
  /** Installer executable. Default: 'rustup' */
  executable?: string;
  runner?: ProcessRunner;
  logger?: Logger;
}

export class RustupToolchainManager implements ToolchainManager {
  readonly name = 'rustup';

  private readonly executable: string;
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;

  constructor(options: RustupOptions = {}) {
    this.executable = options.executable ?? 'rustup';
    this.runner = options.runner ?? runProcess;
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  async ensureInstalled(toolchain: string): Promise<Result<void, InfrastructureError>> {
    const args = ['install', '--profile', 'minimal', toolchain];
    this.logger.debug('installing toolchain', { toolchain, args });

    const output = await this.runner(this.executable, args);
    if (output.exitCode !== 0) {
      const detail = diagnosticText(output);
      this.logger.error('toolchain installation failed', {
        toolchain,
        exitCode: output.exitCode,
        output: detail,
      });
      return Err(
        new InfrastructureError(
          `Unable to install toolchain ${toolchain}`,
          InfrastructureErrorCode.TOOLCHAIN_INSTALL_FAILED,
          { toolchain, exitCode: output.exitCode, output: detail }
        )
      );
    }

    return Ok(undefined);
  }

  run(toolchain: string, command: readonly string[], cwd: string): Promise<ProcessOutput> {
    this.logger.debug('running check command', { toolchain, command, cwd });
    return this.runner(this.executable, ['run', toolchain, ...command], { cwd });
  }

  async uninstall(toolchain: string): Promise<Result<void, InfrastructureError>> {
    const output = await this.runner(this.executable, ['toolchain', 'uninstall', toolchain]);
    if (output.exitCode !== 0) {
      const detail = diagnosticText(output);
      return Err(
        new InfrastructureError(
          `Unable to uninstall toolchain ${toolchain}`,
          InfrastructureErrorCode.TOOLCHAIN_UNINSTALL_FAILED,
          { toolchain, exitCode: output.exitCode, output: detail }
        )
      );
    }
    return Ok(undefined);
  }
}
