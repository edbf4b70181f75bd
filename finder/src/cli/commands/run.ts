/**
 * Run Command Module
 *
 * Implements the determine, verify and list commands: resolves options and
 * configuration, wires the release source, toolchain manager, checker and
 * reporter into the search engine and maps the outcome to an exit code.
 *
 * @module cli/commands/run
 */

import { existsSync, statSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';

import {
  InfrastructureErrorCode,
  isConfigError,
  isValidationError,
  type FinderError,
} from '../../types/errors.js';
import { assertNever } from '../../types/assert-never.js';
import {
  createLogger,
  type Logger,
  type LoggerConfig,
  type RunLogger,
} from '../../logging/logger.js';
import { loadProjectConfig, resolveRunConfig, type RunConfig } from '../../config/index.js';
import { readManifest, type ProjectManifest } from '../../manifest/manifest.js';
import { RustChangelogSource } from '../../releases/changelog-source.js';
import type { ReleaseSource } from '../../releases/types.js';
import type { ModeIntent, ProgressAction } from '../../reporter/types.js';
import { SearchEngine, type SearchRequest, type SearchResult } from '../../search/engine.js';
import { ToolchainChecker } from '../../toolchain/checker.js';
import { RustupToolchainManager } from '../../toolchain/rustup.js';
import { detectHostTarget } from '../../toolchain/target.js';
import { writeToolchainFile } from '../../toolchain/toolchain-file.js';
import type { CheckOutcome, ToolchainManager } from '../../toolchain/types.js';
import { parseRunOptions, type RawRunOptions, type RunOptions } from '../options/run-options.js';
import { supportsColor } from '../output/colors.js';
import { InvalidPathError, RunFailedError, type CLIError } from '../output/errors.js';
import type { OutputStream } from '../output/progress.js';
import {
  createOutputReporter,
  type OutputFormat,
  type OutputReporter,
} from '../output/reporters.js';
import {
  SIGNAL_EXIT_CODES,
  clearSearchProgress,
  getSearchProgress,
  getShutdownState,
  isShutdownTriggered,
  resetShutdownState,
  setSearchProgress,
  setupSignalHandlers,
  updateSearchProgress,
} from '../signals.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Dependencies for the run command
 * All external dependencies are injected for testability
 */
export interface FinderDependencies {
  env: Record<string, string | undefined>;
  stdout: OutputStream;
  stderr: OutputStream;
  /** Base for the default log and cache locations */
  homeDir: string;
  /** Install SIGINT/SIGTERM handlers for the duration of the run */
  handleSignals: boolean;
  /** Exit used by the signal handlers. Default: process.exit */
  exit?: (code: number) => void;
  /** Override for the release source (for testing) */
  createReleaseSource?: (config: RunConfig, logger: Logger) => ReleaseSource;
  /** Override for the toolchain manager (for testing) */
  createToolchainManager?: (logger: Logger) => ToolchainManager;
  /** Override for host target detection (for testing) */
  detectTarget?: () => string;
  /** Override for the run logger (for testing) */
  createLogger?: (config: LoggerConfig) => RunLogger;
}

export interface FinderRunResult {
  /** Exit code (see ExitCode) */
  exitCode: number;
  result?: SearchResult;
  /** Message of the error that aborted the run */
  error?: string;
}

// =============================================================================
// Default Dependencies
// =============================================================================

export function createDefaultDependencies(): FinderDependencies {
  return {
    env: process.env,
    stdout: process.stdout,
    stderr: process.stderr,
    homeDir: homedir(),
    handleSignals: true,
  };
}

// =============================================================================
// Exit Codes
// =============================================================================

export const ExitCode = {
  /** MSRV found, verification passed or releases listed */
  SUCCESS: 0,
  /** Verification failed, or no candidate release passed */
  FAILURE: 1,
  /** Invalid arguments, configuration or manifest */
  INVALID_ARGS: 2,
  /** Resolution or infrastructure failure */
  RUN_ERROR: 3,
} as const;

export function exitCodeForError(error: FinderError): number {
  return isValidationError(error) || isConfigError(error)
    ? ExitCode.INVALID_ARGS
    : ExitCode.RUN_ERROR;
}

export function exitCodeForResult(result: SearchResult): number {
  switch (result.kind) {
    case 'minimal-version-found':
    case 'verification-passed':
    case 'listed':
      return ExitCode.SUCCESS;
    case 'verification-failed':
    case 'no-candidate-satisfies':
      return ExitCode.FAILURE;
    default:
      return assertNever(result);
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function defaultLogPath(homeDir: string): string {
  return join(homeDir, '.msrv-finder', 'logs', 'msrv-finder.log');
}

export function defaultCachePath(homeDir: string): string {
  return join(homeDir, '.msrv-finder', 'cache');
}

export function toSearchRequest(config: RunConfig): SearchRequest {
  return {
    intent: config.intent,
    bounds: config.bounds,
    includeAllPatchReleases: config.includeAllPatchReleases,
    strategy: config.strategy,
    declaredVersion: config.declaredVersion,
    command: config.command,
  };
}

const MAX_DIAGNOSTIC_LINES = 20;

/**
 * Summary of the last failed check, shown after a failed run
 */
export function formatFailureNote(checks: readonly CheckOutcome[]): string | undefined {
  const failed = checks.filter((check) => !check.passed);
  const last = failed[failed.length - 1];
  if (!last) return undefined;

  const lines = last.diagnostic.split('\n');
  const shown = lines.slice(-MAX_DIAGNOSTIC_LINES).join('\n');
  const exitCode = last.exitCode ?? 'none';
  const header = `Last failed check: ${last.release.version.version} (exit code ${exitCode})`;
  return shown.trim() ? `${header}\n${shown}` : header;
}

/**
 * Forwards reporter events and records search progress for the interrupt message
 */
class ProgressTrackingReporter implements OutputReporter {
  constructor(private readonly inner: OutputReporter) {}

  modeAnnounced(intent: ModeIntent): void {
    this.inner.modeAnnounced(intent);
  }

  stepsSet(total: number): void {
    setSearchProgress({ totalSteps: total, completedChecks: [] });
    this.inner.stepsSet(total);
  }

  progress(action: ProgressAction): void {
    if (action.kind !== 'fetching-index') {
      updateSearchProgress({ currentVersion: action.version });
    }
    this.inner.progress(action);
  }

  stepCompleted(version: string, passed: boolean): void {
    const current = getSearchProgress();
    if (current) {
      updateSearchProgress({
        completedChecks: [...current.completedChecks, { version, passed }],
        currentVersion: undefined,
      });
    }
    this.inner.stepCompleted(version, passed);
  }

  releasesListed(versions: readonly string[]): void {
    this.inner.releasesListed(versions);
  }

  finishedSuccess(intent: ModeIntent, version: string): void {
    this.inner.finishedSuccess(intent, version);
  }

  finishedFailure(intent: ModeIntent, command: string): void {
    this.inner.finishedFailure(intent, command);
  }

  errorOccurred(error: Error): void {
    this.inner.errorOccurred(error);
  }

  note(text: string): void {
    this.inner.note(text);
  }

  close(): void {
    this.inner.close();
  }
}

interface PreparedRun {
  options: RunOptions;
  config: RunConfig;
  logger: RunLogger;
  colored: boolean;
}

type Preparation =
  | { ok: true; run: PreparedRun }
  | { ok: false; exitCode: number; error: CLIError; format: OutputFormat; colored: boolean };

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

async function prepare(
  intent: ModeIntent,
  raw: RawRunOptions,
  command: readonly string[],
  deps: FinderDependencies,
  logger: (options: RunOptions) => RunLogger
): Promise<Preparation> {
  const defaultColored =
    raw.color !== false && supportsColor(deps.env, deps.stderr.isTTY ?? false);

  const parsed = parseRunOptions(raw, command);
  if (!parsed.ok) {
    return {
      ok: false,
      exitCode: ExitCode.INVALID_ARGS,
      error: new RunFailedError(parsed.error),
      format: 'human',
      colored: defaultColored,
    };
  }

  const options = parsed.value;
  const format = options.outputFormat;
  const colored = !options.noColor && defaultColored;
  const fail = (error: CLIError, exitCode: number): Preparation => ({
    ok: false,
    exitCode,
    error,
    format,
    colored,
  });

  const projectPath = resolve(options.path);
  if (!isDirectory(projectPath)) {
    return fail(new InvalidPathError(projectPath), ExitCode.INVALID_ARGS);
  }

  const runLogger = logger(options);

  const project = await loadProjectConfig(projectPath);
  if (!project.ok) {
    await runLogger.close();
    return fail(new RunFailedError(project.error), exitCodeForError(project.error));
  }

  let manifest: ProjectManifest | undefined;
  const manifestResult = await readManifest(projectPath, runLogger.child('manifest'));
  if (manifestResult.ok) {
    manifest = manifestResult.value;
  } else if (manifestResult.error.code === 'CONFIG_MANIFEST_NOT_FOUND' && intent !== 'verify') {
    runLogger.warn('no manifest found', { projectPath });
  } else {
    await runLogger.close();
    return fail(new RunFailedError(manifestResult.error), exitCodeForError(manifestResult.error));
  }

  const config = resolveRunConfig({
    intent,
    cli: { ...options, path: projectPath },
    project: project.value,
    manifest,
    detectTarget: deps.detectTarget ?? detectHostTarget,
  });
  if (!config.ok) {
    await runLogger.close();
    return fail(new RunFailedError(config.error), exitCodeForError(config.error));
  }

  return { ok: true, run: { options, config: config.value, logger: runLogger, colored } };
}

// =============================================================================
// Command
// =============================================================================

/**
 * Runs one finder command.
 *
 * @param intent - determine, verify or list
 * @param raw - Raw options from Commander
 * @param command - Check command tokens given after `--`
 */
export async function runFinder(
  intent: ModeIntent,
  raw: RawRunOptions,
  command: readonly string[] = [],
  deps: FinderDependencies = createDefaultDependencies()
): Promise<FinderRunResult> {
  const makeLogger = (options: RunOptions): RunLogger =>
    (deps.createLogger ?? createLogger)({
      enabled: options.log,
      level: options.logLevel,
      filePath: options.logFile ?? defaultLogPath(deps.homeDir),
    });

  const prepared = await prepare(intent, raw, command, deps, makeLogger);
  if (!prepared.ok) {
    const reporter = createOutputReporter(prepared.format, {
      stdout: deps.stdout,
      stderr: deps.stderr,
      colored: prepared.colored,
      target: '',
    });
    reporter.errorOccurred(prepared.error);
    return { exitCode: prepared.exitCode, error: prepared.error.message };
  }

  const { options, config, logger, colored } = prepared.run;
  const reporter = new ProgressTrackingReporter(
    createOutputReporter(options.outputFormat, {
      stdout: deps.stdout,
      stderr: deps.stderr,
      colored,
      target: config.target,
    })
  );

  if (deps.handleSignals) {
    setupSignalHandlers({
      cleanup: async () => {
        reporter.close();
        await logger.close();
      },
      logger: {
        log: (message) => deps.stderr.write(`${message}\n`),
        warn: (message) => deps.stderr.write(`${message}\n`),
      },
      exit: deps.exit,
    });
  }

  try {
    const manager =
      deps.createToolchainManager?.(logger) ??
      new RustupToolchainManager({ logger: logger.child('rustup') });
    const releaseSource =
      deps.createReleaseSource?.(config, logger) ??
      new RustChangelogSource({
        cacheDir: defaultCachePath(deps.homeDir),
        ttlHours: config.releaseIndexTtlHours,
        logger: logger.child('releases'),
      });
    const checker = new ToolchainChecker(manager, reporter, {
      target: config.target,
      command: config.command,
      projectPath: config.projectPath,
      removeLockfile: config.removeLockfile,
      uninstallAfterCheck: config.uninstallAfterCheck,
      isInterrupted: isShutdownTriggered,
      logger: logger.child('checker'),
    });
    const engine = new SearchEngine({
      releaseSource,
      checker,
      reporter,
      logger: logger.child('engine'),
    });

    const outcome = await engine.run(toSearchRequest(config));
    if (!outcome.ok && outcome.error.code === InfrastructureErrorCode.CHECK_INTERRUPTED) {
      // The signal handler reports the interrupt
      const signal = getShutdownState().signal ?? 'SIGINT';
      return { exitCode: SIGNAL_EXIT_CODES[signal], error: outcome.error.message };
    }
    if (!outcome.ok) {
      reporter.errorOccurred(new RunFailedError(outcome.error));
      return { exitCode: exitCodeForError(outcome.error), error: outcome.error.message };
    }

    const result = outcome.value;

    if (result.kind === 'verification-failed' || result.kind === 'no-candidate-satisfies') {
      const note = formatFailureNote(result.checks);
      if (note) reporter.note(note);
    }

    if (result.kind === 'minimal-version-found' && config.outputToolchainFile) {
      const written = writeToolchainFile(config.projectPath, result.release.version.version);
      if (!written.ok) {
        reporter.errorOccurred(new RunFailedError(written.error));
        return { exitCode: ExitCode.RUN_ERROR, result, error: written.error.message };
      }
      logger.info('toolchain file written', { path: written.value });
      reporter.note(`Wrote ${written.value}`);
    }

    return { exitCode: exitCodeForResult(result), result };
  } finally {
    reporter.close();
    clearSearchProgress();
    if (deps.handleSignals) {
      resetShutdownState();
    }
    await logger.close();
  }
}
