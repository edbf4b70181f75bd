/**
 * Signal Handling Module
 *
 * Shutdown handling for SIGINT (Ctrl+C) and SIGTERM. An interrupted run reports
 * how far the search got and emits no final result; toolchains installed so far
 * stay installed.
 *
 * @module cli/signals
 */

// =============================================================================
// Types
// =============================================================================

export type CleanupFunction = () => void | Promise<void>;

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export interface ShutdownState {
  triggered: boolean;
  signal?: ShutdownSignal;
  timestamp?: number;
}

export interface SignalHandlerOptions {
  /** Runs once before exiting, e.g. to flush the log */
  cleanup?: CleanupFunction;
  logger?: {
    log: (message: string) => void;
    warn: (message: string) => void;
  };
  /** Process exit; replaced in tests */
  exit?: (code: number) => void;
}

/** 128 + signal number */
export const SIGNAL_EXIT_CODES: Record<ShutdownSignal, number> = {
  SIGINT: 130,
  SIGTERM: 143,
};

// =============================================================================
// State
// =============================================================================

let shutdownState: ShutdownState = {
  triggered: false,
};

let registeredOptions: SignalHandlerOptions = {};

let sigintHandler: NodeJS.SignalsListener | undefined;
let sigtermHandler: NodeJS.SignalsListener | undefined;

// =============================================================================
// Core Functions
// =============================================================================

export function isShutdownTriggered(): boolean {
  return shutdownState.triggered;
}

export function getShutdownState(): Readonly<ShutdownState> {
  return { ...shutdownState };
}

/**
 * Clears the shutdown state and removes handlers
 */
export function resetShutdownState(): void {
  shutdownState = { triggered: false };
  removeSignalHandlers();
  clearSearchProgress();
}

function removeSignalHandlers(): void {
  if (sigintHandler) {
    process.removeListener('SIGINT', sigintHandler);
    sigintHandler = undefined;
  }
  if (sigtermHandler) {
    process.removeListener('SIGTERM', sigtermHandler);
    sigtermHandler = undefined;
  }
  registeredOptions = {};
}

/**
 * Handler for one signal. Exported for tests, which call it directly.
 */
export function createSignalHandler(signal: ShutdownSignal): () => Promise<void> {
  return async () => {
    const logger = registeredOptions.logger ?? console;
    const exit = registeredOptions.exit ?? ((code: number) => process.exit(code));

    if (shutdownState.triggered) {
      logger.warn('\nForce quit requested. Exiting immediately.');
      exit(SIGNAL_EXIT_CODES.SIGINT);
      return;
    }

    shutdownState = {
      triggered: true,
      signal,
      timestamp: Date.now(),
    };

    if (signal === 'SIGINT') {
      logger.log('\n\nReceived interrupt signal. Shutting down...');
    } else {
      logger.log('\nReceived termination signal. Shutting down...');
    }

    const progress = getSearchProgress();
    if (progress) {
      for (const line of formatInterruptedMessage(progress)) {
        logger.log(line);
      }
    }

    if (registeredOptions.cleanup) {
      try {
        await registeredOptions.cleanup();
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        logger.warn(`Cleanup error: ${errorMsg}`);
      }
    }

    exit(SIGNAL_EXIT_CODES[signal]);
  };
}

/**
 * Registers handlers for SIGINT and SIGTERM that:
 * 1. Set the shutdown state
 * 2. Print how far the search got
 * 3. Call the optional cleanup function
 * 4. Exit with 130 (SIGINT) or 143 (SIGTERM)
 *
 * A second signal exits immediately without cleanup.
 */
export function setupSignalHandlers(options: SignalHandlerOptions = {}): void {
  removeSignalHandlers();
  registeredOptions = options;
  shutdownState = { triggered: false };

  const sigint = createSignalHandler('SIGINT');
  const sigterm = createSignalHandler('SIGTERM');
  sigintHandler = () => {
    void sigint();
  };
  sigtermHandler = () => {
    void sigterm();
  };

  process.on('SIGINT', sigintHandler);
  process.on('SIGTERM', sigtermHandler);
}

// =============================================================================
// Search Progress Tracking
// =============================================================================

/**
 * How far the current search got
 */
export interface SearchProgress {
  /** Upper bound announced for the run */
  totalSteps: number;
  completedChecks: { version: string; passed: boolean }[];
  /** Release being installed or checked, if any */
  currentVersion?: string;
}

let searchProgress: SearchProgress | undefined;

export function setSearchProgress(progress: SearchProgress): void {
  searchProgress = progress;
}

export function updateSearchProgress(update: Partial<SearchProgress>): void {
  if (searchProgress) {
    searchProgress = { ...searchProgress, ...update };
  }
}

export function getSearchProgress(): SearchProgress | undefined {
  return searchProgress ? { ...searchProgress } : undefined;
}

export function clearSearchProgress(): void {
  searchProgress = undefined;
}

/**
 * Lines describing an interrupted search
 */
export function formatInterruptedMessage(progress: SearchProgress): string[] {
  const done = progress.completedChecks.length;
  const lines = [`Interrupted after ${done} of at most ${progress.totalSteps} checks`];

  if (done > 0) {
    const results = progress.completedChecks
      .map((check) => `${check.version} ${check.passed ? '✓' : '✗'}`)
      .join(', ');
    lines.push(`  (${results})`);
  }

  if (progress.currentVersion !== undefined) {
    lines.push(`  ${progress.currentVersion} was not finished`);
  }

  return lines;
}
