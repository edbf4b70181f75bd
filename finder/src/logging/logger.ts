/**
 * Run Logger
 *
 * Structured, file-backed log of what a run did: which releases were fetched,
 * which toolchains were installed, how every check ended. Configured once at
 * start-up from explicit options and closed when the run ends.
 *
 * Entries are written as JSON lines, one object per line:
 *   {"timestamp":"...","level":"info","scope":"engine","message":"...","context":{...}}
 */

import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry.
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Logging surface handed to the engine and its collaborators.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger writing to the same destination under another scope */
  child(scope: string): Logger;
}

/**
 * Logger that owns a destination and must be flushed before the process exits.
 */
export interface RunLogger extends Logger {
  flush(): Promise<void>;
  close(): Promise<void>;
}

export interface LoggerConfig {
  /** When false, every call is a no-op */
  enabled: boolean;
  /** Minimum level written. Default: 'info' */
  level: LogLevel;
  /** JSONL destination */
  filePath: string;
  /** Max entries buffered before an automatic write. Default: 50 */
  bufferSize?: number;
  /** Periodic write interval in ms. Default: 2000 */
  flushIntervalMs?: number;
}

// =============================================================================
// Constants
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// =============================================================================
// No-op Logger
// =============================================================================

const noop = (): void => {};

/**
 * Logger that discards everything. Default for library callers and tests.
 */
export const NOOP_LOGGER: RunLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => NOOP_LOGGER,
  flush: async () => {},
  close: async () => {},
};

// =============================================================================
// File Logger
// =============================================================================

interface Sink {
  push(entry: LogEntry): void;
  minLevel: LogLevel;
}

class ScopedLogger implements Logger {
  constructor(
    private readonly sink: Sink,
    private readonly scope: string
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  child(scope: string): Logger {
    return new ScopedLogger(this.sink, scope);
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.sink.minLevel]) {
      return;
    }
    this.sink.push({
      timestamp: new Date().toISOString(),
      level,
      scope: this.scope,
      message,
      context,
    });
  }
}

/**
 * Serializes an entry, rendering bigint values as strings.
 */
export function formatLogEntry(entry: LogEntry): string {
  return JSON.stringify(entry, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );
}

/**
 * Creates the run logger. Writes are buffered and appended to the log file;
 * a failed write is reported once on stderr and never interrupts the run.
 */
export function createLogger(config: LoggerConfig): RunLogger {
  if (!config.enabled) {
    return NOOP_LOGGER;
  }

  const { filePath, bufferSize = 50, flushIntervalMs = 2000 } = config;

  const buffer: string[] = [];
  let flushTimer: ReturnType<typeof setInterval> | null = null;
  let directoryReady = false;
  let hasReportedError = false;
  let closed = false;
  // Appends run one after another so lines keep their order
  let pending: Promise<void> = Promise.resolve();

  function writeBuffer(): Promise<void> {
    pending = pending.then(appendBuffered);
    return pending;
  }

  async function appendBuffered(): Promise<void> {
    if (buffer.length === 0) return;

    const lines = buffer.splice(0).join('\n') + '\n';

    try {
      if (!directoryReady) {
        await mkdir(dirname(filePath), { recursive: true });
        directoryReady = true;
      }
      await appendFile(filePath, lines, { encoding: 'utf8' });
    } catch (error) {
      if (!hasReportedError) {
        hasReportedError = true;
        const reason = error instanceof Error ? error.message : String(error);
        process.stderr.write(`[log] unable to write ${filePath}: ${reason}\n`);
      }
    }
  }

  function startFlushTimer(): void {
    if (flushTimer === null && flushIntervalMs > 0) {
      flushTimer = setInterval(() => {
        void writeBuffer();
      }, flushIntervalMs);
      flushTimer.unref();
    }
  }

  const sink: Sink = {
    minLevel: config.level,
    push(entry: LogEntry): void {
      if (closed) return;
      buffer.push(formatLogEntry(entry));
      startFlushTimer();
      if (buffer.length >= bufferSize) {
        void writeBuffer();
      }
    },
  };

  const root = new ScopedLogger(sink, 'main');

  return {
    debug: (message, context) => root.debug(message, context),
    info: (message, context) => root.info(message, context),
    warn: (message, context) => root.warn(message, context),
    error: (message, context) => root.error(message, context),
    child: (scope) => root.child(scope),
    flush: () => writeBuffer(),
    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      if (flushTimer !== null) {
        clearInterval(flushTimer);
        flushTimer = null;
      }
      await writeBuffer();
    },
  };
}
