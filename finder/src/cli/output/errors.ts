/**
 * CLI Error Types and Formatters
 *
 * User-facing errors for the command line layer, and the hints shown for
 * errors that abort a run.
 */

import type { FinderError } from '../../types/errors.js';
import { createColorizer } from './colors.js';

// =============================================================================
// CLI Error Codes
// =============================================================================

export const CLIErrorCode = {
  INVALID_PATH: 'CLI_INVALID_PATH',
  RUN_FAILED: 'CLI_RUN_FAILED',
} as const;

export type CLIErrorCode = (typeof CLIErrorCode)[keyof typeof CLIErrorCode];

// =============================================================================
// CLI Error Classes
// =============================================================================

/**
 * Base class for CLI errors
 */
export abstract class CLIError extends Error {
  abstract readonly code: CLIErrorCode;
  abstract readonly hint?: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Error when the project path is not a directory
 */
export class InvalidPathError extends CLIError {
  readonly code = CLIErrorCode.INVALID_PATH;
  readonly hint: string;
  readonly path: string;

  constructor(path: string) {
    super(`Project path is not a directory: ${path}`);
    this.path = path;
    this.hint = 'Pass the directory containing Cargo.toml with --path <dir>.';
  }
}

/**
 * An error that aborted the run, carrying the hint for its code
 */
export class RunFailedError extends CLIError {
  readonly code = CLIErrorCode.RUN_FAILED;
  readonly hint?: string;
  readonly failure: FinderError;

  constructor(failure: FinderError) {
    super(failure.message);
    this.failure = failure;
    this.hint = hintFor(failure);
  }
}

// =============================================================================
// Hints
// =============================================================================

const MAX_LISTED_VERSIONS = 10;

function listVersions(versions: readonly string[] | undefined): string {
  if (!versions || versions.length === 0) return '(none)';
  const shown = versions.slice(0, MAX_LISTED_VERSIONS).join(', ');
  const hidden = versions.length - MAX_LISTED_VERSIONS;
  return hidden > 0 ? `${shown} and ${hidden} more` : shown;
}

/**
 * Guidance for an error that aborted a run, keyed by its code.
 */
export function hintFor(error: FinderError): string | undefined {
  switch (error.code) {
    case 'VALIDATION_INVALID_VERSION':
      return 'Versions are written as major.minor or major.minor.patch, e.g. 1.56 or 1.56.1.';
    case 'VALIDATION_INVALID_INPUT':
      return undefined;
    case 'CONFIG_MANIFEST_NOT_FOUND':
      return 'Run from the project root, or pass the project directory with --path <dir>.';
    case 'CONFIG_PARSE_ERROR':
      return error.context.path ? `Fix the syntax of ${error.context.path}.` : undefined;
    case 'CONFIG_INVALID_SCHEMA':
      return error.context.issues?.map((issue) => `  ${issue}`).join('\n');
    case 'CONFIG_MISSING_MSRV':
      return (
        'Declare the version in Cargo.toml:\n' +
        '  [package]\n' +
        '  rust-version = "1.56"'
      );
    case 'RESOLUTION_NO_MATCHING_RELEASE':
      return `Available versions: ${listVersions(error.context.available)}`;
    case 'RESOLUTION_NO_CANDIDATES_IN_RANGE':
      return 'Widen the range given by --min and --max.';
    case 'INFRA_RELEASE_INDEX_UNAVAILABLE':
      return 'Check your network connection. A previously downloaded index is reused when present.';
    case 'INFRA_TOOLCHAIN_INSTALL_FAILED':
    case 'INFRA_TOOLCHAIN_UNINSTALL_FAILED':
      return error.context.output
        ? `rustup reported:\n${error.context.output}`
        : 'Make sure rustup is installed and available on your PATH.';
    case 'INFRA_CHECK_INTERRUPTED':
      return undefined;
    case 'INFRA_LOCKFILE_REMOVAL_FAILED':
    case 'INFRA_TOOLCHAIN_FILE_WRITE_FAILED':
      return error.context.path ? `Check the permissions of ${error.context.path}.` : undefined;
  }
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an error for terminal display
 */
export function formatCLIError(error: CLIError | Error, colored = false): string {
  const c = createColorizer(colored);
  const header = `${c.red(c.bold('Error:'))} ${c.red(error.message)}`;

  if (error instanceof CLIError && error.hint) {
    return [header, '', c.yellow('Hint:'), error.hint].join('\n');
  }

  return header;
}

/**
 * Machine-readable form of an error for JSON output
 */
export function toErrorPayload(error: Error): Record<string, unknown> {
  if (error instanceof RunFailedError) {
    const wire = error.failure.toWireFormat();
    delete wire.stack;
    return { ...wire, hint: error.hint };
  }
  if (error instanceof CLIError) {
    return { name: error.name, code: error.code, message: error.message, hint: error.hint };
  }
  return { name: error.name, message: error.message };
}

// =============================================================================
// Type Guards
// =============================================================================

export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}
