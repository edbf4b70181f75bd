/**
 * Custom Error Types with Canonical Wire Format
 *
 * This module provides:
 * - ErrorWireFormat: JSON shape used when errors are written as machine-readable output
 * - BaseError: Abstract base class for all custom errors
 * - ValidationError, ConfigError, ResolutionError, InfrastructureError: run-fatal error classes
 * - Type guards for runtime error type checking
 *
 * A failing check command is never one of these: it is search data and travels
 * as a CheckOutcome. These classes describe conditions that abort the run.
 */

// =============================================================================
// Error Wire Format
// =============================================================================

/**
 * Wire format type for error serialization
 */
export interface ErrorWireFormat {
  name: string;
  code: string;
  message: string;
  cause?: ErrorWireFormat;
  context: Record<string, unknown>;
  stack?: string;
}

/** Maximum depth for cause chain serialization */
const MAX_CAUSE_DEPTH = 10;

// =============================================================================
// Error Code Enums
// =============================================================================

/** Input validation error codes */
export const ValidationErrorCode = {
  INVALID_VERSION: 'VALIDATION_INVALID_VERSION',
  INVALID_INPUT: 'VALIDATION_INVALID_INPUT',
} as const;

export type ValidationErrorCode = (typeof ValidationErrorCode)[keyof typeof ValidationErrorCode];

/** Configuration and manifest error codes */
export const ConfigErrorCode = {
  PARSE_ERROR: 'CONFIG_PARSE_ERROR',
  INVALID_SCHEMA: 'CONFIG_INVALID_SCHEMA',
  MANIFEST_NOT_FOUND: 'CONFIG_MANIFEST_NOT_FOUND',
  MISSING_MSRV: 'CONFIG_MISSING_MSRV',
} as const;

export type ConfigErrorCode = (typeof ConfigErrorCode)[keyof typeof ConfigErrorCode];

/** Release resolution error codes */
export const ResolutionErrorCode = {
  NO_MATCHING_RELEASE: 'RESOLUTION_NO_MATCHING_RELEASE',
  NO_CANDIDATES_IN_RANGE: 'RESOLUTION_NO_CANDIDATES_IN_RANGE',
} as const;

export type ResolutionErrorCode = (typeof ResolutionErrorCode)[keyof typeof ResolutionErrorCode];

/** Infrastructure error codes */
export const InfrastructureErrorCode = {
  RELEASE_INDEX_UNAVAILABLE: 'INFRA_RELEASE_INDEX_UNAVAILABLE',
  TOOLCHAIN_INSTALL_FAILED: 'INFRA_TOOLCHAIN_INSTALL_FAILED',
  TOOLCHAIN_UNINSTALL_FAILED: 'INFRA_TOOLCHAIN_UNINSTALL_FAILED',
  LOCKFILE_REMOVAL_FAILED: 'INFRA_LOCKFILE_REMOVAL_FAILED',
  TOOLCHAIN_FILE_WRITE_FAILED: 'INFRA_TOOLCHAIN_FILE_WRITE_FAILED',
  CHECK_INTERRUPTED: 'INFRA_CHECK_INTERRUPTED',
} as const;

export type InfrastructureErrorCode =
  (typeof InfrastructureErrorCode)[keyof typeof InfrastructureErrorCode];

// =============================================================================
// Error Context Types
// =============================================================================

/** Context for validation errors */
export interface ValidationErrorContext extends Record<string, unknown> {
  field: string;
  value?: unknown;
  token?: string;
}

/** Context for configuration errors */
export interface ConfigErrorContext extends Record<string, unknown> {
  path?: string;
  field?: string;
  issues?: string[];
}

/** Context for resolution errors */
export interface ResolutionErrorContext extends Record<string, unknown> {
  /** Requirement that could not be satisfied, e.g. "~1.54" */
  requirement?: string;
  /** Every version that was available to match against */
  available?: string[];
  min?: string;
  max?: string;
}

/** Context for infrastructure errors */
export interface InfrastructureErrorContext extends Record<string, unknown> {
  toolchain?: string;
  url?: string;
  path?: string;
  exitCode?: number | null;
  output?: string;
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Abstract base class for all custom errors
 *
 * Provides:
 * - Consistent error structure with code and context
 * - Serialization to the canonical wire format
 * - Proper cause chain handling
 */
export abstract class BaseError extends Error {
  abstract readonly code: string;
  abstract readonly context: Record<string, unknown>;

  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to canonical wire format
   *
   * @param depth - Current recursion depth (internal use)
   */
  toWireFormat(depth = 0): ErrorWireFormat {
    const wire: ErrorWireFormat = {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };

    if (this.stack) {
      wire.stack = this.stack;
    }

    if (this.cause && depth < MAX_CAUSE_DEPTH) {
      if (this.cause instanceof BaseError) {
        wire.cause = this.cause.toWireFormat(depth + 1);
      } else if (this.cause instanceof Error) {
        wire.cause = {
          name: this.cause.name,
          code: 'UNKNOWN_ERROR',
          message: this.cause.message,
          context: {},
          stack: this.cause.stack,
        };
      }
    }

    return wire;
  }
}

// =============================================================================
// Validation Error
// =============================================================================

/**
 * Error for malformed user or manifest input
 *
 * Use for:
 * - Bare versions that do not follow the major.minor[.patch] contract
 * - CLI values that cannot be interpreted
 */
export class ValidationError extends BaseError {
  readonly code: ValidationErrorCode;
  readonly context: ValidationErrorContext;

  constructor(
    message: string,
    code: ValidationErrorCode,
    context: ValidationErrorContext,
    options?: { cause?: Error }
  ) {
    super(message, options);
    this.code = code;
    this.context = context;
  }
}

// =============================================================================
// Config Error
// =============================================================================

/**
 * Error for configuration file and manifest failures
 */
export class ConfigError extends BaseError {
  readonly code: ConfigErrorCode;
  readonly context: ConfigErrorContext;

  constructor(
    message: string,
    code: ConfigErrorCode,
    context: ConfigErrorContext = {},
    options?: { cause?: Error }
  ) {
    super(message, options);
    this.code = code;
    this.context = context;
  }
}

// =============================================================================
// Resolution Error
// =============================================================================

/**
 * Error raised when the release catalog cannot supply what the run needs
 *
 * Use for:
 * - A declared MSRV that matches no released version
 * - Bounds that leave no candidate releases
 */
export class ResolutionError extends BaseError {
  readonly code: ResolutionErrorCode;
  readonly context: ResolutionErrorContext;

  constructor(
    message: string,
    code: ResolutionErrorCode,
    context: ResolutionErrorContext = {},
    options?: { cause?: Error }
  ) {
    super(message, options);
    this.code = code;
    this.context = context;
  }
}

// =============================================================================
// Infrastructure Error
// =============================================================================

/**
 * Error for failures of the machinery around a check, never of the check itself
 *
 * Use for:
 * - Release index download and cache failures
 * - Toolchain installation failures
 * - File system side effects requested by the user (lockfile, toolchain file)
 */
export class InfrastructureError extends BaseError {
  readonly code: InfrastructureErrorCode;
  readonly context: InfrastructureErrorContext;

  constructor(
    message: string,
    code: InfrastructureErrorCode,
    context: InfrastructureErrorContext = {},
    options?: { cause?: Error }
  ) {
    super(message, options);
    this.code = code;
    this.context = context;
  }
}

/**
 * Any error that aborts a run
 */
export type FinderError = ValidationError | ConfigError | ResolutionError | InfrastructureError;

// =============================================================================
// Type Guards
// =============================================================================

function hasCodePrefix(error: unknown, prefix: string): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith(prefix)
  );
}

/**
 * Type guard for ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError && hasCodePrefix(error, 'VALIDATION_');
}

/**
 * Type guard for ConfigError
 */
export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError && hasCodePrefix(error, 'CONFIG_');
}

/**
 * Type guard for ResolutionError
 */
export function isResolutionError(error: unknown): error is ResolutionError {
  return error instanceof ResolutionError && hasCodePrefix(error, 'RESOLUTION_');
}

/**
 * Type guard for InfrastructureError
 */
export function isInfrastructureError(error: unknown): error is InfrastructureError {
  return error instanceof InfrastructureError && hasCodePrefix(error, 'INFRA_');
}

/**
 * Type guard for any error that aborts a run
 */
export function isFinderError(error: unknown): error is FinderError {
  return (
    isValidationError(error) ||
    isConfigError(error) ||
    isResolutionError(error) ||
    isInfrastructureError(error)
  );
}

/**
 * Normalize a thrown value into an Error suitable for a `cause` option
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
