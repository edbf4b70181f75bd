/**
 * Run Options Module
 *
 * Types and parsing for the options shared by every finder command.
 * Flags the user did not pass stay undefined so the project config file can
 * supply them.
 */

import { type Result, Ok, Err } from '../../types/result.js';
import { ValidationError, ValidationErrorCode } from '../../types/errors.js';
import { isLogLevel, LOG_LEVELS, type LogLevel } from '../../logging/logger.js';
import { parseVersionOrEdition } from '../../manifest/edition.js';
import { parseBareVersion } from '../../version/bare-version.js';
import { OUTPUT_FORMATS, type OutputFormat } from '../output/reporters.js';

// =============================================================================
// Type Definitions
// =============================================================================

/**
 * Validated command-line options
 */
export interface RunOptions {
  /** Project directory (default: ".") */
  path: string;
  target?: string;
  /** Inclusive lower bound, bare version or edition year */
  min?: string;
  /** Inclusive upper bound, bare version */
  max?: string;
  includeAllPatchReleases?: boolean;
  linear?: boolean;
  ignoreLockfile?: boolean;
  outputToolchainFile: boolean;
  /** Derive the lower bound from the manifest edition */
  readMinEdition: boolean;
  outputFormat: OutputFormat;
  log: boolean;
  logLevel: LogLevel;
  logFile?: string;
  noColor: boolean;
  /** Check command tokens given after `--` */
  command?: string[];
}

/**
 * Raw options from Commander before validation
 */
export interface RawRunOptions {
  path?: string;
  target?: string;
  min?: string;
  max?: string;
  includeAllPatchReleases?: boolean;
  linear?: boolean;
  ignoreLockfile?: boolean;
  outputToolchainFile?: boolean;
  readMinEdition?: boolean; // --no-read-min-edition sets readMinEdition=false
  outputFormat?: string;
  log?: boolean; // --no-log sets log=false
  logLevel?: string;
  logFile?: string;
  color?: boolean; // --no-color sets color=false
}

// =============================================================================
// Parsing
// =============================================================================

function invalid(field: string, value: unknown, message: string): ValidationError {
  return new ValidationError(message, ValidationErrorCode.INVALID_INPUT, { field, value });
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Parse and validate raw CLI options.
 *
 * @param raw - Raw options from Commander
 * @param command - Operands given after `--`
 */
export function parseRunOptions(
  raw: RawRunOptions,
  command: readonly string[] = []
): Result<RunOptions, ValidationError> {
  let outputFormat: OutputFormat = 'human';
  if (raw.outputFormat !== undefined) {
    if (!isOutputFormat(raw.outputFormat)) {
      return Err(
        invalid(
          'output-format',
          raw.outputFormat,
          `Invalid output format: ${raw.outputFormat}. Valid formats: ${OUTPUT_FORMATS.join(', ')}`
        )
      );
    }
    outputFormat = raw.outputFormat;
  }

  let logLevel: LogLevel = 'info';
  if (raw.logLevel !== undefined) {
    if (!isLogLevel(raw.logLevel)) {
      return Err(
        invalid(
          'log-level',
          raw.logLevel,
          `Invalid log level: ${raw.logLevel}. Valid levels: ${LOG_LEVELS.join(', ')}`
        )
      );
    }
    logLevel = raw.logLevel;
  }

  if (raw.min !== undefined) {
    const min = parseVersionOrEdition(raw.min);
    if (!min.ok) return min;
  }

  if (raw.max !== undefined) {
    const max = parseBareVersion(raw.max);
    if (!max.ok) return max;
  }

  if (raw.target !== undefined && raw.target.trim() === '') {
    return Err(invalid('target', raw.target, 'The target triple must not be empty'));
  }

  return Ok({
    path: raw.path ?? '.',
    target: raw.target,
    min: raw.min,
    max: raw.max,
    includeAllPatchReleases: raw.includeAllPatchReleases,
    linear: raw.linear,
    ignoreLockfile: raw.ignoreLockfile,
    outputToolchainFile: raw.outputToolchainFile ?? false,
    readMinEdition: raw.readMinEdition ?? true,
    outputFormat,
    log: raw.log ?? true,
    logLevel,
    logFile: raw.logFile,
    noColor: raw.color === false,
    command: command.length > 0 ? [...command] : undefined,
  });
}
