/**
 * ANSI Color Utilities
 *
 * Honors NO_COLOR (disable), FORCE_COLOR (enable without a TTY) and otherwise
 * follows TTY detection of the stream being written to.
 *
 * Reference: https://no-color.org/
 */

/**
 * ANSI escape codes used by the human reporter
 */
export const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

export type AnsiCode = keyof typeof ANSI;

/**
 * Check if a terminal supports colors.
 *
 * Priority:
 * 1. NO_COLOR set (any value) -> false
 * 2. FORCE_COLOR set (any value) -> true
 * 3. Otherwise -> whether the stream is a TTY
 */
export function supportsColor(
  env: Record<string, string | undefined> = process.env,
  isTTY: boolean = process.stderr?.isTTY ?? false
): boolean {
  if (env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return isTTY;
}

/**
 * Wrap text in the named ANSI code when colors are enabled.
 */
export function colorize(text: string, code: AnsiCode, colored: boolean): string {
  if (!colored) {
    return text;
  }
  return `${ANSI[code]}${text}${ANSI.reset}`;
}

export type Colorizer = Record<Exclude<AnsiCode, 'reset'>, (text: string) => string>;

/**
 * Color functions bound to one color state.
 */
export function createColorizer(colored: boolean): Colorizer {
  return {
    bold: (text) => colorize(text, 'bold', colored),
    dim: (text) => colorize(text, 'dim', colored),
    red: (text) => colorize(text, 'red', colored),
    green: (text) => colorize(text, 'green', colored),
    yellow: (text) => colorize(text, 'yellow', colored),
    blue: (text) => colorize(text, 'blue', colored),
    cyan: (text) => colorize(text, 'cyan', colored),
    gray: (text) => colorize(text, 'gray', colored),
  };
}
