/**
 * Host target triple detection.
 * @module toolchain/target
 */

import { execFileSync } from 'child_process';
import os from 'os';

const HOST_LINE = /^host:\s*(\S+)\s*$/m;

const FALLBACK_TRIPLES: Record<string, Record<string, string>> = {
  linux: {
    x64: 'x86_64-unknown-linux-gnu',
    arm64: 'aarch64-unknown-linux-gnu',
  },
  darwin: {
    x64: 'x86_64-apple-darwin',
    arm64: 'aarch64-apple-darwin',
  },
  win32: {
    x64: 'x86_64-pc-windows-msvc',
    arm64: 'aarch64-pc-windows-msvc',
  },
};

/**
 * Extracts the host triple from verbose compiler version output.
 *
 * @example
 * ```ts
 * parseHostTriple('rustc 1.70.0\nhost: x86_64-unknown-linux-gnu\n'); // 'x86_64-unknown-linux-gnu'
 * ```
 */
export function parseHostTriple(versionOutput: string): string | null {
  const match = HOST_LINE.exec(versionOutput);
  return match?.[1] ?? null;
}

/**
 * Triple derived from the Node.js platform and architecture, for machines where
 * the compiler cannot be asked. Unknown combinations map to the Linux x86_64 triple.
 */
export function fallbackTriple(
  platform: string = os.platform(),
  arch: string = os.arch()
): string {
  return FALLBACK_TRIPLES[platform]?.[arch] ?? 'x86_64-unknown-linux-gnu';
}

/**
 * Detects the triple of the toolchain the machine builds for by default.
 */
export function detectHostTarget(): string {
  try {
    const output = execFileSync('rustc', ['-vV'], {
      encoding: 'utf-8',
      timeout: 5000,
      stdio: ['ignore', 'pipe', 'ignore'],
      shell: false,
    });
    return parseHostTriple(output) ?? fallbackTriple();
  } catch {
    return fallbackTriple();
  }
}

/**
 * Toolchain identifier for a release version on a target.
 */
export function toolchainSpec(version: string, target: string): string {
  return `${version}-${target}`;
}
