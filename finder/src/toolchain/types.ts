/**
 * Toolchain management and check types.
 * @module toolchain/types
 */

import type { Result } from '../types/result.js';
import type { InfrastructureError } from '../types/errors.js';
import type { Release } from '../releases/types.js';

/**
 * Captured output of a finished child process.
 * `exitCode` is null when the process was killed by a signal or never started.
 */
export interface ProcessOutput {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Spawn failure, e.g. the executable does not exist */
  error?: string;
}

/**
 * Installs toolchains and runs commands under them.
 */
export interface ToolchainManager {
  readonly name: string;
  /** Installs the toolchain unless it is already present */
  ensureInstalled(toolchain: string): Promise<Result<void, InfrastructureError>>;
  /** Runs `command` with the toolchain active, inside `cwd` */
  run(toolchain: string, command: readonly string[], cwd: string): Promise<ProcessOutput>;
  uninstall?(toolchain: string): Promise<Result<void, InfrastructureError>>;
}

/**
 * Result of running the check command under one release.
 */
export interface CheckOutcome {
  readonly release: Release;
  /** Toolchain identifier the command ran under, e.g. "1.56.1-x86_64-unknown-linux-gnu" */
  readonly toolchain: string;
  readonly passed: boolean;
  readonly exitCode: number | null;
  /** Captured stderr, or stdout when stderr was empty. Empty on success. */
  readonly diagnostic: string;
}

/**
 * Decides whether a project builds under a release.
 * A failing command is a normal outcome; only an inability to perform the check
 * (e.g. the toolchain cannot be installed) is an error.
 */
export interface Checker {
  check(release: Release): Promise<Result<CheckOutcome, InfrastructureError>>;
}
