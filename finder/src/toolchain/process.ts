/**
 * Child process runner for long-running toolchain commands.
 * @module toolchain/process
 */

import { spawn } from 'child_process';

import type { ProcessOutput } from './types.js';

export interface RunProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs an executable to completion and captures its output.
 *
 * Never rejects: spawn failures (missing executable, bad cwd) resolve with
 * `exitCode: null` and `error` set. Arguments are passed without a shell.
 */
export function runProcess(
  executable: string,
  args: readonly string[],
  options: RunProcessOptions = {}
): Promise<ProcessOutput> {
  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let settled = false;

    const finish = (output: ProcessOutput): void => {
      if (settled) return;
      settled = true;
      resolve(output);
    };

    const child = spawn(executable, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      shell: false,
    });

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.once('close', (code) => {
      finish({ exitCode: code, stdout, stderr });
    });

    child.once('error', (err) => {
      finish({ exitCode: null, stdout, stderr, error: err.message });
    });
  });
}

/**
 * The most useful text of a process output for a diagnostic message.
 */
export function diagnosticText(output: ProcessOutput): string {
  if (output.error) return output.error;
  const stderr = output.stderr.trim();
  return stderr.length > 0 ? stderr : output.stdout.trim();
}
