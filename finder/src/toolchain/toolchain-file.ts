/**
 * Writes the toolchain file pinning a project to its MSRV.
 * @module toolchain/toolchain-file
 */

import { writeFileSync } from 'fs';
import { join } from 'path';
import { stringify } from 'smol-toml';

import { Err, Ok, type Result } from '../types/result.js';
import { InfrastructureError, InfrastructureErrorCode, toError } from '../types/errors.js';

export const TOOLCHAIN_FILENAME = 'rust-toolchain.toml';

/**
 * TOML document selecting `version` as the project's toolchain channel.
 */
export function renderToolchainFile(version: string): string {
  return `${stringify({ toolchain: { channel: version } })}\n`;
}

/**
 * Writes rust-toolchain.toml into the project directory, replacing any existing file.
 *
 * @returns The path written
 */
export function writeToolchainFile(
  projectPath: string,
  version: string
): Result<string, InfrastructureError> {
  const path = join(projectPath, TOOLCHAIN_FILENAME);
  try {
    writeFileSync(path, renderToolchainFile(version), 'utf-8');
    return Ok(path);
  } catch (error) {
    return Err(
      new InfrastructureError(
        `Unable to write ${path}`,
        InfrastructureErrorCode.TOOLCHAIN_FILE_WRITE_FAILED,
        { path },
        { cause: toError(error) }
      )
    );
  }
}
