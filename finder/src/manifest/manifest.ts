/**
 * Package manifest reading.
 *
 * Extracts the declared minimum supported version and the edition from
 * Cargo.toml. The declared version is read from `package.rust-version`, falling
 * back to `package.metadata.msrv`.
 * @module manifest/manifest
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { parse as parseToml } from 'smol-toml';

import { Err, Ok, fromPromise, type Result } from '../types/result.js';
import { ConfigError, ConfigErrorCode, toError, type FinderError } from '../types/errors.js';
import { NOOP_LOGGER, type Logger } from '../logging/logger.js';
import { ManifestSchema, formatIssues, type ManifestDocument } from '../config/schemas.js';
import { parseBareVersion, type BareVersion } from '../version/bare-version.js';

export const MANIFEST_FILENAME = 'Cargo.toml';

export type DeclaredVersionKey = 'package.rust-version' | 'package.metadata.msrv';

export interface ProjectManifest {
  readonly path: string;
  readonly name?: string;
  readonly edition?: string;
  readonly declaredVersion?: BareVersion;
  /** Key the declared version was read from */
  readonly declaredVersionKey?: DeclaredVersionKey;
}

type Inheritable = string | { workspace: true } | undefined;

function resolveInherited(value: Inheritable, inherited: string | undefined): string | undefined {
  if (value === undefined || typeof value === 'string') return value;
  return inherited;
}

function declaredVersionOf(
  document: ManifestDocument
): { raw: string; key: DeclaredVersionKey } | undefined {
  const pkg = document.package;
  const rustVersion = resolveInherited(
    pkg?.['rust-version'],
    document.workspace?.package?.['rust-version']
  );
  if (rustVersion !== undefined) {
    return { raw: rustVersion, key: 'package.rust-version' };
  }

  const metadataMsrv = pkg?.metadata?.msrv;
  if (metadataMsrv !== undefined) {
    return { raw: metadataMsrv, key: 'package.metadata.msrv' };
  }

  return undefined;
}

/**
 * Parses manifest text.
 */
export function parseManifest(
  content: string,
  path: string
): Result<ProjectManifest, FinderError> {
  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (error) {
    const cause = toError(error);
    return Err(
      new ConfigError(
        `Unable to parse ${path}: ${cause.message}`,
        ConfigErrorCode.PARSE_ERROR,
        { path },
        { cause }
      )
    );
  }

  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    return Err(
      new ConfigError(`Unexpected manifest contents in ${path}`, ConfigErrorCode.INVALID_SCHEMA, {
        path,
        issues: formatIssues(parsed.error),
      })
    );
  }

  const document = parsed.data;
  const edition = resolveInherited(
    document.package?.edition,
    document.workspace?.package?.edition
  );

  const declared = declaredVersionOf(document);
  if (!declared) {
    return Ok({ path, name: document.package?.name, edition });
  }

  const version = parseBareVersion(declared.raw);
  if (!version.ok) return version;

  return Ok({
    path,
    name: document.package?.name,
    edition,
    declaredVersion: version.value,
    declaredVersionKey: declared.key,
  });
}

/**
 * Reads the manifest in a project directory.
 */
export async function readManifest(
  projectPath: string,
  logger: Logger = NOOP_LOGGER
): Promise<Result<ProjectManifest, FinderError>> {
  const path = join(projectPath, MANIFEST_FILENAME);

  if (!existsSync(path)) {
    return Err(
      new ConfigError(
        `No ${MANIFEST_FILENAME} found in ${projectPath}`,
        ConfigErrorCode.MANIFEST_NOT_FOUND,
        { path }
      )
    );
  }

  const content = await fromPromise(
    readFile(path, 'utf-8'),
    (error) =>
      new ConfigError(`Unable to read ${path}`, ConfigErrorCode.PARSE_ERROR, { path }, {
        cause: toError(error),
      })
  );
  if (!content.ok) return content;

  const manifest = parseManifest(content.value, path);
  if (manifest.ok) {
    logger.debug('manifest read', {
      path,
      edition: manifest.value.edition,
      declaredVersionKey: manifest.value.declaredVersionKey,
    });
  }
  return manifest;
}
