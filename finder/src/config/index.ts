/**
 * Config Module
 *
 * Loads the optional project config file (.msrv-finder.yml) and resolves the
 * immutable RunConfig for one run. Precedence: CLI flags > config file > defaults.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';

import { Err, Ok, fromPromise, type Result } from '../types/result.js';
import { ConfigError, ConfigErrorCode, toError, type FinderError } from '../types/errors.js';
import { editionMinimum, parseVersionOrEdition } from '../manifest/edition.js';
import type { ProjectManifest } from '../manifest/manifest.js';
import type { Bounds } from '../releases/types.js';
import type { ModeIntent } from '../reporter/types.js';
import type { SearchStrategy } from '../search/strategies.js';
import { DEFAULT_CHECK_COMMAND } from '../toolchain/checker.js';
import { parseBareVersion, type BareVersion } from '../version/bare-version.js';
import { ProjectConfigSchema, formatIssues, type ProjectConfig } from './schemas.js';

export {
  ProjectConfigSchema,
  ManifestSchema,
  formatIssues,
  type ProjectConfig,
} from './schemas.js';

export const CONFIG_FILENAME = '.msrv-finder.yml';

/** Default release index cache TTL: 24 hours */
export const DEFAULT_RELEASE_INDEX_TTL_HOURS = 24;

/**
 * Everything one run needs, resolved once at start-up.
 */
export interface RunConfig {
  readonly intent: ModeIntent;
  readonly projectPath: string;
  readonly target: string;
  readonly command: readonly string[];
  readonly bounds: Bounds;
  readonly includeAllPatchReleases: boolean;
  readonly strategy: SearchStrategy;
  readonly removeLockfile: boolean;
  readonly uninstallAfterCheck: boolean;
  readonly outputToolchainFile: boolean;
  readonly releaseIndexTtlHours: number;
  /** Version declared by the manifest; what `verify` checks */
  readonly declaredVersion?: BareVersion;
}

/**
 * Options taken from the command line. Undefined means "not given".
 */
export interface CliOverrides {
  path: string;
  target?: string;
  min?: string;
  max?: string;
  includeAllPatchReleases?: boolean;
  linear?: boolean;
  ignoreLockfile?: boolean;
  outputToolchainFile: boolean;
  readMinEdition: boolean;
  command?: readonly string[];
}

export interface ResolveConfigInput {
  intent: ModeIntent;
  cli: CliOverrides;
  project: ProjectConfig;
  manifest?: ProjectManifest;
  /** Called only when neither the CLI nor the config file names a target */
  detectTarget: () => string;
}

/**
 * Loads the project config file. A missing file yields an empty config.
 */
export async function loadProjectConfig(
  projectPath: string
): Promise<Result<ProjectConfig, ConfigError>> {
  const path = join(projectPath, CONFIG_FILENAME);
  if (!existsSync(path)) {
    return Ok({});
  }

  const content = await fromPromise(
    readFile(path, 'utf-8'),
    (error) =>
      new ConfigError(`Unable to read ${path}`, ConfigErrorCode.PARSE_ERROR, { path }, {
        cause: toError(error),
      })
  );
  if (!content.ok) return content;

  let raw: unknown;
  try {
    raw = parseYaml(content.value);
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

  // An empty document parses to null
  const parsed = ProjectConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    return Err(
      new ConfigError(`Invalid configuration in ${path}`, ConfigErrorCode.INVALID_SCHEMA, {
        path,
        issues: formatIssues(parsed.error),
      })
    );
  }

  return Ok(parsed.data);
}

function resolveMinimum(input: ResolveConfigInput): Result<BareVersion | undefined, FinderError> {
  const explicit = input.cli.min ?? input.project.min;
  if (explicit !== undefined) {
    return parseVersionOrEdition(explicit);
  }

  // The edition only bounds searches; verify checks the declared version as is
  const edition = input.manifest?.edition;
  if (input.intent !== 'verify' && input.cli.readMinEdition && edition !== undefined) {
    return Ok(editionMinimum(edition));
  }

  return Ok(undefined);
}

function resolveMaximum(input: ResolveConfigInput): Result<BareVersion | undefined, FinderError> {
  const explicit = input.cli.max ?? input.project.max;
  return explicit === undefined ? Ok(undefined) : parseBareVersion(explicit);
}

/**
 * Merges CLI flags, the config file and the manifest into a RunConfig.
 */
export function resolveRunConfig(input: ResolveConfigInput): Result<RunConfig, FinderError> {
  const { cli, project, manifest } = input;

  const min = resolveMinimum(input);
  if (!min.ok) return min;
  const max = resolveMaximum(input);
  if (!max.ok) return max;

  const bisect = cli.linear === undefined ? (project.bisect ?? true) : !cli.linear;

  return Ok({
    intent: input.intent,
    projectPath: resolve(cli.path),
    target: cli.target ?? project.target ?? input.detectTarget(),
    command: cli.command ?? project.check_command ?? DEFAULT_CHECK_COMMAND,
    bounds: { min: min.value, max: max.value },
    includeAllPatchReleases:
      cli.includeAllPatchReleases ?? project.include_all_patch_releases ?? false,
    strategy: bisect ? 'bisect' : 'linear',
    removeLockfile: cli.ignoreLockfile ?? project.ignore_lockfile ?? false,
    uninstallAfterCheck: project.uninstall_toolchains ?? false,
    outputToolchainFile: cli.outputToolchainFile,
    releaseIndexTtlHours: project.release_index_ttl_hours ?? DEFAULT_RELEASE_INDEX_TTL_HOURS,
    declaredVersion: manifest?.declaredVersion,
  });
}
