/**
 * Release and catalog types.
 * @module releases/types
 */

import type { SemVer } from 'semver';

import type { Result } from '../types/result.js';
import type { InfrastructureError } from '../types/errors.js';
import type { BareVersion } from '../version/bare-version.js';

/**
 * Release channel. Only stable releases are search candidates.
 */
export type Channel = 'stable' | 'beta' | 'nightly';

/**
 * A concrete released toolchain version.
 */
export interface Release {
  readonly version: SemVer;
  readonly channel: Channel;
}

/**
 * Inclusive bounds applied to the catalog before a search.
 */
export interface Bounds {
  readonly min?: BareVersion;
  readonly max?: BareVersion;
}

/**
 * Options for narrowing a catalog to search candidates.
 */
export interface CatalogFilterOptions {
  readonly bounds: Bounds;
  /** When false, every major.minor line is reduced to its newest patch release */
  readonly includeAllPatchReleases: boolean;
}

/**
 * Supplier of the complete set of released versions.
 */
export interface ReleaseSource {
  /** Identifier shown in logs, e.g. 'rust-changelog' */
  readonly name: string;
  fetchReleases(): Promise<Result<Release[], InfrastructureError>>;
}
