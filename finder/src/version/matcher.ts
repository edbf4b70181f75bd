/**
 * Reconciles a bare version with the concrete releases of a catalog.
 * @module version/matcher
 */

import semver from 'semver';

import { Err, Ok, type Result } from '../types/result.js';
import { ResolutionError, ResolutionErrorCode } from '../types/errors.js';
import type { Release } from '../releases/types.js';
import { formatBareVersion, type BareVersion } from './bare-version.js';

/**
 * Tilde requirement for a bare version: "1.54" becomes "~1.54" (any 1.54.x) and
 * "1.54.1" becomes "~1.54.1" (1.54.1 or a later 1.54 patch).
 */
export function toTildeRequirement(version: BareVersion): string {
  return `~${formatBareVersion(version)}`;
}

/**
 * Finds the first release, in the given iteration order, that satisfies the bare
 * version read as a tilde requirement.
 *
 * @example
 * ```ts
 * // catalog newest first: 1.55.0, 1.54.2, 1.54.1
 * matchRelease(twoComponent(1, 54), catalog.descending()); // Ok(1.54.2)
 * ```
 */
export function matchRelease(
  version: BareVersion,
  releases: Iterable<Release>
): Result<Release, ResolutionError> {
  const requirement = toTildeRequirement(version);
  const available: string[] = [];

  for (const release of releases) {
    // satisfies() returns false for requirements with components beyond the safe integer range
    if (semver.satisfies(release.version, requirement)) {
      return Ok(release);
    }
    available.push(release.version.version);
  }

  return Err(
    new ResolutionError(
      `No released version matches the requirement ${requirement}`,
      ResolutionErrorCode.NO_MATCHING_RELEASE,
      { requirement, available }
    )
  );
}
