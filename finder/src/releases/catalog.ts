/**
 * Ordered, deduplicated set of stable releases and the bounds filtering applied
 * before a search.
 * @module releases/catalog
 */

import semver from 'semver';

import { Err, Ok, type Result } from '../types/result.js';
import { ResolutionError, ResolutionErrorCode } from '../types/errors.js';
import {
  compareComponents,
  formatBareVersion,
  patchOf,
  type BareVersion,
} from '../version/bare-version.js';
import type { CatalogFilterOptions, Release } from './types.js';

function componentsOf(release: Release): [bigint, bigint, bigint] {
  const { major, minor, patch } = release.version;
  return [BigInt(major), BigInt(minor), BigInt(patch)];
}

function boundComponents(bound: BareVersion): [bigint, bigint, bigint] {
  return [bound.major, bound.minor, patchOf(bound)];
}

/**
 * Immutable catalog of stable releases, stored newest first.
 */
export class ReleaseCatalog {
  private readonly releases: readonly Release[];

  private constructor(releases: readonly Release[]) {
    this.releases = releases;
  }

  /**
   * Builds a catalog from an unordered release listing.
   * Non-stable releases are dropped and duplicate versions collapse to one entry.
   */
  static fromReleases(releases: Iterable<Release>): ReleaseCatalog {
    const unique = new Map<string, Release>();
    for (const release of releases) {
      if (release.channel !== 'stable') continue;
      const key = release.version.version;
      if (!unique.has(key)) {
        unique.set(key, release);
      }
    }

    const sorted = [...unique.values()].sort((a, b) => semver.rcompare(a.version, b.version));
    return new ReleaseCatalog(sorted);
  }

  get size(): number {
    return this.releases.length;
  }

  isEmpty(): boolean {
    return this.releases.length === 0;
  }

  /** Newest first; the default iteration order */
  descending(): readonly Release[] {
    return this.releases;
  }

  /** Oldest first; the order both search algorithms walk */
  ascending(): Release[] {
    return [...this.releases].reverse();
  }

  versions(): string[] {
    return this.releases.map((release) => release.version.version);
  }

  /**
   * Applies inclusive bounds and, unless every patch release is wanted, keeps only
   * the newest patch of each major.minor line.
   */
  filter(options: CatalogFilterOptions): ReleaseCatalog {
    const { min, max } = options.bounds;

    const inBounds = this.releases.filter((release) => {
      const components = componentsOf(release);
      if (min && compareComponents(components, boundComponents(min)) < 0) return false;
      if (max && compareComponents(components, boundComponents(max)) > 0) return false;
      return true;
    });

    if (options.includeAllPatchReleases) {
      return new ReleaseCatalog(inBounds);
    }

    // Newest first, so the first release seen for a line is its highest patch
    const seenLines = new Set<string>();
    const latestPatches = inBounds.filter((release) => {
      const line = `${release.version.major}.${release.version.minor}`;
      if (seenLines.has(line)) return false;
      seenLines.add(line);
      return true;
    });

    return new ReleaseCatalog(latestPatches);
  }
}

/**
 * Narrows a catalog to search candidates, failing when nothing is left.
 */
export function narrowCatalog(
  catalog: ReleaseCatalog,
  options: CatalogFilterOptions
): Result<ReleaseCatalog, ResolutionError> {
  const narrowed = catalog.filter(options);

  if (narrowed.isEmpty()) {
    const { min, max } = options.bounds;
    const range = `${min ? formatBareVersion(min) : '*'} ..= ${max ? formatBareVersion(max) : '*'}`;
    return Err(
      new ResolutionError(
        `No releases available in range ${range}`,
        ResolutionErrorCode.NO_CANDIDATES_IN_RANGE,
        {
          min: min ? formatBareVersion(min) : undefined,
          max: max ? formatBareVersion(max) : undefined,
          available: catalog.versions(),
        }
      )
    );
  }

  return Ok(narrowed);
}
