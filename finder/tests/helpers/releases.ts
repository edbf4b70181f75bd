/**
 * Release fixtures shared by the search, catalog and matcher tests.
 */

import semver, { type SemVer } from 'semver';

import { Ok, type Result } from '../../src/types/result.js';
import type { InfrastructureError } from '../../src/types/errors.js';
import { ReleaseCatalog } from '../../src/releases/catalog.js';
import type { Channel, Release, ReleaseSource } from '../../src/releases/types.js';

function parseOrThrow(version: string): SemVer {
  const parsed = semver.parse(version);
  if (!parsed) throw new Error(`bad fixture version ${version}`);
  return parsed;
}

export function release(version: string, channel: Channel = 'stable'): Release {
  return { version: parseOrThrow(version), channel };
}

export function releases(...versions: string[]): Release[] {
  return versions.map((version) => release(version));
}

export function catalogOf(...versions: string[]): ReleaseCatalog {
  return ReleaseCatalog.fromReleases(releases(...versions));
}

/**
 * In-memory release source counting how often it was asked
 */
export class StaticReleaseSource implements ReleaseSource {
  readonly name = 'static';
  calls = 0;

  constructor(
    private readonly result: Result<Release[], InfrastructureError> = Ok([])
  ) {}

  static of(...versions: string[]): StaticReleaseSource {
    return new StaticReleaseSource(Ok(releases(...versions)));
  }

  fetchReleases(): Promise<Result<Release[], InfrastructureError>> {
    this.calls++;
    return Promise.resolve(this.result);
  }
}
