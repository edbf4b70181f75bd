/**
 * Changelog Release Source Tests
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { describe, it, expect, vi } from 'vitest';
import {
  RELEASES_URL,
  RustChangelogSource,
  parseChangelog,
} from '../../../src/releases/changelog-source.js';
import { InfrastructureErrorCode } from '../../../src/types/errors.js';
import { makeTempProject } from '../../helpers/temp-project.js';

const CHANGELOG = `Version 1.70.0 (2023-06-01)
==========================

Language
--------
- Stabilized a feature.

Version 1.69.0 (2023-04-20)
==========================

Version 1.68.2 (2023-03-28)
===========================

Version 1.0.0-alpha (2015-01-09)
================================
`;

const FETCHED_AT = new Date('2024-03-01T12:00:00.000Z');

function hoursLater(hours: number): Date {
  return new Date(FETCHED_AT.getTime() + hours * 60 * 60 * 1000);
}

function fetchReturning(body: string, status = 200) {
  return vi.fn<typeof fetch>().mockImplementation(() =>
    Promise.resolve(new Response(body, { status }))
  );
}

function versionsOf(result: Awaited<ReturnType<RustChangelogSource['fetchReleases']>>) {
  return result.ok ? result.value.map((release) => release.version.version) : result.error.message;
}

function writeCacheEntry(cacheDir: string, entry: Record<string, string>): void {
  mkdirSync(cacheDir, { recursive: true });
  writeFileSync(join(cacheDir, 'releases.json'), JSON.stringify(entry));
}

describe('parseChangelog', () => {
  it('reads stable release headings in document order', () => {
    const releases = parseChangelog(CHANGELOG);

    expect(releases.map((release) => release.version.version)).toEqual([
      '1.70.0',
      '1.69.0',
      '1.68.2',
    ]);
    expect(releases.every((release) => release.channel === 'stable')).toBe(true);
  });

  it('skips versions dated after now', () => {
    const notes = 'Version 1.77.0 (2024-03-21)\n\nVersion 1.76.0 (2024-02-08)\n';

    const releases = parseChangelog(notes, FETCHED_AT);

    expect(releases.map((release) => release.version.version)).toEqual(['1.76.0']);
  });

  it('keeps a version released today', () => {
    const releases = parseChangelog('Version 1.76.0 (2024-03-01)\n', FETCHED_AT);

    expect(releases.map((release) => release.version.version)).toEqual(['1.76.0']);
  });

  it('ignores headings that are not at the start of a line', () => {
    expect(parseChangelog('See Version 1.2.3 (2020-01-01) below')).toEqual([]);
  });
});

describe('RustChangelogSource', () => {
  it('downloads the release notes and caches them', async () => {
    const cacheDir = join(makeTempProject().path, 'cache');
    const fetchImpl = fetchReturning(CHANGELOG);
    const source = new RustChangelogSource({ cacheDir, fetch: fetchImpl, now: () => FETCHED_AT });

    const result = await source.fetchReleases();

    expect(versionsOf(result)).toEqual(['1.70.0', '1.69.0', '1.68.2']);
    expect(fetchImpl).toHaveBeenCalledWith(RELEASES_URL, expect.anything());
    const cached: unknown = JSON.parse(readFileSync(join(cacheDir, 'releases.json'), 'utf-8'));
    expect(cached).toEqual({
      url: RELEASES_URL,
      fetchedAt: '2024-03-01T12:00:00.000Z',
      body: CHANGELOG,
    });
  });

  it('leaves unreleased versions out of the downloaded index', async () => {
    const cacheDir = join(makeTempProject().path, 'cache');
    const fetchImpl = fetchReturning(`Version 1.99.0 (2099-01-01)\n===\n\n${CHANGELOG}`);
    const source = new RustChangelogSource({ cacheDir, fetch: fetchImpl, now: () => FETCHED_AT });

    const result = await source.fetchReleases();

    expect(versionsOf(result)).toEqual(['1.70.0', '1.69.0', '1.68.2']);
  });

  it('uses a fresh cache without downloading', async () => {
    const cacheDir = makeTempProject().path;
    writeCacheEntry(cacheDir, {
      url: RELEASES_URL,
      fetchedAt: FETCHED_AT.toISOString(),
      body: 'Version 1.50.0 (2021-02-11)\n',
    });
    const fetchImpl = fetchReturning(CHANGELOG);
    const source = new RustChangelogSource({
      cacheDir,
      fetch: fetchImpl,
      now: () => hoursLater(23),
    });

    expect(versionsOf(await source.fetchReleases())).toEqual(['1.50.0']);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('downloads again once the cache has expired', async () => {
    const cacheDir = makeTempProject().path;
    writeCacheEntry(cacheDir, {
      url: RELEASES_URL,
      fetchedAt: FETCHED_AT.toISOString(),
      body: 'Version 1.50.0 (2021-02-11)\n',
    });
    const fetchImpl = fetchReturning(CHANGELOG);
    const source = new RustChangelogSource({
      cacheDir,
      fetch: fetchImpl,
      now: () => hoursLater(25),
    });

    expect(versionsOf(await source.fetchReleases())).toEqual(['1.70.0', '1.69.0', '1.68.2']);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('honours a custom TTL', async () => {
    const cacheDir = makeTempProject().path;
    writeCacheEntry(cacheDir, {
      url: RELEASES_URL,
      fetchedAt: FETCHED_AT.toISOString(),
      body: 'Version 1.50.0 (2021-02-11)\n',
    });
    const fetchImpl = fetchReturning(CHANGELOG);
    const source = new RustChangelogSource({
      cacheDir,
      ttlHours: 0,
      fetch: fetchImpl,
      now: () => FETCHED_AT,
    });

    await source.fetchReleases();

    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('falls back to a stale cache when the download fails', async () => {
    const cacheDir = makeTempProject().path;
    writeCacheEntry(cacheDir, {
      url: RELEASES_URL,
      fetchedAt: FETCHED_AT.toISOString(),
      body: 'Version 1.50.0 (2021-02-11)\n',
    });
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockRejectedValue(new Error('getaddrinfo ENOTFOUND raw.githubusercontent.com'));
    const warn = vi.fn();
    const source = new RustChangelogSource({
      cacheDir,
      fetch: fetchImpl,
      now: () => hoursLater(48),
      logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn,
        error: vi.fn(),
        child: vi.fn(),
      },
    });

    expect(versionsOf(await source.fetchReleases())).toEqual(['1.50.0']);
    expect(warn).toHaveBeenCalledWith('release index download failed, using stale cache', {
      fetchedAt: FETCHED_AT.toISOString(),
      reason: 'Release index download failed: getaddrinfo ENOTFOUND raw.githubusercontent.com',
    });
  });

  it('ignores a cache written for another URL', async () => {
    const cacheDir = makeTempProject().path;
    writeCacheEntry(cacheDir, {
      url: 'https://mirror.example/RELEASES.md',
      fetchedAt: FETCHED_AT.toISOString(),
      body: 'Version 1.50.0 (2021-02-11)\n',
    });
    const fetchImpl = fetchReturning(CHANGELOG);
    const source = new RustChangelogSource({ cacheDir, fetch: fetchImpl, now: () => FETCHED_AT });

    expect(versionsOf(await source.fetchReleases())).toEqual(['1.70.0', '1.69.0', '1.68.2']);
  });

  it('ignores a corrupt cache file', async () => {
    const project = makeTempProject({ 'releases.json': '{not json' });
    const fetchImpl = fetchReturning(CHANGELOG);
    const source = new RustChangelogSource({
      cacheDir: project.path,
      fetch: fetchImpl,
      now: () => FETCHED_AT,
    });

    expect(versionsOf(await source.fetchReleases())).toEqual(['1.70.0', '1.69.0', '1.68.2']);
  });

  it('fails on an HTTP error without a cache', async () => {
    const source = new RustChangelogSource({
      cacheDir: join(makeTempProject().path, 'cache'),
      fetch: fetchReturning('unavailable', 503),
    });

    const result = await source.fetchReleases();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(InfrastructureErrorCode.RELEASE_INDEX_UNAVAILABLE);
      expect(result.error.message).toBe('Release index download failed with HTTP 503');
    }
  });

  it('fails without a cache when the network is unreachable', async () => {
    const source = new RustChangelogSource({
      cacheDir: join(makeTempProject().path, 'cache'),
      fetch: vi.fn<typeof fetch>().mockRejectedValue(new Error('connect ECONNREFUSED')),
    });

    expect(versionsOf(await source.fetchReleases())).toBe(
      'Release index download failed: connect ECONNREFUSED'
    );
  });

  it('does not cache a document without releases', async () => {
    const cacheDir = join(makeTempProject().path, 'cache');
    const source = new RustChangelogSource({
      cacheDir,
      fetch: fetchReturning('# Nothing here\n'),
    });

    expect(versionsOf(await source.fetchReleases())).toBe('The release index lists no releases');
    expect(existsSync(join(cacheDir, 'releases.json'))).toBe(false);
  });
});
