/**
 * Release source reading the published release notes.
 *
 * Stable releases are taken from the "Version X.Y.Z (YYYY-MM-DD)" headings of
 * RELEASES.md. The downloaded document is cached on disk; a stale cache is used
 * when the download fails.
 * @module releases/changelog-source
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import semver from 'semver';
import { z } from 'zod';

import { Err, Ok, type Result } from '../types/result.js';
import { InfrastructureError, InfrastructureErrorCode, toError } from '../types/errors.js';
import { NOOP_LOGGER, type Logger } from '../logging/logger.js';
import type { Release, ReleaseSource } from './types.js';

export const RELEASES_URL = 'https://raw.githubusercontent.com/rust-lang/rust/master/RELEASES.md';

/** Default cache location: ~/.msrv-finder/cache */
export const DEFAULT_CACHE_DIR = join(homedir(), '.msrv-finder', 'cache');

const CACHE_FILENAME = 'releases.json';

/** Default TTL: 24 hours */
const DEFAULT_TTL_HOURS = 24;

const DOWNLOAD_TIMEOUT_MS = 30_000;

const VERSION_HEADING = /^Version (\d+\.\d+\.\d+) \((\d{4}-\d{2}-\d{2})\)/gm;

const CacheEntrySchema = z.object({
  url: z.string(),
  fetchedAt: z.string(),
  body: z.string(),
});

type CacheEntry = z.infer<typeof CacheEntrySchema>;

export interface ChangelogSourceOptions {
  url?: string;
  cacheDir?: string;
  ttlHours?: number;
  fetch?: typeof fetch;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Extracts the stable releases listed in the release notes.
 *
 * Notes for an upcoming version are published before it ships; headings dated
 * after `now` are skipped.
 */
export function parseChangelog(markdown: string, now: Date = new Date()): Release[] {
  const releases: Release[] = [];
  for (const [, versionText, dateText] of markdown.matchAll(VERSION_HEADING)) {
    if (versionText === undefined || dateText === undefined) continue;

    const releasedAt = Date.parse(`${dateText}T00:00:00Z`);
    if (Number.isNaN(releasedAt) || releasedAt > now.getTime()) continue;

    const version = semver.parse(versionText);
    if (version) {
      releases.push({ version, channel: 'stable' });
    }
  }
  return releases;
}

export class RustChangelogSource implements ReleaseSource {
  readonly name = 'rust-changelog';

  private readonly url: string;
  private readonly cacheDir: string;
  private readonly ttlMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: ChangelogSourceOptions = {}) {
    this.url = options.url ?? RELEASES_URL;
    this.cacheDir = options.cacheDir ?? DEFAULT_CACHE_DIR;
    this.ttlMs = (options.ttlHours ?? DEFAULT_TTL_HOURS) * 60 * 60 * 1000;
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  async fetchReleases(): Promise<Result<Release[], InfrastructureError>> {
    const cached = this.readCache();
    if (cached && this.isFresh(cached)) {
      this.logger.debug('release index cache hit', { fetchedAt: cached.fetchedAt });
      return this.toReleases(cached.body);
    }

    const downloaded = await this.download();
    if (downloaded.ok) {
      const releases = this.toReleases(downloaded.value);
      if (releases.ok) {
        this.writeCache(downloaded.value);
      }
      return releases;
    }

    if (cached) {
      this.logger.warn('release index download failed, using stale cache', {
        fetchedAt: cached.fetchedAt,
        reason: downloaded.error.message,
      });
      return this.toReleases(cached.body);
    }

    return downloaded;
  }

  private async download(): Promise<Result<string, InfrastructureError>> {
    this.logger.info('downloading release index', { url: this.url });

    try {
      const response = await this.fetchImpl(this.url, {
        signal: AbortSignal.timeout(DOWNLOAD_TIMEOUT_MS),
      });
      if (!response.ok) {
        return Err(
          new InfrastructureError(
            `Release index download failed with HTTP ${response.status}`,
            InfrastructureErrorCode.RELEASE_INDEX_UNAVAILABLE,
            { url: this.url }
          )
        );
      }
      return Ok(await response.text());
    } catch (error) {
      const cause = toError(error);
      return Err(
        new InfrastructureError(
          `Release index download failed: ${cause.message}`,
          InfrastructureErrorCode.RELEASE_INDEX_UNAVAILABLE,
          { url: this.url },
          { cause }
        )
      );
    }
  }

  private toReleases(body: string): Result<Release[], InfrastructureError> {
    const releases = parseChangelog(body, this.now());
    if (releases.length === 0) {
      return Err(
        new InfrastructureError(
          'The release index lists no releases',
          InfrastructureErrorCode.RELEASE_INDEX_UNAVAILABLE,
          { url: this.url }
        )
      );
    }
    return Ok(releases);
  }

  private get cachePath(): string {
    return join(this.cacheDir, CACHE_FILENAME);
  }

  private isFresh(entry: CacheEntry): boolean {
    const fetchedAt = Date.parse(entry.fetchedAt);
    return !Number.isNaN(fetchedAt) && this.now().getTime() - fetchedAt < this.ttlMs;
  }

  private readCache(): CacheEntry | null {
    if (!existsSync(this.cachePath)) return null;

    try {
      const parsed = CacheEntrySchema.safeParse(JSON.parse(readFileSync(this.cachePath, 'utf-8')));
      if (!parsed.success || parsed.data.url !== this.url) {
        this.logger.debug('ignoring unusable release index cache', { path: this.cachePath });
        return null;
      }
      return parsed.data;
    } catch (error) {
      this.logger.warn('release index cache unreadable', {
        path: this.cachePath,
        reason: toError(error).message,
      });
      return null;
    }
  }

  private writeCache(body: string): void {
    const entry: CacheEntry = { url: this.url, fetchedAt: this.now().toISOString(), body };
    try {
      if (!existsSync(this.cacheDir)) {
        mkdirSync(this.cacheDir, { recursive: true });
      }
      writeFileSync(this.cachePath, JSON.stringify(entry), 'utf-8');
    } catch (error) {
      this.logger.warn('unable to write release index cache', {
        path: this.cachePath,
        reason: toError(error).message,
      });
    }
  }
}
