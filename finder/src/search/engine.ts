/**
 * SearchEngine: drives checks over the release catalog for one run.
 *
 * The engine owns the in-progress search state and is the only component that
 * emits reporter events about modes, steps and the final result. Checks run one
 * at a time, in the order the strategy selects them.
 * @module search/engine
 */

import { Err, Ok, type Result } from '../types/result.js';
import { assertNever } from '../types/assert-never.js';
import { ConfigError, ConfigErrorCode, type FinderError } from '../types/errors.js';
import { NOOP_LOGGER, type Logger } from '../logging/logger.js';
import { ReleaseCatalog, narrowCatalog } from '../releases/catalog.js';
import type { Bounds, Release, ReleaseSource } from '../releases/types.js';
import type { ModeIntent, Reporter } from '../reporter/types.js';
import type { CheckOutcome, Checker } from '../toolchain/types.js';
import { formatBareVersion, type BareVersion } from '../version/bare-version.js';
import { matchRelease } from '../version/matcher.js';
import { maxChecks, runStrategy, type SearchStrategy } from './strategies.js';

// =============================================================================
// Types
// =============================================================================

/**
 * What a run should do and over which candidates.
 */
export interface SearchRequest {
  readonly intent: ModeIntent;
  readonly bounds: Bounds;
  readonly includeAllPatchReleases: boolean;
  readonly strategy: SearchStrategy;
  /** Version the manifest declares; required to verify */
  readonly declaredVersion?: BareVersion;
  /** Check command, for the failure event */
  readonly command: readonly string[];
}

export type SearchResult =
  | {
      readonly kind: 'minimal-version-found';
      readonly release: Release;
      readonly checks: readonly CheckOutcome[];
    }
  | {
      readonly kind: 'verification-passed';
      readonly release: Release;
      readonly checks: readonly CheckOutcome[];
    }
  | {
      readonly kind: 'verification-failed';
      readonly release: Release;
      readonly checks: readonly CheckOutcome[];
    }
  | { readonly kind: 'no-candidate-satisfies'; readonly checks: readonly CheckOutcome[] }
  | { readonly kind: 'listed'; readonly releases: readonly Release[] };

export interface EngineDependencies {
  releaseSource: ReleaseSource;
  checker: Checker;
  reporter: Reporter;
  logger?: Logger;
}

function missingDeclaredVersion(): ConfigError {
  return new ConfigError(
    'The manifest does not declare a minimum supported version to verify',
    ConfigErrorCode.MISSING_MSRV,
    { field: 'package.rust-version' }
  );
}

// =============================================================================
// Engine
// =============================================================================

export class SearchEngine {
  private readonly releaseSource: ReleaseSource;
  private readonly checker: Checker;
  private readonly reporter: Reporter;
  private readonly logger: Logger;

  constructor(deps: EngineDependencies) {
    this.releaseSource = deps.releaseSource;
    this.checker = deps.checker;
    this.reporter = deps.reporter;
    this.logger = deps.logger ?? NOOP_LOGGER;
  }

  async run(request: SearchRequest): Promise<Result<SearchResult, FinderError>> {
    this.reporter.modeAnnounced(request.intent);
    this.logger.info('run started', {
      intent: request.intent,
      strategy: request.strategy,
      min: request.bounds.min ? formatBareVersion(request.bounds.min) : undefined,
      max: request.bounds.max ? formatBareVersion(request.bounds.max) : undefined,
    });

    const declared = request.declaredVersion;
    if (request.intent === 'verify' && !declared) {
      return Err(missingDeclaredVersion());
    }

    const catalog = await this.fetchCatalog();
    if (!catalog.ok) return catalog;

    switch (request.intent) {
      case 'list':
        return this.list(catalog.value, request);
      case 'verify':
        return declared
          ? this.verify(catalog.value, declared, request)
          : Err(missingDeclaredVersion());
      case 'determine':
        return this.determine(catalog.value, request);
      default:
        return assertNever(request.intent);
    }
  }

  private async fetchCatalog(): Promise<Result<ReleaseCatalog, FinderError>> {
    this.reporter.progress({ kind: 'fetching-index' });
    const releases = await this.releaseSource.fetchReleases();
    if (!releases.ok) return releases;

    const catalog = ReleaseCatalog.fromReleases(releases.value);
    this.logger.info('release index loaded', {
      source: this.releaseSource.name,
      releases: catalog.size,
    });
    return Ok(catalog);
  }

  private list(catalog: ReleaseCatalog, request: SearchRequest): Result<SearchResult, FinderError> {
    const filtered = catalog.filter({
      bounds: request.bounds,
      includeAllPatchReleases: request.includeAllPatchReleases,
    });
    this.reporter.releasesListed(filtered.versions());
    return Ok({ kind: 'listed', releases: filtered.descending() });
  }

  private async verify(
    catalog: ReleaseCatalog,
    declared: BareVersion,
    request: SearchRequest
  ): Promise<Result<SearchResult, FinderError>> {
    const matched = matchRelease(declared, catalog.descending());
    if (!matched.ok) return matched;
    const release = matched.value;

    this.reporter.stepsSet(1);
    const outcome = await this.runCheck(release);
    if (!outcome.ok) return outcome;

    const version = release.version.version;
    const checks = [outcome.value];
    if (outcome.value.passed) {
      this.reporter.finishedSuccess('verify', version);
      return Ok({ kind: 'verification-passed', release, checks });
    }

    this.reporter.finishedFailure('verify', request.command.join(' '));
    return Ok({ kind: 'verification-failed', release, checks });
  }

  private async determine(
    catalog: ReleaseCatalog,
    request: SearchRequest
  ): Promise<Result<SearchResult, FinderError>> {
    const narrowed = narrowCatalog(catalog, {
      bounds: request.bounds,
      includeAllPatchReleases: request.includeAllPatchReleases,
    });
    if (!narrowed.ok) return narrowed;

    const candidates = narrowed.value.ascending();
    this.reporter.stepsSet(maxChecks(request.strategy, candidates.length));
    this.logger.info('searching candidates', {
      strategy: request.strategy,
      candidates: candidates.length,
    });

    const checks: CheckOutcome[] = [];
    const probe = async (index: number): Promise<Result<boolean, FinderError>> => {
      const candidate = candidates[index];
      if (candidate === undefined) {
        return Ok(false);
      }
      const outcome = await this.runCheck(candidate);
      if (!outcome.ok) return outcome;
      checks.push(outcome.value);
      return Ok(outcome.value.passed);
    };

    const found = await runStrategy(request.strategy, candidates.length, probe);
    if (!found.ok) return found;

    const release = found.value === null ? undefined : candidates[found.value];
    if (release === undefined) {
      this.logger.warn('no candidate passed', { checks: checks.length });
      this.reporter.finishedFailure('determine', request.command.join(' '));
      return Ok({ kind: 'no-candidate-satisfies', checks });
    }

    this.logger.info('minimal version found', {
      version: release.version.version,
      checks: checks.length,
    });
    this.reporter.finishedSuccess('determine', release.version.version);
    return Ok({ kind: 'minimal-version-found', release, checks });
  }

  private async runCheck(release: Release): Promise<Result<CheckOutcome, FinderError>> {
    const outcome = await this.checker.check(release);
    if (!outcome.ok) {
      this.logger.error('check aborted', {
        version: release.version.version,
        code: outcome.error.code,
        message: outcome.error.message,
      });
      return outcome;
    }

    this.reporter.stepCompleted(release.version.version, outcome.value.passed);
    return outcome;
  }
}
