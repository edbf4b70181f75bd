/**
 * msrv-finder library entry point.
 *
 * The search engine and its collaborators, for embedding the finder in other
 * tools. The command line lives in main.ts.
 */

export {
  parseBareVersion,
  compareBareVersions,
  formatBareVersion,
  twoComponent,
  threeComponent,
  type BareVersion,
} from './version/bare-version.js';
export { matchRelease, toTildeRequirement } from './version/matcher.js';
export { ReleaseCatalog, narrowCatalog } from './releases/catalog.js';
export { RustChangelogSource, parseChangelog } from './releases/changelog-source.js';
export type { Bounds, Channel, Release, ReleaseSource } from './releases/types.js';
export { SearchEngine, type SearchRequest, type SearchResult } from './search/engine.js';
export { bisectSearch, linearSearch, maxChecks, type SearchStrategy } from './search/strategies.js';
export { ToolchainChecker, DEFAULT_CHECK_COMMAND } from './toolchain/checker.js';
export { RustupToolchainManager } from './toolchain/rustup.js';
export type { CheckOutcome, Checker, ToolchainManager } from './toolchain/types.js';
export { RecordingReporter, SILENT_REPORTER } from './reporter/recording.js';
export type { ModeIntent, ProgressAction, Reporter, ReporterEvent } from './reporter/types.js';
export { readManifest, parseManifest, type ProjectManifest } from './manifest/manifest.js';
export { runFinder, ExitCode, type FinderDependencies } from './cli/commands/run.js';
export * from './types/errors.js';
export * from './types/result.js';
