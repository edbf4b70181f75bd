/**
 * Reporter event protocol.
 *
 * The search engine narrates a run through these events. Presentation (human,
 * JSON, silent) is a reporter concern; the engine never writes output itself.
 *
 * Per run the engine emits exactly one `modeAnnounced`, at most one `stepsSet`,
 * a `progress`/`stepCompleted` sequence per check and exactly one terminal event:
 * `finishedSuccess` or `finishedFailure` for a search or verification,
 * `releasesListed` for a listing. A run that aborts on an error emits no terminal
 * event; the error is surfaced by the caller.
 * @module reporter/types
 */

/**
 * What the run was asked to do.
 */
export type ModeIntent = 'determine' | 'verify' | 'list';

/**
 * Work in progress. Versions are full release versions ("1.56.1").
 */
export type ProgressAction =
  | { readonly kind: 'fetching-index' }
  | { readonly kind: 'installing'; readonly version: string; readonly toolchain: string }
  | { readonly kind: 'checking'; readonly version: string; readonly toolchain: string };

export interface Reporter {
  modeAnnounced(intent: ModeIntent): void;
  /** Upper bound on the number of checks the run will perform */
  stepsSet(total: number): void;
  progress(action: ProgressAction): void;
  stepCompleted(version: string, passed: boolean): void;
  releasesListed(versions: readonly string[]): void;
  finishedSuccess(intent: ModeIntent, version: string): void;
  /** `command` is the check command as it was run, for the failure message */
  finishedFailure(intent: ModeIntent, command: string): void;
}

/**
 * Every reporter event as plain data, in emission order.
 * Used by the recording reporter and by the JSON reporter's line format.
 */
export type ReporterEvent =
  | { readonly type: 'mode'; readonly intent: ModeIntent }
  | { readonly type: 'set-steps'; readonly total: number }
  | { readonly type: 'progress'; readonly action: ProgressAction }
  | { readonly type: 'step-completed'; readonly version: string; readonly passed: boolean }
  | { readonly type: 'list'; readonly versions: readonly string[] }
  | { readonly type: 'finished-success'; readonly intent: ModeIntent; readonly version: string }
  | { readonly type: 'finished-failure'; readonly intent: ModeIntent; readonly command: string };
