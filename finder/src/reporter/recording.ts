/**
 * Reporters without terminal output.
 * @module reporter/recording
 */

import type { ModeIntent, ProgressAction, Reporter, ReporterEvent } from './types.js';

/**
 * Keeps every event in emission order.
 */
export class RecordingReporter implements Reporter {
  readonly events: ReporterEvent[] = [];

  modeAnnounced(intent: ModeIntent): void {
    this.events.push({ type: 'mode', intent });
  }

  stepsSet(total: number): void {
    this.events.push({ type: 'set-steps', total });
  }

  progress(action: ProgressAction): void {
    this.events.push({ type: 'progress', action });
  }

  stepCompleted(version: string, passed: boolean): void {
    this.events.push({ type: 'step-completed', version, passed });
  }

  releasesListed(versions: readonly string[]): void {
    this.events.push({ type: 'list', versions: [...versions] });
  }

  finishedSuccess(intent: ModeIntent, version: string): void {
    this.events.push({ type: 'finished-success', intent, version });
  }

  finishedFailure(intent: ModeIntent, command: string): void {
    this.events.push({ type: 'finished-failure', intent, command });
  }

  /** Events of one type, in order */
  ofType<T extends ReporterEvent['type']>(type: T): Extract<ReporterEvent, { type: T }>[] {
    return this.events.filter((event): event is Extract<ReporterEvent, { type: T }> => {
      return event.type === type;
    });
  }
}

const noop = (): void => {};

/**
 * Discards every event. Used for `--output-format none`.
 */
export const SILENT_REPORTER: Reporter = {
  modeAnnounced: noop,
  stepsSet: noop,
  progress: noop,
  stepCompleted: noop,
  releasesListed: noop,
  finishedSuccess: noop,
  finishedFailure: noop,
};
