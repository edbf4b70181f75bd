/**
 * Terminal and JSON renderings of the reporter event stream.
 *
 * @module cli/output/reporters
 */

import type { ModeIntent, ProgressAction, Reporter } from '../../reporter/types.js';
import { SILENT_REPORTER } from '../../reporter/recording.js';
import { assertNever } from '../../types/assert-never.js';
import { createColorizer, type Colorizer } from './colors.js';
import { toErrorPayload, formatCLIError } from './errors.js';
import { Spinner, StepCounter, type OutputStream } from './progress.js';

export type OutputFormat = 'human' | 'json' | 'none';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['human', 'json', 'none'];

/**
 * Reporter owned by the CLI, which also renders errors and free-form notes.
 */
export interface OutputReporter extends Reporter {
  /** Error that aborted the run */
  errorOccurred(error: Error): void;
  /** Supplementary text, e.g. the output of the last failed check */
  note(text: string): void;
  /** Stop any animation; called once when the run ends */
  close(): void;
}

export interface OutputReporterOptions {
  /** Results: the MSRV, the release listing, JSON lines */
  stdout: OutputStream;
  /** Progress, notes and errors in human format */
  stderr: OutputStream;
  colored: boolean;
  /** Target triple shown in the welcome line */
  target: string;
}

// =============================================================================
// Human
// =============================================================================

const WELCOME: Record<ModeIntent, string> = {
  determine: 'Determining the Minimum Supported Rust Version (MSRV) for target',
  verify: 'Verifying the Minimum Supported Rust Version (MSRV) for target',
  list: 'Listing available releases for target',
};

export class HumanReporter implements OutputReporter {
  private readonly c: Colorizer;
  private readonly spinner: Spinner;
  private readonly steps = new StepCounter();

  constructor(private readonly options: OutputReporterOptions) {
    this.c = createColorizer(options.colored);
    this.spinner = new Spinner({ colored: options.colored, stream: options.stderr });
  }

  modeAnnounced(intent: ModeIntent): void {
    const target = this.c.cyan(this.options.target);
    this.options.stderr.write(`${this.c.bold(WELCOME[intent])} ${target}\n`);
  }

  stepsSet(total: number): void {
    this.steps.setTotal(total);
  }

  progress(action: ProgressAction): void {
    switch (action.kind) {
      case 'fetching-index':
        this.spinner.update('Fetching release index');
        break;
      case 'installing':
        this.spinner.update(`${this.steps.label()} Installing ${action.toolchain}`);
        break;
      case 'checking':
        this.spinner.update(`${this.steps.label()} Checking ${action.version}`);
        break;
      default:
        assertNever(action);
    }
  }

  stepCompleted(version: string, passed: boolean): void {
    const text = `${this.steps.label()} ${version} ${passed ? 'passed' : 'failed'}`;
    if (passed) {
      this.spinner.persist('✓', 'green', text);
    } else {
      this.spinner.persist('✗', 'red', text);
    }
    this.steps.complete();
  }

  releasesListed(versions: readonly string[]): void {
    this.spinner.stop();
    this.options.stdout.write(`${versions.join(', ')}\n`);
  }

  finishedSuccess(intent: ModeIntent, version: string): void {
    this.spinner.stop();
    const message =
      intent === 'verify' ? `Satisfied MSRV check: ${version}` : `The MSRV is: ${version}`;
    this.options.stdout.write(`${this.c.green(this.c.bold('Finished'))} ${message}\n`);
  }

  finishedFailure(intent: ModeIntent, command: string): void {
    this.spinner.stop();
    const message =
      intent === 'verify'
        ? `Check command '${command}' didn't succeed for the declared MSRV`
        : `Check command '${command}' didn't succeed for any candidate release`;
    this.options.stdout.write(`${this.c.red(this.c.bold('Failed'))} ${message}\n`);
  }

  errorOccurred(error: Error): void {
    this.spinner.stop();
    this.options.stderr.write(`${formatCLIError(error, this.options.colored)}\n`);
  }

  note(text: string): void {
    this.spinner.stop();
    this.options.stderr.write(`${this.c.gray(text)}\n`);
  }

  close(): void {
    this.spinner.stop();
  }
}

// =============================================================================
// JSON
// =============================================================================

/**
 * One JSON object per line on stdout, each with a `reason` field.
 */
export class JsonReporter implements OutputReporter {
  constructor(private readonly stdout: OutputStream) {}

  modeAnnounced(intent: ModeIntent): void {
    this.emit({ reason: 'mode', mode: intent });
  }

  stepsSet(total: number): void {
    this.emit({ reason: 'set-steps', steps: total });
  }

  progress(action: ProgressAction): void {
    switch (action.kind) {
      case 'fetching-index':
        this.emit({ reason: 'fetching-index' });
        break;
      case 'installing':
      case 'checking':
        this.emit({ reason: action.kind, version: action.version, toolchain: action.toolchain });
        break;
      default:
        assertNever(action);
    }
  }

  stepCompleted(version: string, passed: boolean): void {
    this.emit({ reason: 'check-complete', version, success: passed });
  }

  releasesListed(versions: readonly string[]): void {
    this.emit({ reason: 'list', versions });
  }

  finishedSuccess(intent: ModeIntent, version: string): void {
    this.emit({ reason: 'msrv-complete', mode: intent, success: true, version });
  }

  finishedFailure(intent: ModeIntent, command: string): void {
    this.emit({ reason: 'msrv-complete', mode: intent, success: false, command });
  }

  errorOccurred(error: Error): void {
    this.emit({ reason: 'error', error: toErrorPayload(error) });
  }

  note(_text: string): void {}

  close(): void {}

  private emit(line: Record<string, unknown>): void {
    this.stdout.write(`${JSON.stringify(line)}\n`);
  }
}

// =============================================================================
// Factory
// =============================================================================

const noop = (): void => {};

export function createOutputReporter(
  format: OutputFormat,
  options: OutputReporterOptions
): OutputReporter {
  switch (format) {
    case 'human':
      return new HumanReporter(options);
    case 'json':
      return new JsonReporter(options.stdout);
    case 'none':
      return { ...SILENT_REPORTER, errorOccurred: noop, note: noop, close: noop };
    default:
      return assertNever(format);
  }
}
