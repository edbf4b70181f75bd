/**
 * Progress Indicators Module
 *
 * Spinner and step counter for the human reporter.
 *
 * @module cli/output/progress
 */

import { colorize, type AnsiCode } from './colors.js';

/**
 * Minimal writable surface; satisfied by process.stderr and by test buffers.
 */
export interface OutputStream {
  write(text: string): unknown;
  readonly isTTY?: boolean;
}

// =============================================================================
// Spinner
// =============================================================================

const UNICODE_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'] as const;

const ASCII_FRAMES = ['|', '/', '-', '\\'] as const;

export interface SpinnerOptions {
  /** Use ASCII characters instead of Unicode */
  readonly ascii?: boolean;
  readonly colored?: boolean;
  readonly color?: AnsiCode;
  /** Interval between frames in ms */
  readonly interval?: number;
  readonly stream?: OutputStream;
  /**
   * Animate frames. When false (non-TTY output) the spinner prints each new text
   * once on its own line instead of redrawing.
   */
  readonly animate?: boolean;
}

/**
 * Terminal spinner for the check currently running
 */
export class Spinner {
  private readonly frames: readonly string[];
  private readonly interval: number;
  private readonly colored: boolean;
  private readonly color: AnsiCode;
  private readonly stream: OutputStream;
  private readonly animate: boolean;

  private frameIndex = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private currentText = '';
  private isRunning = false;

  constructor(options: SpinnerOptions = {}) {
    this.frames = options.ascii ? ASCII_FRAMES : UNICODE_FRAMES;
    this.interval = options.interval ?? 80;
    this.colored = options.colored ?? true;
    this.color = options.color ?? 'cyan';
    this.stream = options.stream ?? process.stderr;
    this.animate = options.animate ?? this.stream.isTTY ?? false;
  }

  get running(): boolean {
    return this.isRunning;
  }

  /**
   * Show `text`, starting the spinner if needed
   */
  update(text: string): void {
    if (text === this.currentText && this.isRunning) return;
    this.currentText = text;

    if (!this.animate) {
      this.isRunning = true;
      this.stream.write(`${text}\n`);
      return;
    }

    if (!this.isRunning) {
      this.isRunning = true;
      this.timer = setInterval(() => this.render(), this.interval);
      this.timer.unref();
    }
    this.render();
  }

  /**
   * Stop the spinner and clear its line
   */
  stop(): void {
    if (!this.isRunning) return;
    this.isRunning = false;
    this.currentText = '';
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.animate) {
      this.clearLine();
    }
  }

  /**
   * Write a finished line above the spinner; the spinner keeps running
   */
  persist(symbol: string, symbolColor: AnsiCode, text: string): void {
    if (this.animate && this.isRunning) {
      this.clearLine();
    }
    this.stream.write(`${colorize(symbol, symbolColor, this.colored)} ${text}\n`);
    if (this.animate && this.isRunning) {
      this.render();
    }
  }

  private render(): void {
    const frame = this.frames[this.frameIndex] ?? '|';
    this.clearLine();
    this.stream.write(`${colorize(frame, this.color, this.colored)} ${this.currentText}`);
    this.frameIndex = (this.frameIndex + 1) % this.frames.length;
  }

  private clearLine(): void {
    this.stream.write('\r\x1b[K');
  }
}

// =============================================================================
// Step Counter
// =============================================================================

/**
 * Counts checks against the announced upper bound.
 * Bisection may finish below the bound, never above it.
 */
export class StepCounter {
  private total = 0;
  private completed = 0;

  setTotal(total: number): void {
    this.total = total;
    this.completed = 0;
  }

  complete(): void {
    this.completed++;
  }

  get current(): number {
    return this.completed;
  }

  /** Label for the check in flight, e.g. "[2/5]" */
  label(): string {
    const width = String(this.total).length;
    const next = Math.min(this.completed + 1, Math.max(this.total, 1));
    return `[${String(next).padStart(width)}/${this.total}]`;
  }
}
