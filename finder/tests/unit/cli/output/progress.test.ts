/**
 * Progress Indicator Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Spinner, StepCounter } from '../../../../src/cli/output/progress.js';
import { BufferStream } from '../../../helpers/streams.js';

describe('Spinner', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('prints each new text once on its own line without a TTY', () => {
    const stream = new BufferStream();
    const spinner = new Spinner({ stream, colored: false });

    spinner.update('Fetching release index');
    spinner.update('Fetching release index');
    spinner.update('[1/3] Checking 1.56.0');
    spinner.stop();

    expect(stream.text).toBe('Fetching release index\n[1/3] Checking 1.56.0\n');
    expect(spinner.running).toBe(false);
  });

  it('redraws the current line when animating', () => {
    vi.useFakeTimers();
    const stream = new BufferStream(true);
    const spinner = new Spinner({ stream, colored: false, ascii: true, interval: 100 });

    spinner.update('Checking 1.56.0');
    vi.advanceTimersByTime(100);
    spinner.stop();

    expect(stream.text).toBe(
      '\r\x1b[K| Checking 1.56.0' + '\r\x1b[K/ Checking 1.56.0' + '\r\x1b[K'
    );
  });

  it('writes a persisted line above the running spinner', () => {
    const stream = new BufferStream(true);
    const spinner = new Spinner({ stream, colored: false, ascii: true });

    spinner.update('Checking 1.56.0');
    spinner.persist('✓', 'green', '1.56.0 passed');
    spinner.stop();

    expect(stream.text).toBe(
      '\r\x1b[K| Checking 1.56.0' +
        '\r\x1b[K✓ 1.56.0 passed\n' +
        '\r\x1b[K/ Checking 1.56.0' +
        '\r\x1b[K'
    );
  });
});

describe('StepCounter', () => {
  it('labels the check in flight', () => {
    const steps = new StepCounter();
    steps.setTotal(3);

    expect(steps.label()).toBe('[1/3]');
    steps.complete();
    expect(steps.label()).toBe('[2/3]');
    expect(steps.current).toBe(1);
  });

  it('never labels beyond the total', () => {
    const steps = new StepCounter();
    steps.setTotal(1);
    steps.complete();

    expect(steps.label()).toBe('[1/1]');
  });

  it('restarts when a new total is set', () => {
    const steps = new StepCounter();
    steps.setTotal(2);
    steps.complete();
    steps.setTotal(12);

    expect(steps.label()).toBe('[ 1/12]');
  });
});
