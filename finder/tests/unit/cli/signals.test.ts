/**
 * Signal Handling Module Tests
 *
 * Tests for shutdown handling via SIGINT/SIGTERM signals. Handlers are invoked
 * directly with an injected exit function.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  SIGNAL_EXIT_CODES,
  clearSearchProgress,
  createSignalHandler,
  formatInterruptedMessage,
  getSearchProgress,
  getShutdownState,
  isShutdownTriggered,
  resetShutdownState,
  setSearchProgress,
  setupSignalHandlers,
  updateSearchProgress,
} from '../../../src/cli/signals.js';

function handlers() {
  const logger = { log: vi.fn(), warn: vi.fn() };
  const exit = vi.fn();
  const cleanup = vi.fn();
  setupSignalHandlers({ logger, exit, cleanup });
  return { logger, exit, cleanup };
}

describe('signals', () => {
  beforeEach(() => {
    resetShutdownState();
  });

  afterEach(() => {
    resetShutdownState();
  });

  describe('setupSignalHandlers', () => {
    it('starts without a triggered shutdown', () => {
      handlers();

      expect(isShutdownTriggered()).toBe(false);
      expect(getShutdownState()).toEqual({ triggered: false });
    });

    it('registers one listener per signal', () => {
      const before = process.listenerCount('SIGINT');
      handlers();
      handlers();

      expect(process.listenerCount('SIGINT')).toBe(before + 1);
      expect(process.listenerCount('SIGTERM')).toBeGreaterThanOrEqual(1);
    });
  });

  describe('createSignalHandler', () => {
    it('cleans up and exits with 130 on SIGINT', async () => {
      const { logger, exit, cleanup } = handlers();

      await createSignalHandler('SIGINT')();

      expect(isShutdownTriggered()).toBe(true);
      expect(getShutdownState().signal).toBe('SIGINT');
      expect(logger.log).toHaveBeenCalledWith('\n\nReceived interrupt signal. Shutting down...');
      expect(cleanup).toHaveBeenCalledTimes(1);
      expect(exit).toHaveBeenCalledWith(130);
    });

    it('exits with 143 on SIGTERM', async () => {
      const { exit } = handlers();

      await createSignalHandler('SIGTERM')();

      expect(exit).toHaveBeenCalledWith(SIGNAL_EXIT_CODES.SIGTERM);
    });

    it('prints how far the search got', async () => {
      const { logger } = handlers();
      setSearchProgress({
        totalSteps: 4,
        completedChecks: [{ version: '1.55.0', passed: false }],
        currentVersion: '1.58.0',
      });

      await createSignalHandler('SIGINT')();

      expect(logger.log.mock.calls.map(([line]) => line)).toEqual([
        '\n\nReceived interrupt signal. Shutting down...',
        'Interrupted after 1 of at most 4 checks',
        '  (1.55.0 ✗)',
        '  1.58.0 was not finished',
      ]);
    });

    it('force quits on a second signal without cleanup', async () => {
      const { logger, exit, cleanup } = handlers();
      const handler = createSignalHandler('SIGINT');

      await handler();
      await handler();

      expect(logger.warn).toHaveBeenCalledWith('\nForce quit requested. Exiting immediately.');
      expect(cleanup).toHaveBeenCalledTimes(1);
      expect(exit).toHaveBeenCalledTimes(2);
    });

    it('still exits when cleanup throws', async () => {
      const logger = { log: vi.fn(), warn: vi.fn() };
      const exit = vi.fn();
      setupSignalHandlers({
        logger,
        exit,
        cleanup: () => {
          throw new Error('disk full');
        },
      });

      await createSignalHandler('SIGTERM')();

      expect(logger.warn).toHaveBeenCalledWith('Cleanup error: disk full');
      expect(exit).toHaveBeenCalledWith(143);
    });
  });

  describe('search progress', () => {
    it('updates only once a search has started', () => {
      updateSearchProgress({ currentVersion: '1.50.0' });
      expect(getSearchProgress()).toBeUndefined();

      setSearchProgress({ totalSteps: 3, completedChecks: [] });
      updateSearchProgress({ currentVersion: '1.50.0' });
      expect(getSearchProgress()).toEqual({
        totalSteps: 3,
        completedChecks: [],
        currentVersion: '1.50.0',
      });

      clearSearchProgress();
      expect(getSearchProgress()).toBeUndefined();
    });
  });

  describe('formatInterruptedMessage', () => {
    it('summarizes completed checks', () => {
      expect(
        formatInterruptedMessage({
          totalSteps: 7,
          completedChecks: [
            { version: '1.55.0', passed: false },
            { version: '1.58.0', passed: true },
          ],
        })
      ).toEqual(['Interrupted after 2 of at most 7 checks', '  (1.55.0 ✗, 1.58.0 ✓)']);
    });

    it('handles an interrupt before the first check', () => {
      expect(formatInterruptedMessage({ totalSteps: 4, completedChecks: [] })).toEqual([
        'Interrupted after 0 of at most 4 checks',
      ]);
    });
  });
});
