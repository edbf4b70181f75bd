/**
 * Run Options Tests
 */

import { describe, it, expect } from 'vitest';
import { parseRunOptions } from '../../../../src/cli/options/run-options.js';

describe('parseRunOptions', () => {
  it('fills defaults and leaves unset flags undefined', () => {
    const result = parseRunOptions({});

    expect(result).toEqual({
      ok: true,
      value: {
        path: '.',
        target: undefined,
        min: undefined,
        max: undefined,
        includeAllPatchReleases: undefined,
        linear: undefined,
        ignoreLockfile: undefined,
        outputToolchainFile: false,
        readMinEdition: true,
        outputFormat: 'human',
        log: true,
        logLevel: 'info',
        logFile: undefined,
        noColor: false,
        command: undefined,
      },
    });
  });

  it('maps negated flags', () => {
    const result = parseRunOptions({ color: false, log: false, readMinEdition: false });

    expect(result.ok && result.value).toMatchObject({
      noColor: true,
      log: false,
      readMinEdition: false,
    });
  });

  it('keeps the check command', () => {
    const result = parseRunOptions({}, ['cargo', 'check', '--tests']);

    expect(result.ok && result.value.command).toEqual(['cargo', 'check', '--tests']);
  });

  it('accepts an edition year as the lower bound', () => {
    const result = parseRunOptions({ min: '2021', max: '1.70' });

    expect(result.ok && result.value).toMatchObject({ min: '2021', max: '1.70' });
  });

  it('rejects an unknown output format', () => {
    const result = parseRunOptions({ outputFormat: 'xml' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('VALIDATION_INVALID_INPUT');
      expect(result.error.message).toBe(
        'Invalid output format: xml. Valid formats: human, json, none'
      );
    }
  });

  it('rejects an unknown log level', () => {
    const result = parseRunOptions({ logLevel: 'trace' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        'Invalid log level: trace. Valid levels: debug, info, warn, error'
      );
    }
  });

  it('rejects a malformed bound', () => {
    const min = parseRunOptions({ min: 'one' });
    const max = parseRunOptions({ max: '2021' });

    expect(!min.ok && min.error.code).toBe('VALIDATION_INVALID_VERSION');
    expect(!max.ok && max.error.code).toBe('VALIDATION_INVALID_VERSION');
  });

  it('rejects an empty target', () => {
    const result = parseRunOptions({ target: '  ' });

    expect(!result.ok && result.error.context).toEqual({ field: 'target', value: '  ' });
  });
});
