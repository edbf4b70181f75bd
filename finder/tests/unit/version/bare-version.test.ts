/**
 * Bare Version Tests
 */

import { describe, it, expect } from 'vitest';
import {
  MAX_COMPONENT,
  bareVersionsEqual,
  compareBareVersions,
  formatBareVersion,
  parseBareVersion,
  patchOf,
  threeComponent,
  twoComponent,
} from '../../../src/version/bare-version.js';
import { ValidationErrorCode } from '../../../src/types/errors.js';

function errorMessage(input: string): string {
  const result = parseBareVersion(input);
  if (result.ok) throw new Error(`expected '${input}' to be rejected`);
  return result.error.message;
}

describe('parseBareVersion', () => {
  it('parses a two-component version', () => {
    expect(parseBareVersion('1.56')).toEqual({ ok: true, value: twoComponent(1, 56) });
  });

  it('parses a three-component version', () => {
    expect(parseBareVersion('1.56.1')).toEqual({ ok: true, value: threeComponent(1, 56, 1) });
  });

  it('drops a pre-release identifier in the third component', () => {
    expect(parseBareVersion('1.56.0-nightly')).toEqual({
      ok: true,
      value: threeComponent(1, 56, 0),
    });
  });

  it('accepts zero components', () => {
    expect(parseBareVersion('0.0')).toEqual({ ok: true, value: twoComponent(0, 0) });
  });

  it('accepts the largest unsigned 64-bit component', () => {
    const result = parseBareVersion(`${MAX_COMPONENT}.0`);
    expect(result.ok && result.value.major).toBe(MAX_COMPONENT);
  });

  it('rejects a component beyond 64 bits', () => {
    expect(errorMessage('18446744073709551616.0')).toBe(
      "Unable to parse version '18446744073709551616.0': first component '18446744073709551616' is too large"
    );
  });

  it('rejects an empty string', () => {
    expect(errorMessage('')).toBe("Unable to parse version '': couldn't find first component");
  });

  it('rejects a single component', () => {
    expect(errorMessage('1')).toBe("Unable to parse version '1': couldn't find second component");
  });

  it('rejects a non-numeric component', () => {
    expect(errorMessage('1.x')).toBe(
      "Unable to parse version '1.x': second component 'x' is not a number"
    );
  });

  it('rejects a leading v', () => {
    expect(errorMessage('v1.56')).toBe(
      "Unable to parse version 'v1.56': first component 'v1' is not a number"
    );
  });

  it('rejects a fourth component', () => {
    expect(errorMessage('1.56.0.0')).toBe(
      "Unable to parse version '1.56.0.0': unexpected tokens at the end of version number: '0'"
    );
  });

  it('rejects a pre-release identifier containing a dot', () => {
    expect(errorMessage('0.0.0-beta.0')).toBe(
      "Unable to parse version '0.0.0-beta.0': unexpected tokens at the end of version number: '0'"
    );
  });

  it('rejects an empty patch before a pre-release identifier', () => {
    expect(errorMessage('1.56.-beta')).toBe(
      "Unable to parse version '1.56.-beta': third component '' is not a number"
    );
  });

  it('drops build metadata that follows a pre-release identifier', () => {
    expect(parseBareVersion('0.0.0-anything+build')).toEqual({
      ok: true,
      value: threeComponent(0, 0, 0),
    });
  });

  it.each([
    ['-1.0.0', "first component '-1' is not a number"],
    ['0.-1.0', "second component '-1' is not a number"],
    ['0.0.-1', "third component '' is not a number"],
    ['0.0.0+some', "third component '0+some' is not a number"],
    ['1.1-nightly', "second component '1-nightly' is not a number"],
    ['1.', "second component '' is not a number"],
    ['1.1.', "third component '' is not a number"],
    ['1.1.1.', "unexpected tokens at the end of version number: ''"],
    ['0.18446744073709551616', "second component '18446744073709551616' is too large"],
    ['0.0.18446744073709551616', "third component '18446744073709551616' is too large"],
  ])('rejects %s', (input, reason) => {
    expect(errorMessage(input)).toBe(`Unable to parse version '${input}': ${reason}`);
  });

  it('reports the invalid version code with the input as context', () => {
    const result = parseBareVersion('1.x');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ValidationErrorCode.INVALID_VERSION);
      expect(result.error.context).toEqual({ field: 'version', value: '1.x', token: 'x' });
    }
  });
});

describe('ordering', () => {
  it('treats a missing patch as 0', () => {
    expect(compareBareVersions(twoComponent(1, 56), threeComponent(1, 56, 0))).toBe(0);
    expect(patchOf(twoComponent(1, 56))).toBe(0n);
  });

  it('orders component-wise', () => {
    expect(compareBareVersions(twoComponent(1, 9), twoComponent(1, 10))).toBe(-1);
    expect(compareBareVersions(threeComponent(2, 0, 0), threeComponent(1, 99, 9))).toBe(1);
    expect(compareBareVersions(threeComponent(1, 56, 1), twoComponent(1, 56))).toBe(1);
  });

  it('keeps two- and three-component versions structurally distinct', () => {
    expect(bareVersionsEqual(twoComponent(1, 56), threeComponent(1, 56, 0))).toBe(false);
    expect(bareVersionsEqual(twoComponent(1, 56), twoComponent(1, 56))).toBe(true);
  });
});

describe('formatBareVersion', () => {
  it('keeps the number of components', () => {
    expect(formatBareVersion(twoComponent(1, 56))).toBe('1.56');
    expect(formatBareVersion(threeComponent(1, 56, 0))).toBe('1.56.0');
  });
});
