/**
 * Version Matcher Tests
 */

import { describe, it, expect } from 'vitest';
import { matchRelease, toTildeRequirement } from '../../../src/version/matcher.js';
import { ResolutionErrorCode } from '../../../src/types/errors.js';
import { threeComponent, twoComponent } from '../../../src/version/bare-version.js';
import { catalogOf } from '../../helpers/releases.js';

const CATALOG = catalogOf('1.54.1', '1.55.0', '1.54.2', '1.53.0');

describe('toTildeRequirement', () => {
  it('prefixes the version with a tilde', () => {
    expect(toTildeRequirement(twoComponent(1, 54))).toBe('~1.54');
    expect(toTildeRequirement(threeComponent(1, 54, 1))).toBe('~1.54.1');
  });
});

describe('matchRelease', () => {
  it('matches the newest patch of a two-component version', () => {
    const result = matchRelease(twoComponent(1, 54), CATALOG.descending());
    expect(result.ok && result.value.version.version).toBe('1.54.2');
  });

  it('matches a later patch for a three-component version', () => {
    const result = matchRelease(threeComponent(1, 54, 1), CATALOG.descending());
    expect(result.ok && result.value.version.version).toBe('1.54.2');
  });

  it('returns the first match in iteration order', () => {
    const result = matchRelease(twoComponent(1, 54), CATALOG.ascending());
    expect(result.ok && result.value.version.version).toBe('1.54.1');
  });

  it('fails with the available versions when nothing matches', () => {
    const result = matchRelease(twoComponent(1, 56), CATALOG.descending());
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ResolutionErrorCode.NO_MATCHING_RELEASE);
      expect(result.error.message).toBe('No released version matches the requirement ~1.56');
      expect(result.error.context['available']).toEqual(['1.55.0', '1.54.2', '1.54.1', '1.53.0']);
    }
  });

  it('does not match a patch below a three-component version', () => {
    const result = matchRelease(threeComponent(1, 53, 1), CATALOG.descending());
    expect(result.ok).toBe(false);
  });
});
