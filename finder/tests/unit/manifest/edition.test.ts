/**
 * Edition Tests
 */

import { describe, it, expect } from 'vitest';
import {
  editionMinimum,
  isEdition,
  parseVersionOrEdition,
} from '../../../src/manifest/edition.js';
import { threeComponent, twoComponent } from '../../../src/version/bare-version.js';

describe('editionMinimum', () => {
  it('maps each edition to the release introducing it', () => {
    expect(editionMinimum('2018')).toEqual(threeComponent(1, 31, 0));
    expect(editionMinimum('2021')).toEqual(threeComponent(1, 56, 0));
    expect(editionMinimum('2024')).toEqual(threeComponent(1, 85, 0));
  });

  it('has no bound for 2015 or unknown editions', () => {
    expect(editionMinimum('2015')).toBeUndefined();
    expect(editionMinimum('2030')).toBeUndefined();
  });
});

describe('isEdition', () => {
  it('only accepts known edition years', () => {
    expect(isEdition('2021')).toBe(true);
    expect(isEdition('2022')).toBe(false);
    expect(isEdition('toString')).toBe(false);
  });
});

describe('parseVersionOrEdition', () => {
  it('accepts an edition year', () => {
    expect(parseVersionOrEdition('2021')).toEqual({ ok: true, value: threeComponent(1, 56, 0) });
    expect(parseVersionOrEdition('2015')).toEqual({ ok: true, value: undefined });
  });

  it('accepts a bare version', () => {
    expect(parseVersionOrEdition('1.60')).toEqual({ ok: true, value: twoComponent(1, 60) });
  });

  it('rejects anything else', () => {
    const result = parseVersionOrEdition('2022');
    expect(!result.ok && result.error.message).toBe(
      "Unable to parse version '2022': couldn't find second component"
    );
  });
});
