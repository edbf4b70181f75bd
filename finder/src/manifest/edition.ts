/**
 * Language editions and the first release supporting each.
 * @module manifest/edition
 */

import { Ok, type Result } from '../types/result.js';
import type { ValidationError } from '../types/errors.js';
import { parseBareVersion, threeComponent, type BareVersion } from '../version/bare-version.js';

/**
 * Releases introducing each edition. 2015 is supported by every release.
 */
const EDITION_MINIMUMS: Record<string, BareVersion | null> = {
  '2015': null,
  '2018': threeComponent(1, 31, 0),
  '2021': threeComponent(1, 56, 0),
  '2024': threeComponent(1, 85, 0),
};

export function isEdition(value: string): boolean {
  return Object.hasOwn(EDITION_MINIMUMS, value);
}

/**
 * Lowest release able to build the edition; undefined for 2015 and unknown editions.
 */
export function editionMinimum(edition: string): BareVersion | undefined {
  return EDITION_MINIMUMS[edition] ?? undefined;
}

/**
 * Parses a bound given either as a bare version or as an edition year.
 *
 * @example
 * ```ts
 * parseVersionOrEdition('2021'); // Ok(1.56.0)
 * parseVersionOrEdition('1.60'); // Ok(1.60)
 * ```
 */
export function parseVersionOrEdition(
  value: string
): Result<BareVersion | undefined, ValidationError> {
  if (isEdition(value)) {
    return Ok(editionMinimum(value));
  }
  return parseBareVersion(value);
}
