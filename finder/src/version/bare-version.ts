/**
 * Bare version parsing and ordering.
 * A bare version is what a project manifest declares ("1.56", "1.56.0"), before it is
 * reconciled with a concrete release.
 * @module version/bare-version
 */

import { Err, Ok, type Result } from '../types/result.js';
import { ValidationError, ValidationErrorCode } from '../types/errors.js';

/**
 * Components are unsigned 64-bit values, so they are held as bigint.
 */
export type BareVersion =
  | { readonly kind: 'two-component'; readonly major: bigint; readonly minor: bigint }
  | {
      readonly kind: 'three-component';
      readonly major: bigint;
      readonly minor: bigint;
      readonly patch: bigint;
    };

/** Largest value an unsigned 64-bit component may hold */
export const MAX_COMPONENT = 18446744073709551615n;

const NUMERIC = /^\d+$/;

/**
 * Creates a two-component version (major.minor).
 */
export function twoComponent(major: bigint | number, minor: bigint | number): BareVersion {
  return { kind: 'two-component', major: BigInt(major), minor: BigInt(minor) };
}

/**
 * Creates a three-component version (major.minor.patch).
 */
export function threeComponent(
  major: bigint | number,
  minor: bigint | number,
  patch: bigint | number
): BareVersion {
  return {
    kind: 'three-component',
    major: BigInt(major),
    minor: BigInt(minor),
    patch: BigInt(patch),
  };
}

function invalid(input: string, message: string, token?: string): ValidationError {
  return new ValidationError(
    `Unable to parse version '${input}': ${message}`,
    ValidationErrorCode.INVALID_VERSION,
    { field: 'version', value: input, token }
  );
}

function parseComponent(
  input: string,
  token: string,
  position: string
): Result<bigint, ValidationError> {
  if (!NUMERIC.test(token)) {
    return Err(invalid(input, `${position} component '${token}' is not a number`, token));
  }

  const value = BigInt(token);
  if (value > MAX_COMPONENT) {
    return Err(invalid(input, `${position} component '${token}' is too large`, token));
  }

  return Ok(value);
}

/**
 * Parses a bare version string.
 *
 * Exactly two or three dot-separated numeric components are accepted. Text after a
 * `-` in the third component is a pre-release identifier and is dropped.
 *
 * @example
 * ```ts
 * parseBareVersion('1.56'); // Ok(two-component 1.56)
 * parseBareVersion('1.56.0-nightly'); // Ok(three-component 1.56.0)
 * parseBareVersion('1.56.0.0'); // Err: unexpected tokens '0'
 * ```
 */
export function parseBareVersion(input: string): Result<BareVersion, ValidationError> {
  const [first, second, third, ...rest] = input.split('.');

  if (first === undefined || first === '') {
    return Err(invalid(input, "couldn't find first component", first));
  }
  const major = parseComponent(input, first, 'first');
  if (!major.ok) return major;

  if (second === undefined) {
    return Err(invalid(input, "couldn't find second component"));
  }
  const minor = parseComponent(input, second, 'second');
  if (!minor.ok) return minor;

  let version: BareVersion;
  if (third === undefined) {
    version = twoComponent(major.value, minor.value);
  } else {
    const preReleaseStart = third.indexOf('-');
    const patchToken = preReleaseStart === -1 ? third : third.slice(0, preReleaseStart);
    const patch = parseComponent(input, patchToken, 'third');
    if (!patch.ok) return patch;
    version = threeComponent(major.value, minor.value, patch.value);
  }

  const [unexpected] = rest;
  if (unexpected !== undefined) {
    return Err(
      invalid(input, `unexpected tokens at the end of version number: '${unexpected}'`, unexpected)
    );
  }

  return Ok(version);
}

/**
 * Patch component, with a two-component version counting as patch 0.
 */
export function patchOf(version: BareVersion): bigint {
  return version.kind === 'three-component' ? version.patch : 0n;
}

/**
 * Compares two bare versions component-wise; a missing patch orders as 0.
 *
 * @returns -1 if a < b, 0 if equal, 1 if a > b
 */
export function compareBareVersions(a: BareVersion, b: BareVersion): -1 | 0 | 1 {
  return compareComponents([a.major, a.minor, patchOf(a)], [b.major, b.minor, patchOf(b)]);
}

/**
 * Compares two (major, minor, patch) triples.
 */
export function compareComponents(
  a: readonly [bigint, bigint, bigint],
  b: readonly [bigint, bigint, bigint]
): -1 | 0 | 1 {
  for (let i = 0; i < 3; i++) {
    const left = a[i] ?? 0n;
    const right = b[i] ?? 0n;
    if (left !== right) {
      return left > right ? 1 : -1;
    }
  }
  return 0;
}

/**
 * Structural equality: "1.56" and "1.56.0" are different bare versions.
 */
export function bareVersionsEqual(a: BareVersion, b: BareVersion): boolean {
  return a.kind === b.kind && compareBareVersions(a, b) === 0;
}

export function formatBareVersion(version: BareVersion): string {
  switch (version.kind) {
    case 'two-component':
      return `${version.major}.${version.minor}`;
    case 'three-component':
      return `${version.major}.${version.minor}.${version.patch}`;
  }
}
