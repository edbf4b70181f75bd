/**
 * Outcome of a fallible step of a run.
 *
 * Version parsing, manifest reading, release resolution and toolchain
 * installation return a Result instead of throwing; the caller decides what an
 * error means for the run.
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * @example
 * ```typescript
 * return Ok(release);
 * ```
 */
export function Ok<const T>(value: T): Result<T, never> {
  return { ok: true, value } as const;
}

/**
 * @example
 * ```typescript
 * return Err(new ValidationError('bad version', ValidationErrorCode.INVALID_VERSION, context));
 * ```
 */
export function Err<const E>(error: E): Result<never, E> {
  return { ok: false, error } as const;
}

/**
 * Settles a promise into a Result; `mapError` converts the rejection reason.
 *
 * @example
 * ```typescript
 * const content = await fromPromise(readFile(path, 'utf-8'), (error) =>
 *   new ConfigError(`Unable to read ${path}`, ConfigErrorCode.PARSE_ERROR, { path })
 * );
 * ```
 */
export async function fromPromise<T, E>(
  promise: Promise<T>,
  mapError: (error: unknown) => E
): Promise<Result<T, E>> {
  try {
    return Ok(await promise);
  } catch (error) {
    return Err(mapError(error));
  }
}
