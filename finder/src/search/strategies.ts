/**
 * Search algorithms over an ascending list of candidates.
 *
 * Both strategies drive a probe function that runs one check and answers
 * pass/fail. They return the index of the lowest passing candidate, or null when
 * no candidate passes. A probe error stops the search immediately.
 * @module search/strategies
 */

import { Ok, type Result } from '../types/result.js';

export type SearchStrategy = 'bisect' | 'linear';

/**
 * Runs the check for the candidate at `index` and reports whether it passed.
 */
export type Probe<E> = (index: number) => Promise<Result<boolean, E>>;

/**
 * Walks upward from the lowest candidate and stops at the first pass.
 * Makes at most `count` checks.
 */
export async function linearSearch<E>(
  count: number,
  probe: Probe<E>
): Promise<Result<number | null, E>> {
  for (let index = 0; index < count; index++) {
    const result = await probe(index);
    if (!result.ok) return result;
    if (result.value) return Ok(index);
  }
  return Ok(null);
}

/**
 * Halving search assuming the passing candidates form a contiguous suffix.
 *
 * The window [low, high] holds the answer, where `high === count` stands for
 * "nothing passes". A pass at the midpoint lowers `high` to it, a failure raises
 * `low` past it. Every index `high` takes below `count` was probed and passed, so
 * when the window closes the answer is known without probing it again. Makes at
 * most ceil(log2(count + 1)) checks.
 */
export async function bisectSearch<E>(
  count: number,
  probe: Probe<E>
): Promise<Result<number | null, E>> {
  if (count === 1) {
    const only = await probe(0);
    if (!only.ok) return only;
    return Ok(only.value ? 0 : null);
  }

  let low = 0;
  let high = count;

  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    const result = await probe(mid);
    if (!result.ok) return result;

    if (result.value) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }

  return Ok(low < count ? low : null);
}

/**
 * Most checks a strategy can make over `count` candidates.
 */
export function maxChecks(strategy: SearchStrategy, count: number): number {
  if (count <= 0) return 0;
  return strategy === 'linear' ? count : Math.ceil(Math.log2(count + 1));
}

export function runStrategy<E>(
  strategy: SearchStrategy,
  count: number,
  probe: Probe<E>
): Promise<Result<number | null, E>> {
  return strategy === 'linear' ? linearSearch(count, probe) : bisectSearch(count, probe);
}
