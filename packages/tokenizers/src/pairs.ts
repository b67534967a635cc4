/**
 * Pair packing, counting and single-pass rewriting over id sequences.
 */
import { MAX_SUPPORTED_VOCAB_SIZE } from "@bytepair/core";

/** Every id is below the largest vocabulary size, so it is the key stride. */
export const PAIR_STRIDE = MAX_SUPPORTED_VOCAB_SIZE;

export function pairKey(left: number, right: number): number {
  return left * PAIR_STRIDE + right;
}

export function unpackPair(key: number): [number, number] {
  const left = Math.floor(key / PAIR_STRIDE);
  return [left, key - left * PAIR_STRIDE];
}

/** Count every adjacent pair (overlapping windows of size 2). */
export function countPairs(ids: readonly number[]): Map<number, number> {
  const counts = new Map<number, number>();
  for (let i = 0; i < ids.length - 1; i++) {
    const key = pairKey(ids[i], ids[i + 1]);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/**
 * Highest count wins; ties go to the smallest (left, right), which is the
 * smallest packed key. Returns null when there are no pairs.
 */
export function mostFrequentPair(
  counts: ReadonlyMap<number, number>,
): { key: number; count: number } | null {
  let bestKey = -1;
  let bestCount = 0;
  for (const [key, count] of counts) {
    if (count > bestCount || (count === bestCount && key < bestKey)) {
      bestCount = count;
      bestKey = key;
    }
  }
  return bestCount === 0 ? null : { key: bestKey, count: bestCount };
}

/**
 * Scan `ids` and replace every adjacent (left, right) with `newId`,
 * left to right and non-overlapping.
 */
export function applyMerge(
  ids: readonly number[],
  left: number,
  right: number,
  newId: number,
): number[] {
  const out: number[] = [];
  let i = 0;
  while (i < ids.length) {
    if (i < ids.length - 1 && ids[i] === left && ids[i + 1] === right) {
      out.push(newId);
      i += 2;
    } else {
      out.push(ids[i]);
      i += 1;
    }
  }
  return out;
}
