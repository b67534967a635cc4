import { describe, it, expect } from "vitest";
import { MAX_SUPPORTED_VOCAB_SIZE } from "@bytepair/core";
import {
  PAIR_STRIDE,
  applyMerge,
  countPairs,
  mostFrequentPair,
  pairKey,
  unpackPair,
} from "@bytepair/tokenizers";

describe("pair helpers", () => {
  it("packs and unpacks pairs", () => {
    expect(unpackPair(pairKey(300, 7))).toEqual([300, 7]);
    expect(unpackPair(pairKey(0, 0))).toEqual([0, 0]);
  });

  it("packs with the largest supported vocabulary size as stride", () => {
    expect(PAIR_STRIDE).toBe(MAX_SUPPORTED_VOCAB_SIZE);
    const top = MAX_SUPPORTED_VOCAB_SIZE - 1;
    expect(unpackPair(pairKey(top, top))).toEqual([top, top]);
    expect(pairKey(1, 0)).toBe(MAX_SUPPORTED_VOCAB_SIZE);
  });

  it("counts overlapping windows", () => {
    const counts = countPairs([1, 1, 1, 2]);
    expect(counts.get(pairKey(1, 1))).toBe(2);
    expect(counts.get(pairKey(1, 2))).toBe(1);
    expect(counts.size).toBe(2);
  });

  it("has no pairs for short sequences", () => {
    expect(mostFrequentPair(countPairs([]))).toBeNull();
    expect(mostFrequentPair(countPairs([42]))).toBeNull();
  });

  it("prefers the higher count", () => {
    const counts = new Map([
      [pairKey(1, 2), 2],
      [pairKey(9, 9), 5],
    ]);
    expect(mostFrequentPair(counts)).toEqual({ key: pairKey(9, 9), count: 5 });
  });

  it("breaks ties by the smallest pair", () => {
    const counts = new Map([
      [pairKey(5, 1), 2],
      [pairKey(2, 9), 2],
      [pairKey(2, 3), 2],
    ]);
    expect(mostFrequentPair(counts)?.key).toBe(pairKey(2, 3));
  });

  it("rewrites left to right without overlap", () => {
    expect(applyMerge([1, 1, 1], 1, 1, 9)).toEqual([9, 1]);
    expect(applyMerge([1, 1, 1, 1], 1, 1, 9)).toEqual([9, 9]);
    expect(applyMerge([2, 1, 1, 3], 1, 1, 9)).toEqual([2, 9, 3]);
    expect(applyMerge([], 1, 1, 9)).toEqual([]);
  });
});
