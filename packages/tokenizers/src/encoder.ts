/**
 * Text -> ids.
 *
 * Special literals are cut out first; every other span is UTF-8 encoded and
 * merged to a fixpoint. Each pass applies whichever known pair it meets
 * first in scan order, not the pairs in learn order.
 */
import type { Vocabulary } from "./vocabulary.js";
import type { SpecialTokenMatcher } from "./special.js";

const utf8 = new TextEncoder();

/** One left-to-right, non-overlapping pass over every known merge. */
function mergePass(ids: readonly number[], vocab: Vocabulary): { ids: number[]; changed: boolean } {
  const out: number[] = [];
  let changed = false;
  let i = 0;
  while (i < ids.length) {
    const merged = i < ids.length - 1 ? vocab.idOfPair(ids[i], ids[i + 1]) : undefined;
    if (merged !== undefined) {
      out.push(merged);
      changed = true;
      i += 2;
    } else {
      out.push(ids[i]);
      i += 1;
    }
  }
  return { ids: out, changed };
}

/** Repeat merge passes until one makes no substitution. */
export function applyKnownMerges(ids: number[], vocab: Vocabulary): number[] {
  if (!vocab.hasMerges) return ids;
  let current = ids;
  for (;;) {
    const pass = mergePass(current, vocab);
    if (!pass.changed) return current;
    current = pass.ids;
  }
}

export function encodeBytes(bytes: Uint8Array, vocab: Vocabulary): number[] {
  return applyKnownMerges(Array.from(bytes), vocab);
}

/**
 * Input is assumed to be well-formed UTF-16: a lone surrogate is encoded as
 * U+FFFD and will not come back from `decode`.
 */
export function encodeText(text: string, vocab: Vocabulary, specials: SpecialTokenMatcher): number[] {
  const ids: number[] = [];
  for (const segment of specials.split(text)) {
    if (segment.kind === "special") {
      ids.push(segment.id);
    } else {
      // Spans can be far longer than the call-argument limit, so no spread.
      for (const id of encodeBytes(utf8.encode(segment.text), vocab)) ids.push(id);
    }
  }
  return ids;
}
