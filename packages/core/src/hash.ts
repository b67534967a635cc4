/**
 * Vocabulary fingerprinting for reproducibility checks.
 * Uses a basic FNV-1a hash — no crypto needed.
 */
import type { MergeRule } from "./interfaces.js";

export function fnv1a(text: string): string {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0).toString(16).padStart(8, "0");
}

/** Hash merge rules (in creation order) and special tokens (sorted by id). */
export function fingerprintVocabulary(
  merges: readonly MergeRule[],
  specials: ReadonlyMap<string, number>,
): string {
  const rules = merges.map((m) => `${m.left},${m.right}>${m.id}`).join(";");
  const special = [...specials]
    .sort((a, b) => a[1] - b[1])
    .map(([token, id]) => `${JSON.stringify(token)}=${id}`)
    .join(";");
  return fnv1a(`${rules}|${special}`);
}
