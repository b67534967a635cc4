/**
 * Ids -> bytes -> text.
 */
import { Effect } from "effect";
import type { UnknownTokenError } from "@bytepair/core";
import type { Vocabulary } from "./vocabulary.js";

const utf8 = new TextDecoder();

/** Concatenate the token bytes of every id. Fails on the first unknown id. */
export function decodeBytes(
  ids: ArrayLike<number>,
  vocab: Vocabulary,
): Effect.Effect<Uint8Array, UnknownTokenError> {
  return Effect.gen(function* () {
    const parts: Uint8Array[] = [];
    let length = 0;
    for (let i = 0; i < ids.length; i++) {
      const token = yield* vocab.tokenOf(ids[i]);
      parts.push(token);
      length += token.length;
    }
    const out = new Uint8Array(length);
    let offset = 0;
    for (const part of parts) {
      out.set(part, offset);
      offset += part.length;
    }
    return out;
  });
}

/**
 * Decode as one UTF-8 buffer, so characters split across tokens come back
 * whole.
 */
export function decodeText(
  ids: ArrayLike<number>,
  vocab: Vocabulary,
): Effect.Effect<string, UnknownTokenError> {
  return Effect.map(decodeBytes(ids, vocab), (bytes) => utf8.decode(bytes));
}
