/**
 * Corpus byte source for the CLI.
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { CorpusError } from "@bytepair/core";

/** Read a file as raw bytes, truncated to `maxBytes` when that is > 0. */
export function readCorpus(path: string, maxBytes = 0): Effect.Effect<Uint8Array, CorpusError> {
  return Effect.gen(function* () {
    const buf = yield* Effect.tryPromise({
      try: () => readFile(path),
      catch: (cause) => new CorpusError({ message: `Error opening ${path}`, cause }),
    });
    if (buf.length === 0) {
      return yield* new CorpusError({ message: `Corpus ${path} is empty` });
    }
    const bytes = new Uint8Array(buf.buffer, buf.byteOffset, buf.length);
    return maxBytes > 0 && bytes.length > maxBytes ? bytes.subarray(0, maxBytes) : bytes;
  });
}
