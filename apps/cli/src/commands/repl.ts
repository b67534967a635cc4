/**
 * Command: bytepair repl
 *
 * Trains on the corpus, then encodes and decodes each line typed at the
 * prompt until "q".
 */
import * as readline from "node:readline";
import { Effect, Either } from "effect";
import type { BpeTokenizer } from "@bytepair/tokenizers";
import { parseKV } from "../parse.js";
import { runWithSession } from "../session.js";

const PROMPT = "\nEnter text to encode (or 'q' to quit): ";

/** Encode/decode one line into the two output lines. */
export function roundTripLines(tokenizer: BpeTokenizer, line: string): string[] {
  const encoded = tokenizer.encode(line);
  const decoded = Effect.runSync(Effect.either(tokenizer.decode(encoded)));
  return [
    `Encoded: ${encoded.join(" ")}`,
    Either.isRight(decoded) ? `Decoded: ${decoded.right}` : `Decode failed: ${decoded.left.message}`,
  ];
}

async function promptLoop(tokenizer: BpeTokenizer): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, terminal: false });
  process.stdout.write(PROMPT);
  try {
    for await (const line of rl) {
      if (line === "q") break;
      for (const out of roundTripLines(tokenizer, line)) console.log(out);
      process.stdout.write(PROMPT);
    }
  } finally {
    rl.close();
  }
}

export async function replCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  await runWithSession(kv, Effect.void, ({ tokenizer }) => Effect.promise(() => promptLoop(tokenizer)));
}
