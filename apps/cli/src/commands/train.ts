/**
 * Command: bytepair train
 *
 * Usage:
 *   bytepair train --input=data.txt --vocabSize=1000 [--stopEarly] [--verbose] [--top=10]
 *
 * Prints the merge count, final vocabulary size, fingerprint and the
 * longest learned tokens.
 */
import { Effect } from "effect";
import { formatToken } from "@bytepair/effect-runtime";
import { countOption } from "../config.js";
import { parseKV } from "../parse.js";
import { runWithSession } from "../session.js";

export async function trainCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  await runWithSession(kv, countOption(kv, "top", 10), ({ tokenizer, summary }, top) =>
    Effect.sync(() => {
      console.log(`merges: ${summary.mergeCount} | vocab_size: ${summary.vocabSize} | fingerprint: ${tokenizer.fingerprint()}`);
      const longest = [...summary.events]
        .sort((a, b) => b.token.length - a.token.length || a.id - b.id)
        .slice(0, top);
      for (const event of longest) {
        console.log(`  ${String(event.id).padStart(6)}  ${formatToken(event.token)}`);
      }
    }),
  );
}
