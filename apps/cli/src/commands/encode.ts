/**
 * Command: bytepair encode / bytepair decode
 *
 * Usage:
 *   bytepair encode --input=data.txt --text="Hello<|endoftext|>"
 *   bytepair decode --input=data.txt --ids=72,101,256
 */
import { Effect } from "effect";
import { ConfigError } from "@bytepair/core";
import { requireOption } from "../config.js";
import { parseKV, listArg } from "../parse.js";
import { runWithSession } from "../session.js";

export async function encodeCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  await runWithSession(kv, requireOption(kv, "text", "text to encode"), ({ tokenizer }, text) =>
    Effect.sync(() => {
      console.log(tokenizer.encode(text).join(" "));
    }),
  );
}

export function parseIds(raw: readonly string[]): Effect.Effect<number[], ConfigError> {
  const ids = raw.map(Number);
  const bad = raw.find((_, i) => !Number.isInteger(ids[i]) || ids[i] < 0);
  return bad === undefined
    ? Effect.succeed(ids)
    : Effect.fail(new ConfigError({ message: `Invalid token id "${bad}"` }));
}

export async function decodeCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const raw = listArg(kv, "ids") ?? [];
  await runWithSession(kv, parseIds(raw), ({ tokenizer }, ids) =>
    tokenizer.decode(ids).pipe(Effect.map((text) => console.log(text))),
  );
}
