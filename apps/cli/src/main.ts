#!/usr/bin/env -S npx tsx
/**
 * bytepair CLI — the main entry point.
 *
 * Commands: train, encode, decode, repl
 */
import { existsSync, readFileSync } from "node:fs";

// Load .env.local (no dotenv dependency)
if (existsSync(".env.local")) {
  const envContent = readFileSync(".env.local", "utf8");
  for (const line of envContent.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq < 0) continue;
    const key = trimmed.slice(0, eq).trim();
    const val = trimmed.slice(eq + 1).trim().replace(/^["']|["']$/g, "");
    if (!process.env[key]) process.env[key] = val;
  }
}
import { trainCmd } from "./commands/train.js";
import { encodeCmd, decodeCmd } from "./commands/encode.js";
import { replCmd } from "./commands/repl.js";

const USAGE = `
bytepair — byte-level BPE tokenizer trainer

Commands:
  train            Learn merges from a corpus and print a summary
  encode           Train, then encode --text
  decode           Train, then decode --ids
  repl             Train, then encode/decode lines interactively

Options:
  --input=PATH          Corpus file (required)
  --vocabSize=N         Target vocabulary size, > 256 (default 1000)
  --stopEarly           Stop once the best pair occurs only once
  --special=A,B         Special tokens (default <|endoftext|>)
  --maxCorpusBytes=N    Truncate the corpus
  --config=PATH         JSON file with any of the above
  --logLevel=LEVEL      debug | info | warn | error (env BYTEPAIR_LOG_LEVEL)
  --verbose             Log every merge
  --top=N               train: how many of the longest tokens to print (default 10)
  --help, -h            Show this help

Examples:
  bytepair train --input=data.txt --vocabSize=1000 --verbose
  bytepair encode --input=data.txt --text="hello world"
  bytepair repl --input=data.txt
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "train") {
    await trainCmd(args.slice(1));
  } else if (command === "encode") {
    await encodeCmd(args.slice(1));
  } else if (command === "decode") {
    await decodeCmd(args.slice(1));
  } else if (command === "repl") {
    await replCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
