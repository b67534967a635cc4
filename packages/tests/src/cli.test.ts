import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect, LogLevel } from "effect";
import { ConfigError } from "@bytepair/core";
import { BpeTokenizer } from "@bytepair/tokenizers";
import {
  countOption,
  formatFailure,
  loadCliConfig,
  parseIds,
  readCorpus,
  requireOption,
  resolveLogLevel,
  roundTripLines,
  runWithSession,
  tokenizerOverrides,
} from "@bytepair/cli";

const text = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

let dir = "";

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "bytepair-cli-"));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function fixture(name: string, contents: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, contents);
  return path;
}

describe("readCorpus", () => {
  it("reads the whole file", async () => {
    const path = await fixture("corpus.txt", "hello world");
    expect(text(await Effect.runPromise(readCorpus(path)))).toBe("hello world");
  });

  it("truncates to maxCorpusBytes", async () => {
    const path = await fixture("long.txt", "hello world");
    const bytes = await Effect.runPromise(readCorpus(path, 5));
    expect(bytes.length).toBe(5);
    expect(text(bytes)).toBe("hello");
  });

  it("rejects an empty file", async () => {
    const path = await fixture("empty.txt", "");
    const err = await Effect.runPromise(Effect.flip(readCorpus(path)));
    expect(err._tag).toBe("CorpusError");
    expect(err.message).toBe(`Corpus ${path} is empty`);
  });

  it("reports a missing file", async () => {
    const path = join(dir, "nope.txt");
    const err = await Effect.runPromise(Effect.flip(readCorpus(path)));
    expect(err._tag).toBe("CorpusError");
    expect(err.message).toBe(`Error opening ${path}`);
  });
});

describe("loadCliConfig", () => {
  it("layers flags over the JSON file", async () => {
    const corpus = await fixture("layered.txt", "abc");
    const configPath = await fixture(
      "layered.json",
      JSON.stringify({ input: corpus, vocabSize: 512, specialTokens: ["<a>"] }),
    );
    const config = await Effect.runPromise(
      loadCliConfig({ config: configPath, vocabSize: "600", stopEarly: "true" }),
    );
    expect(config.input).toBe(corpus);
    expect(config.tokenizer).toEqual({
      maxVocabSize: 600,
      stopEarly: true,
      specialTokens: ["<a>"],
      maxCorpusBytes: 0,
    });
  });

  it("requires --input", async () => {
    const err = await Effect.runPromise(Effect.flip(loadCliConfig({})));
    expect(err._tag).toBe("ConfigError");
    expect(err.message).toBe("Missing required argument: --input (path to training text)");
  });

  it("rejects a config file that is not an object", async () => {
    const configPath = await fixture("array.json", "[1, 2]");
    const err = await Effect.runPromise(Effect.flip(loadCliConfig({ config: configPath })));
    expect(err.message).toBe(
      `Failed to load config "${configPath}": Error: Config file ${configPath} must contain a JSON object`,
    );
  });

  it("rejects an out-of-range vocab size from the flags", async () => {
    const err = await Effect.runPromise(Effect.flip(loadCliConfig({ input: "x.txt", vocabSize: "100" })));
    expect(err.message).toBe("maxVocabSize must be greater than 256, got 100");
  });
});

describe("tokenizerOverrides", () => {
  it("maps flag strings onto config fields", () => {
    expect(tokenizerOverrides({ vocabSize: "512", special: "<a>,<b>", stopEarly: "true" })).toEqual({
      maxVocabSize: 512,
      stopEarly: true,
      specialTokens: ["<a>", "<b>"],
    });
  });

  it("leaves unset fields out", () => {
    expect(tokenizerOverrides({})).toEqual({});
  });
});

describe("resolveLogLevel", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("lets --verbose win over --logLevel", () => {
    expect(resolveLogLevel({ verbose: "true", logLevel: "error" })).toBe(LogLevel.Debug);
  });

  it("reads --logLevel", () => {
    vi.stubEnv("BYTEPAIR_LOG_LEVEL", "error");
    expect(resolveLogLevel({ logLevel: "warn" })).toBe(LogLevel.Warning);
  });

  it("falls back to the environment", () => {
    vi.stubEnv("BYTEPAIR_LOG_LEVEL", "error");
    expect(resolveLogLevel({})).toBe(LogLevel.Error);
  });
});

describe("command options", () => {
  it("parses token ids", () => {
    expect(Effect.runSync(parseIds(["1", "2"]))).toEqual([1, 2]);
  });

  it("rejects negative and fractional ids", () => {
    expect(Effect.runSync(Effect.flip(parseIds(["1", "-1"]))).message).toBe('Invalid token id "-1"');
    expect(Effect.runSync(Effect.flip(parseIds(["1.5"]))).message).toBe('Invalid token id "1.5"');
  });

  it("requires a non-empty string option", () => {
    expect(Effect.runSync(requireOption({ text: "hi" }, "text", "text to encode"))).toBe("hi");
    const err = Effect.runSync(Effect.flip(requireOption({}, "text", "text to encode")));
    expect(err._tag).toBe("ConfigError");
    expect(err.message).toBe("Missing required argument: --text (text to encode)");
  });

  it("reads a count option with a default", () => {
    expect(Effect.runSync(countOption({}, "top", 10))).toBe(10);
    expect(Effect.runSync(countOption({ top: "3" }, "top", 10))).toBe(3);
    expect(Effect.runSync(Effect.flip(countOption({ top: "abc" }, "top", 10))).message).toBe(
      '--top must be a non-negative integer, got "abc"',
    );
    expect(Effect.runSync(Effect.flip(countOption({ top: "-2" }, "top", 10))).message).toBe(
      '--top must be a non-negative integer, got "-2"',
    );
  });
});

describe("failure reporting", () => {
  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it("formats a tagged error", () => {
    expect(formatFailure(new ConfigError({ message: "x" }))).toBe("Fatal: ConfigError: x");
  });

  it("reports a bad option before training", async () => {
    const errors: string[] = [];
    vi.spyOn(console, "error").mockImplementation((line: string) => {
      errors.push(line);
    });
    const corpus = await fixture("session.txt", "aaaa");
    const kv = { input: corpus, top: "abc" };
    let called = false;

    await runWithSession(kv, countOption(kv, "top", 10), () =>
      Effect.sync(() => {
        called = true;
      }),
    );

    expect(called).toBe(false);
    expect(errors).toEqual(['Fatal: ConfigError: --top must be a non-negative integer, got "abc"']);
    expect(process.exitCode).toBe(1);
  });
});

describe("roundTripLines", () => {
  it("prints the encoded ids and the decoded text", () => {
    const tok = Effect.runSync(BpeTokenizer.make(257));
    Effect.runSync(tok.train(new TextEncoder().encode("aaaa")));
    expect(roundTripLines(tok, "aaaa")).toEqual(["Encoded: 256 256", "Decoded: aaaa"]);
  });
});
