import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { defaultTokenizerConfig, fnv1a, resolveTokenizerConfig } from "@bytepair/core";

describe("resolveTokenizerConfig", () => {
  it("fills in defaults", () => {
    const config = Effect.runSync(resolveTokenizerConfig());
    expect(config).toEqual(defaultTokenizerConfig);
    expect(config.maxVocabSize).toBe(1000);
    expect(config.specialTokens).toEqual(["<|endoftext|>"]);
  });

  it("applies overrides", () => {
    const config = Effect.runSync(resolveTokenizerConfig({ maxVocabSize: 512, stopEarly: true }));
    expect(config.maxVocabSize).toBe(512);
    expect(config.stopEarly).toBe(true);
    expect(config.maxCorpusBytes).toBe(0);
  });

  it("rejects a vocab size of 256", () => {
    const err = Effect.runSync(Effect.flip(resolveTokenizerConfig({ maxVocabSize: 256 })));
    expect(err._tag).toBe("ConfigError");
    expect(err.message).toBe("maxVocabSize must be greater than 256, got 256");
  });

  it("rejects a non-numeric vocab size", () => {
    const err = Effect.runSync(Effect.flip(resolveTokenizerConfig({ maxVocabSize: Number("abc") })));
    expect(err.message).toBe("maxVocabSize must be an integer, got NaN");
  });

  it("rejects a negative corpus limit", () => {
    const err = Effect.runSync(Effect.flip(resolveTokenizerConfig({ maxCorpusBytes: -1 })));
    expect(err.message).toBe("maxCorpusBytes must be a non-negative integer, got -1");
  });

  it("rejects empty special tokens", () => {
    const err = Effect.runSync(Effect.flip(resolveTokenizerConfig({ specialTokens: ["<s>", ""] })));
    expect(err.message).toBe("specialTokens[1] must not be empty");
  });
});

describe("fnv1a", () => {
  it("hashes to eight hex digits", () => {
    expect(fnv1a("")).toBe("811c9dc5");
    expect(fnv1a("a")).toBe("e40c292c");
  });
});
