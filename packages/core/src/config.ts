/**
 * Tokenizer configuration: defaults, merging and validation.
 */
import { Effect } from "effect";
import { ConfigError } from "./errors.js";
import { BYTE_VOCAB_SIZE } from "./interfaces.js";

/**
 * Largest vocabulary size. Also the stride of a packed pair key
 * (left * 2^26 + right), which keeps every key a safe integer.
 */
export const MAX_SUPPORTED_VOCAB_SIZE = 2 ** 26;

export interface TokenizerConfig {
  readonly maxVocabSize: number;
  readonly stopEarly: boolean;
  readonly specialTokens: readonly string[];
  /** Truncate the corpus to this many bytes. 0 disables truncation. */
  readonly maxCorpusBytes: number;
}

export const defaultTokenizerConfig: TokenizerConfig = {
  maxVocabSize: 1000,
  stopEarly: false,
  specialTokens: ["<|endoftext|>"],
  maxCorpusBytes: 0,
};

/** Check that a vocabulary size leaves room for at least one merge. */
export function validateVocabSize(maxVocabSize: number): Effect.Effect<number, ConfigError> {
  if (!Number.isInteger(maxVocabSize)) {
    return Effect.fail(new ConfigError({ message: `maxVocabSize must be an integer, got ${maxVocabSize}` }));
  }
  if (maxVocabSize <= BYTE_VOCAB_SIZE) {
    return Effect.fail(
      new ConfigError({ message: `maxVocabSize must be greater than ${BYTE_VOCAB_SIZE}, got ${maxVocabSize}` }),
    );
  }
  if (maxVocabSize > MAX_SUPPORTED_VOCAB_SIZE) {
    return Effect.fail(
      new ConfigError({ message: `maxVocabSize must be <= ${MAX_SUPPORTED_VOCAB_SIZE}, got ${maxVocabSize}` }),
    );
  }
  return Effect.succeed(maxVocabSize);
}

/** Merge overrides onto the defaults and validate the result. */
export function resolveTokenizerConfig(
  overrides: Partial<TokenizerConfig> = {},
): Effect.Effect<TokenizerConfig, ConfigError> {
  const config: TokenizerConfig = { ...defaultTokenizerConfig, ...overrides };
  return Effect.gen(function* () {
    yield* validateVocabSize(config.maxVocabSize);
    if (!Number.isInteger(config.maxCorpusBytes) || config.maxCorpusBytes < 0) {
      return yield* new ConfigError({
        message: `maxCorpusBytes must be a non-negative integer, got ${config.maxCorpusBytes}`,
      });
    }
    const empty = config.specialTokens.findIndex((t) => t.length === 0);
    if (empty >= 0) {
      return yield* new ConfigError({ message: `specialTokens[${empty}] must not be empty` });
    }
    return config;
  });
}
