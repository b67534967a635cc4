/**
 * CLI configuration: flags and an optional JSON file, mapped onto
 * `TokenizerConfig`, plus the log level.
 */
import { Effect, type LogLevel } from "effect";
import { ConfigError, resolveTokenizerConfig, type TokenizerConfig } from "@bytepair/core";
import { parseLogLevel } from "@bytepair/effect-runtime";
import { loadConfig } from "./parse.js";

export interface CliConfig {
  readonly input: string;
  readonly tokenizer: TokenizerConfig;
  readonly logLevel: LogLevel.LogLevel;
}

function numberField(raw: Record<string, unknown>, key: string): number | undefined {
  const val = raw[key];
  if (val === undefined) return undefined;
  return typeof val === "number" ? val : Number(val);
}

function boolField(raw: Record<string, unknown>, key: string): boolean | undefined {
  const val = raw[key];
  if (val === undefined) return undefined;
  return val === true || val === "true" || val === "1";
}

function listField(raw: Record<string, unknown>, key: string): string[] | undefined {
  const val = raw[key];
  if (val === undefined) return undefined;
  if (Array.isArray(val)) return val.map(String);
  return String(val).split(",").filter((s) => s.length > 0);
}

/** Map raw key/value settings onto tokenizer overrides. */
export function tokenizerOverrides(raw: Record<string, unknown>): Partial<TokenizerConfig> {
  const maxVocabSize = numberField(raw, "vocabSize") ?? numberField(raw, "maxVocabSize");
  const stopEarly = boolField(raw, "stopEarly");
  const specialTokens = listField(raw, "special") ?? listField(raw, "specialTokens");
  const maxCorpusBytes = numberField(raw, "maxCorpusBytes");
  return {
    ...(maxVocabSize !== undefined ? { maxVocabSize } : {}),
    ...(stopEarly !== undefined ? { stopEarly } : {}),
    ...(specialTokens !== undefined ? { specialTokens } : {}),
    ...(maxCorpusBytes !== undefined ? { maxCorpusBytes } : {}),
  };
}

export function resolveLogLevel(raw: Record<string, unknown>): LogLevel.LogLevel {
  if (boolField(raw, "verbose")) return parseLogLevel("debug");
  const level = raw["logLevel"] ?? process.env.BYTEPAIR_LOG_LEVEL ?? "info";
  return parseLogLevel(String(level));
}

export function loadCliConfig(kv: Record<string, string>): Effect.Effect<CliConfig, ConfigError> {
  return Effect.gen(function* () {
    const raw = yield* Effect.tryPromise({
      try: () => loadConfig(kv),
      catch: (cause) =>
        new ConfigError({ message: `Failed to load config "${kv["config"]}": ${String(cause)}`, cause }),
    });
    const input = raw["input"];
    if (typeof input !== "string" || input.length === 0) {
      return yield* new ConfigError({ message: "Missing required argument: --input (path to training text)" });
    }
    const tokenizer = yield* resolveTokenizerConfig(tokenizerOverrides(raw));
    return { input, tokenizer, logLevel: resolveLogLevel(raw) };
  });
}

/** A non-empty string flag, e.g. `--text`. */
export function requireOption(
  kv: Record<string, string>,
  key: string,
  label: string,
): Effect.Effect<string, ConfigError> {
  const val = kv[key];
  return val
    ? Effect.succeed(val)
    : Effect.fail(new ConfigError({ message: `Missing required argument: --${key} (${label})` }));
}

/** A non-negative integer flag with a default, e.g. `--top`. */
export function countOption(
  kv: Record<string, string>,
  key: string,
  defaultVal: number,
): Effect.Effect<number, ConfigError> {
  const val = kv[key];
  if (val === undefined) return Effect.succeed(defaultVal);
  const n = Number(val);
  return Number.isInteger(n) && n >= 0
    ? Effect.succeed(n)
    : Effect.fail(new ConfigError({ message: `--${key} must be a non-negative integer, got "${val}"` }));
}
