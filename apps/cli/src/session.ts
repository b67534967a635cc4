/**
 * Shared setup for every command: load config, read the corpus, train,
 * then register the special tokens.
 */
import { Effect, Either } from "effect";
import type { ConfigError, CorpusError, SpecialTokenConflictError, TrainSummary } from "@bytepair/core";
import { BpeTokenizer } from "@bytepair/tokenizers";
import { LoggingMergeSink, prettyLoggerLayer, withSpan } from "@bytepair/effect-runtime";
import { loadCliConfig, type CliConfig } from "./config.js";
import { readCorpus } from "./corpus.js";

export interface Session {
  readonly config: CliConfig;
  readonly tokenizer: BpeTokenizer;
  readonly summary: TrainSummary;
}

export type SessionError = ConfigError | CorpusError | SpecialTokenConflictError;

export function trainSession(config: CliConfig): Effect.Effect<Session, SessionError> {
  const program = Effect.gen(function* () {
    const { tokenizer: tc } = config;
    yield* Effect.logInfo(`Opening ${config.input}`);
    const corpus = yield* readCorpus(config.input, tc.maxCorpusBytes);
    yield* Effect.logInfo(`Corpus size: ${corpus.length} bytes`);

    const tokenizer = yield* BpeTokenizer.make(tc.maxVocabSize);
    const summary = yield* tokenizer.train(corpus, { stopEarly: tc.stopEarly });
    yield* Effect.logInfo(
      `Training complete: ${summary.mergeCount} merges performed. Final vocabulary size: ${summary.vocabSize}`,
    );

    for (const token of tc.specialTokens) {
      const id = yield* tokenizer.registerSpecial(token);
      yield* Effect.logInfo(`Added special token ${token} with id ${id}`);
    }
    yield* Effect.logDebug(`Vocabulary fingerprint: ${tokenizer.fingerprint()}`);
    return { config, tokenizer, summary };
  });
  return withSpan("cli.session", program).pipe(Effect.provide(LoggingMergeSink));
}

export interface TaggedFailure {
  readonly _tag: string;
  readonly message: string;
}

export const formatFailure = (err: TaggedFailure): string => `Fatal: ${err._tag}: ${err.message}`;

/**
 * Validate config and command options, train, and hand both to `use`.
 * Every tagged failure is reported as `Fatal: <tag>: <message>` and sets
 * exit code 1. Options are checked before any training starts.
 */
export async function runWithSession<O, E extends TaggedFailure>(
  kv: Record<string, string>,
  options: Effect.Effect<O, ConfigError>,
  use: (session: Session, options: O) => Effect.Effect<void, E>,
): Promise<void> {
  const setup = await Effect.runPromise(Effect.either(Effect.all([loadCliConfig(kv), options])));
  if (Either.isLeft(setup)) {
    console.error(formatFailure(setup.left));
    process.exitCode = 1;
    return;
  }

  const [config, opts] = setup.right;
  const program = trainSession(config).pipe(
    Effect.flatMap((session) => use(session, opts)),
    Effect.catchAll((err) =>
      Effect.logError(formatFailure(err)).pipe(
        Effect.andThen(Effect.sync(() => {
          process.exitCode = 1;
        })),
      ),
    ),
  );
  await Effect.runPromise(program.pipe(Effect.provide(prettyLoggerLayer(config.logLevel))));
}
