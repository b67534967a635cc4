/**
 * Byte-level byte-pair encoding tokenizer.
 *
 * Starts from the 256 byte identities and iteratively merges the most
 * frequent adjacent pair until the target vocab size is reached. Special
 * tokens share the same id counter and are matched verbatim at encode-time.
 */
import { Effect } from "effect";
import {
  validateVocabSize,
  type ConfigError,
  type MergeRule,
  type SpecialTokenConflictError,
  type Tokenizer,
  type TrainingState,
  type TrainOptions,
  type TrainSummary,
  type UnknownTokenError,
} from "@bytepair/core";
import { Vocabulary } from "./vocabulary.js";
import { SpecialTokenMatcher } from "./special.js";
import { trainMerges } from "./trainer.js";
import { encodeText } from "./encoder.js";
import { decodeBytes, decodeText } from "./decoder.js";

export class BpeTokenizer implements Tokenizer {
  readonly name = "bpe";

  /** Target vocabulary size (bytes + merges + special tokens). */
  readonly maxVocabSize: number;

  private readonly _vocab = new Vocabulary();
  private readonly _specials = new SpecialTokenMatcher();
  private _state: TrainingState = "initialized";

  private constructor(maxVocabSize: number) {
    this.maxVocabSize = maxVocabSize;
  }

  /** Fails with `ConfigError` unless 256 < maxVocabSize <= 2^26. */
  static make(maxVocabSize: number): Effect.Effect<BpeTokenizer, ConfigError> {
    return Effect.map(validateVocabSize(maxVocabSize), (size) => new BpeTokenizer(size));
  }

  // ── Public interface ─────────────────────────────────────────────────────

  get vocabSize(): number {
    return this._vocab.size;
  }

  get state(): TrainingState {
    return this._state;
  }

  get merges(): readonly MergeRule[] {
    return this._vocab.merges;
  }

  get specialTokens(): ReadonlyMap<string, number> {
    return this._vocab.specialTokens;
  }

  /**
   * Learn merges from raw corpus bytes. Calling it again resumes from the
   * current vocabulary.
   */
  train(corpus: Uint8Array, options: TrainOptions = {}): Effect.Effect<TrainSummary> {
    return Effect.suspend(() => {
      this._state = "training";
      return trainMerges(this._vocab, corpus, this.maxVocabSize, options);
    }).pipe(
      Effect.ensuring(
        Effect.sync(() => {
          this._state = "trained";
        }),
      ),
    );
  }

  registerSpecial(token: string): Effect.Effect<number, SpecialTokenConflictError> {
    return Effect.tap(this._vocab.registerSpecial(token), (id) =>
      Effect.sync(() => this._specials.add(token, id)),
    );
  }

  /** Input is assumed to be well-formed UTF-16 (see `encodeText`). */
  encode(text: string): number[] {
    return encodeText(text, this._vocab, this._specials);
  }

  decode(ids: ArrayLike<number>): Effect.Effect<string, UnknownTokenError> {
    return decodeText(ids, this._vocab);
  }

  decodeBytes(ids: ArrayLike<number>): Effect.Effect<Uint8Array, UnknownTokenError> {
    return decodeBytes(ids, this._vocab);
  }

  /** Hash of merges and special tokens; equal for equal training runs. */
  fingerprint(): string {
    return this._vocab.fingerprint();
  }

  reset(): void {
    this._vocab.reset();
    this._specials.clear();
    this._state = "initialized";
  }
}
