/**
 * Subsystem interfaces (ports) and the Effect service tags that carry them.
 */
import { Context, Effect } from "effect";
import type { SpecialTokenConflictError, UnknownTokenError } from "./errors.js";

// ── Symbols ────────────────────────────────────────────────────────────────

/** Number of reserved single-byte ids (0..255). */
export const BYTE_VOCAB_SIZE = 256;

/** A learned merge: (left id, right id) -> id. */
export interface MergeRule {
  readonly left: number;
  readonly right: number;
  readonly id: number;
}

/** Emitted once per accepted merge during training. */
export interface MergeEvent {
  readonly pair: readonly [number, number];
  readonly id: number;
  readonly token: Uint8Array;
}

export interface TrainOptions {
  /** Stop as soon as the most frequent pair occurs only once. */
  readonly stopEarly?: boolean;
}

export interface TrainSummary {
  readonly mergeCount: number;
  readonly vocabSize: number;
  readonly events: readonly MergeEvent[];
}

export type TrainingState = "initialized" | "training" | "trained";

// ── Tokenizer ──────────────────────────────────────────────────────────────
export interface Tokenizer {
  readonly name: string;
  readonly vocabSize: number;
  readonly state: TrainingState;
  train(corpus: Uint8Array, options?: TrainOptions): Effect.Effect<TrainSummary>;
  registerSpecial(token: string): Effect.Effect<number, SpecialTokenConflictError>;
  encode(text: string): number[];
  decode(ids: ArrayLike<number>): Effect.Effect<string, UnknownTokenError>;
  reset(): void;
}

// ── Merge sink ─────────────────────────────────────────────────────────────

/** Optional consumer of training events. Training never depends on it. */
export interface MergeSink {
  onMerge(event: MergeEvent): Effect.Effect<void>;
}

export class MergeSinkService extends Context.Tag("MergeSinkService")<
  MergeSinkService,
  MergeSink
>() {}
