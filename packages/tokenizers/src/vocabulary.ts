/**
 * Append-only symbol table shared by the trainer, encoder and decoder.
 *
 * Ids 0..255 are the raw bytes. Every id above that comes from one counter,
 * consumed by merges and special tokens in registration order.
 */
import { Effect } from "effect";
import {
  BYTE_VOCAB_SIZE,
  SpecialTokenConflictError,
  UnknownTokenError,
  fingerprintVocabulary,
  type MergeEvent,
  type MergeRule,
} from "@bytepair/core";
import { pairKey } from "./pairs.js";

const utf8 = new TextEncoder();

export class Vocabulary {
  /** id -> token bytes, for byte and merge ids. */
  private _tokens = new Map<number, Uint8Array>();

  /** packed pair -> merged id */
  private _pairs = new Map<number, number>();

  /** Merges in creation order. */
  private _merges: MergeRule[] = [];

  private _specialToId = new Map<string, number>();
  private _idToSpecial = new Map<number, Uint8Array>();

  private _nextId = BYTE_VOCAB_SIZE;

  constructor() {
    this.reset();
  }

  // ── Queries ──────────────────────────────────────────────────────────────

  /** Next unused id, i.e. the number of ids defined so far. */
  get size(): number {
    return this._nextId;
  }

  get merges(): readonly MergeRule[] {
    return this._merges;
  }

  get specialTokens(): ReadonlyMap<string, number> {
    return this._specialToId;
  }

  get hasMerges(): boolean {
    return this._pairs.size > 0;
  }

  /** Token bytes for `id`, special tokens first. */
  lookup(id: number): Uint8Array | undefined {
    return this._idToSpecial.get(id) ?? this._tokens.get(id);
  }

  tokenOf(id: number): Effect.Effect<Uint8Array, UnknownTokenError> {
    const token = this.lookup(id);
    return token === undefined
      ? Effect.fail(new UnknownTokenError({ message: `Unknown token id ${id}`, id }))
      : Effect.succeed(token);
  }

  idOfPair(left: number, right: number): number | undefined {
    return this._pairs.get(pairKey(left, right));
  }

  fingerprint(): string {
    return fingerprintVocabulary(this._merges, this._specialToId);
  }

  // ── Mutation ─────────────────────────────────────────────────────────────

  /**
   * Record a new merge of two known ids.
   * Callers must not add a pair that is already present.
   */
  addMerge(left: number, right: number): MergeEvent {
    const a = this._tokens.get(left);
    const b = this._tokens.get(right);
    if (a === undefined || b === undefined) {
      throw new Error(`Cannot merge unknown ids (${left}, ${right})`);
    }
    const key = pairKey(left, right);
    if (this._pairs.has(key)) {
      throw new Error(`Pair (${left}, ${right}) is already merged`);
    }

    const token = new Uint8Array(a.length + b.length);
    token.set(a, 0);
    token.set(b, a.length);

    const rule: MergeRule = { left, right, id: this._nextId++ };
    this._pairs.set(key, rule.id);
    this._tokens.set(rule.id, token);
    this._merges.push(rule);
    return { pair: [left, right], id: rule.id, token };
  }

  /** Register a special token. Re-registering returns the existing id. */
  registerSpecial(token: string): Effect.Effect<number, SpecialTokenConflictError> {
    return Effect.suspend((): Effect.Effect<number, SpecialTokenConflictError> => {
      if (token.length === 0) {
        return Effect.fail(
          new SpecialTokenConflictError({
            message: "Special token must not be empty: it would match at every position",
            token,
          }),
        );
      }
      const existing = this._specialToId.get(token);
      if (existing !== undefined) return Effect.succeed(existing);

      const id = this._nextId++;
      this._specialToId.set(token, id);
      this._idToSpecial.set(id, utf8.encode(token));
      return Effect.succeed(id);
    });
  }

  /** Back to the 256 byte identities, dropping merges and special tokens. */
  reset(): void {
    this._tokens.clear();
    for (let b = 0; b < BYTE_VOCAB_SIZE; b++) {
      this._tokens.set(b, Uint8Array.of(b));
    }
    this._pairs.clear();
    this._merges = [];
    this._specialToId.clear();
    this._idToSpecial.clear();
    this._nextId = BYTE_VOCAB_SIZE;
  }
}
