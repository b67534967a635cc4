/**
 * Byte-pair training loop.
 *
 * 1. Start from the corpus bytes with every known merge already applied,
 *    so a second call resumes instead of re-learning old pairs.
 * 2. Count adjacent pairs and take the most frequent (smallest pair wins a
 *    tie).
 * 3. Mint an id for it, rewrite the sequence, repeat -- until the target
 *    size is reached or nothing is left to merge.
 */
import { Effect, Option } from "effect";
import { MergeSinkService, type MergeEvent, type TrainOptions, type TrainSummary } from "@bytepair/core";
import type { Vocabulary } from "./vocabulary.js";
import { applyKnownMerges } from "./encoder.js";
import { applyMerge, countPairs, mostFrequentPair, unpackPair } from "./pairs.js";

export function trainMerges(
  vocab: Vocabulary,
  corpus: Uint8Array,
  maxVocabSize: number,
  options: TrainOptions = {},
): Effect.Effect<TrainSummary> {
  return Effect.gen(function* () {
    const sink = yield* Effect.serviceOption(MergeSinkService);
    const events: MergeEvent[] = [];
    let ids = applyKnownMerges(Array.from(corpus), vocab);

    while (vocab.size < maxVocabSize) {
      const best = mostFrequentPair(countPairs(ids));
      if (best === null) break;
      if (options.stopEarly && best.count === 1) break;

      const [left, right] = unpackPair(best.key);
      const event = vocab.addMerge(left, right);
      ids = applyMerge(ids, left, right, event.id);
      events.push(event);

      if (Option.isSome(sink)) yield* sink.value.onMerge(event);
    }

    return { mergeCount: events.length, vocabSize: vocab.size, events } satisfies TrainSummary;
  }).pipe(Effect.withSpan("bpe.train"));
}
