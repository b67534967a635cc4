/**
 * Effect layers for dependency injection.
 */
import { Effect, Layer } from "effect";
import { MergeSinkService, type MergeEvent, type MergeSink } from "@bytepair/core";
import { formatToken } from "./logging.js";

// ── Merge sink Layers ──────────────────────────────────────────────────────

export const MergeSinkFrom = (sink: MergeSink) =>
  Layer.succeed(MergeSinkService, sink);

export const describeMerge = (event: MergeEvent): string =>
  `Merged ids (${event.pair[0]}, ${event.pair[1]}) as new token ${formatToken(event.token)} with id ${event.id}`;

/** Logs every merge at debug level. */
export const LoggingMergeSink = MergeSinkFrom({
  onMerge: (event) => Effect.logDebug(describeMerge(event)),
});
