/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class UnknownTokenError extends Data.TaggedError("UnknownTokenError")<{
  readonly message: string;
  readonly id: number;
  readonly cause?: unknown;
}> {}

export class SpecialTokenConflictError extends Data.TaggedError("SpecialTokenConflictError")<{
  readonly message: string;
  readonly token: string;
  readonly cause?: unknown;
}> {}

export class CorpusError extends Data.TaggedError("CorpusError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}
