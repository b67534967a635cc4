/**
 * Structured logging and tracing integration.
 *
 * Provides a compact console logger, span helpers for tracing hot paths and
 * the log-level plumbing used by the CLI.
 */
import { Effect, Layer, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

export const formatLogLine = (level: LogLevel.LogLevel, message: unknown, date: Date): string => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = level.label.toUpperCase().padEnd(5);
  const parts = Array.isArray(message) ? message : [message];
  const msg = parts.map((m) => (typeof m === "string" ? m : JSON.stringify(m))).join(" ");
  return `[${ts}] ${lvl} ${msg}`;
};

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  console.log(formatLogLine(logLevel, message, date));
});

/** Replace the default logger with `prettyLogger` at the given minimum level. */
export const prettyLoggerLayer = (level: LogLevel.LogLevel): Layer.Layer<never> =>
  Layer.merge(Logger.replace(Logger.defaultLogger, prettyLogger), Logger.minimumLogLevel(level));

// ── Span helpers ───────────────────────────────────────────────────────────

export function withSpan<A, E, R>(name: string, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
  return Effect.withSpan(name)(effect);
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "trace": return LogLevel.Trace;
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    case "none": return LogLevel.None;
    default: return LogLevel.Info;
  }
}

// ── Token display ──────────────────────────────────────────────────────────

const utf8 = new TextDecoder();

/** Quote token bytes for a log line; invalid UTF-8 shows as U+FFFD. */
export function formatToken(token: Uint8Array): string {
  return JSON.stringify(utf8.decode(token));
}
