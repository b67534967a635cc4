export { readCorpus } from "./corpus.js";
export { countOption, loadCliConfig, requireOption, resolveLogLevel, tokenizerOverrides, type CliConfig } from "./config.js";
export { listArg, loadConfig, parseKV } from "./parse.js";
export { formatFailure, runWithSession, trainSession, type Session, type SessionError, type TaggedFailure } from "./session.js";
export { parseIds } from "./commands/encode.js";
export { roundTripLines } from "./commands/repl.js";
