export {
  MergeSinkFrom,
  LoggingMergeSink,
  describeMerge,
} from "./layers.js";

export {
  prettyLogger,
  prettyLoggerLayer,
  formatLogLine,
  formatToken,
  withSpan,
  parseLogLevel,
} from "./logging.js";
