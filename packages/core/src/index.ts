/**
 * @bytepair/core -- shared errors, interfaces and configuration.
 */
export * from "./errors.js";
export * from "./interfaces.js";
export * from "./config.js";
export * from "./hash.js";
