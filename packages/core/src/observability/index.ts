/**
 * Observability
 *
 * Structured logging for the numbering engine. Components take a logger
 * through their options and fall back to the process default.
 */

export * from "./logger.js";
export * from "./types.js";
