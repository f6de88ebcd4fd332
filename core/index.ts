/**
 * Core module exports for spaneval.
 */

export * from "./config.ts";
export * from "./errors.ts";
export * from "./eval-config.ts";
export * from "./records/index.ts";

// Metrics Engine
export * from "./metrics/index.ts";
