/**
 * survey-load: survey export ETL with heuristic column mapping and
 * fault-tolerant row-by-row PostgreSQL loading
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/fetcher/index.js";
export * from "./lib/decoder/index.js";
export * from "./lib/normalizer/index.js";
export * from "./lib/resolver/index.js";
export * from "./lib/store/index.js";
export * from "./lib/target/index.js";
export * from "./lib/loader/index.js";
export * from "./lib/pipeline/index.js";
export * from "./lib/reporter/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
