/**
 * log-analyzer: per-URL response time reports from nginx access logs
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/scanner/index.js";
export * from "./lib/parser/index.js";
export * from "./lib/aggregator/index.js";
export * from "./lib/reporter/index.js";
export * from "./lib/analyzer/index.js";

// Configuration
export * from "./cli/config/types.js";
export * from "./cli/config/parser.js";
export * from "./utils/config-loader.js";

// Utilities
export * from "./utils/errors.js";
export * from "./utils/logger.js";
