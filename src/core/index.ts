/**
 * Core module - everything the CLI needs to run a pendency refresh
 */

// Errors
export * from "./errors.js";

// Field paths and survey access
export * from "./fields/index.js";
export * from "./survey/index.js";
export * from "./fetcher/index.js";

// Reconciliation and its outputs
export * from "./reconciliation/index.js";
export * from "./statistics/index.js";
export * from "./report/index.js";
export * from "./sync/index.js";
export * from "./history/index.js";

// Configuration and runs
export * from "./config/index.js";
export * from "./pipeline/index.js";
