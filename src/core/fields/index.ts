/**
 * Field Resolution Module
 *
 * Typed path-walking over raw survey payloads.
 */

export * from "./field-resolver.js";
