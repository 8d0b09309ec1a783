/**
 * Configuration Module
 *
 * @module
 */

export * from "./config-loader.js";
