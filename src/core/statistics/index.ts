/**
 * Statistics Module
 *
 * @module
 */

export * from "./statistics-aggregator.js";
