/**
 * Report Module
 *
 * @module
 */

export * from "./report-exporter.js";
