/**
 * Processing History Module
 *
 * @module
 */

export * from "./history-store.js";
