/**
 * Sync-Back Module
 *
 * @module
 */

export * from "./sync-back-publisher.js";
