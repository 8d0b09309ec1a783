/**
 * Pipeline Module
 *
 * @module
 */

export * from "./pendency-service.js";
