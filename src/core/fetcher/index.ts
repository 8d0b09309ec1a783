/**
 * Submission Fetcher Module
 *
 * @module
 */

export * from "./submission-fetcher.js";
