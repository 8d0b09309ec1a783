/**
 * Reconciliation Module
 *
 * Joins Master and Revisit submissions by household identity and derives
 * each household's pendency status.
 */

// Interfaces
export * from "./interfaces/IReconciliation.js";

// Models
export * from "./models/visit-records.js";
export * from "./status/status-vocabulary.js";

// Implementation
export {
  ReconciliationEngine,
  reconcile,
  reconciliationConfigFrom,
} from "./impl/ReconciliationEngine.js";
