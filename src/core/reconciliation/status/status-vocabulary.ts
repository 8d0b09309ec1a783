/**
 * Maps raw visit status values to a complete/incomplete outcome.
 */

import type { StatusVocabularyConfig } from "../../../utils/validation.js";

export type VisitOutcome = "complete" | "incomplete";

export interface StatusClassification {
  outcome: VisitOutcome;
  /** False when the value was in neither set and `unknownAs` applied */
  recognized: boolean;
}

function normalizeStatus(value: string): string {
  return value.trim().toLowerCase();
}

export class StatusVocabulary {
  private readonly table = new Map<string, VisitOutcome>();
  private readonly unknownAs: VisitOutcome;

  constructor(config: StatusVocabularyConfig) {
    for (const value of config.incomplete) this.table.set(normalizeStatus(value), "incomplete");
    for (const value of config.complete) this.table.set(normalizeStatus(value), "complete");
    this.unknownAs = config.unknownAs;
  }

  classify(raw: string | null): StatusClassification {
    const outcome = raw === null ? undefined : this.table.get(normalizeStatus(raw));
    if (outcome === undefined) return { outcome: this.unknownAs, recognized: false };
    return { outcome, recognized: true };
  }
}
