import type { Severity } from "./severity";

export type MessageSource = "original" | "translated";

export type MatchMode = "substring" | "word";

/** One prohibited term and how serious a hit on it is */
export interface TermRule {
  term: string;
  severity: Severity;
  /** Grouping from categorised tables, e.g. "medical_claims" */
  category?: string;
}

/** Frozen, validated rule list loaded once at start-up */
export type TermTable = readonly TermRule[];

export interface LegalFinding {
  term: string;
  severity: Severity;
  /** Excerpt of the message around the hit */
  location: string;
  /** Character offset of the hit in the screened text */
  index: number;
  category?: string;
  source?: MessageSource;
}

export interface LegalVerdict {
  findings: LegalFinding[];
  blocked: boolean;
  highestSeverity: Severity | null;
}
