/**
 * Severity levels for flagged terms, with an explicit total order.
 * Blocking is a single "rank ≥ ERROR" check, so new levels slot in by rank.
 */

export const SEVERITY_RANK = {
  WARNING: 1,
  ERROR: 2,
} as const;

export type Severity = keyof typeof SEVERITY_RANK;

/** Lowest to highest */
export const SEVERITIES = ["WARNING", "ERROR"] as const satisfies readonly Severity[];

export const BLOCKING_SEVERITY: Severity = "ERROR";

export function isSeverity(value: string): value is Severity {
  return Object.prototype.hasOwnProperty.call(SEVERITY_RANK, value);
}

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

/** Highest of the given severities, or null for none */
export function maxSeverity(severities: Iterable<Severity>): Severity | null {
  let highest: Severity | null = null;
  for (const severity of severities) {
    if (highest === null || compareSeverity(severity, highest) > 0) highest = severity;
  }
  return highest;
}

export function isBlocking(severity: Severity): boolean {
  return compareSeverity(severity, BLOCKING_SEVERITY) >= 0;
}
