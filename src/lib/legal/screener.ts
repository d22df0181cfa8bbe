/**
 * Legal screener
 *
 * Scans a message against a prohibited-term table. Every occurrence of every
 * term becomes a finding, in the order the hits appear in the text. The
 * verdict blocks when any finding reaches ERROR; WARNINGs never block.
 *
 * Pure: no I/O, no randomness, no logging.
 */

import { isBlocking, maxSeverity } from "./severity";
import type { LegalFinding, LegalVerdict, MatchMode, MessageSource, TermTable } from "./types";

const EXCERPT_CONTEXT = 24;
const ELLIPSIS = "…";

export interface ScreenOptions {
  matchMode?: MatchMode;
  /** Tags each finding with the message it came from */
  source?: MessageSource;
}

export function screenText(text: string, table: TermTable, options: ScreenOptions = {}): LegalVerdict {
  const matchMode = options.matchMode ?? "substring";
  const hits: Array<LegalFinding & { rank: number }> = [];

  table.forEach((rule, rank) => {
    const pattern = buildPattern(rule.term, matchMode);
    for (const match of text.matchAll(pattern)) {
      const index = match.index ?? 0;
      hits.push({
        term: rule.term,
        severity: rule.severity,
        location: excerpt(text, index, match[0].length),
        index,
        ...(rule.category !== undefined ? { category: rule.category } : {}),
        ...(options.source !== undefined ? { source: options.source } : {}),
        rank,
      });
    }
  });

  // Text order; overlapping hits at one offset list the longer term first
  hits.sort((a, b) => a.index - b.index || b.term.length - a.term.length || a.rank - b.rank);

  const findings: LegalFinding[] = hits.map(({ rank: _rank, ...finding }) => finding);
  return toVerdict(findings);
}

/** Union of findings in argument order; blocked if any input blocked */
export function mergeVerdicts(...verdicts: LegalVerdict[]): LegalVerdict {
  const findings = verdicts.flatMap((verdict) => verdict.findings);
  const merged = toVerdict(findings);
  return verdicts.some((verdict) => verdict.blocked) ? { ...merged, blocked: true } : merged;
}

function toVerdict(findings: LegalFinding[]): LegalVerdict {
  const highestSeverity = maxSeverity(findings.map((finding) => finding.severity));
  return {
    findings,
    blocked: highestSeverity !== null && isBlocking(highestSeverity),
    highestSeverity,
  };
}

function buildPattern(term: string, matchMode: MatchMode): RegExp {
  const escaped = term.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  if (matchMode === "word") {
    return new RegExp(`(?<![\\p{L}\\p{N}])${escaped}(?![\\p{L}\\p{N}])`, "giu");
  }
  return new RegExp(escaped, "giu");
}

function excerpt(text: string, index: number, length: number): string {
  const start = Math.max(0, index - EXCERPT_CONTEXT);
  const end = Math.min(text.length, index + length + EXCERPT_CONTEXT);
  const prefix = start > 0 ? ELLIPSIS : "";
  const suffix = end < text.length ? ELLIPSIS : "";
  return `${prefix}${text.slice(start, end).trim()}${suffix}`;
}
