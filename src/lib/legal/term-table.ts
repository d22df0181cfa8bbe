import fs from "fs";
import { TermTableSchema } from "@/types/api";
import { ConfigurationError, errorMessage } from "../errors";
import { compareSeverity, type Severity } from "./severity";
import type { TermRule, TermTable } from "./types";

/**
 * Validate a raw term table and freeze it.
 *
 * Two shapes are accepted: flat `{ term: severity }` and categorised
 * `{ category: { severity, words } }`. A term listed more than once keeps
 * its highest severity.
 */
export function parseTermTable(raw: unknown): TermTable {
  const result = TermTableSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      "Malformed prohibited-term table",
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }

  const entries: Record<string, Severity | { severity: Severity; words: string[] }> = result.data;
  const rules: TermRule[] = [];
  for (const [key, value] of Object.entries(entries)) {
    if (typeof value === "string") {
      rules.push({ term: key, severity: value });
    } else {
      for (const word of value.words) {
        rules.push({ term: word, severity: value.severity, category: key });
      }
    }
  }

  return freezeRules(dedupe(rules));
}

/** Read and validate a term table file. Called once at start-up. */
export function loadTermTable(path: string): TermTable {
  let content: string;
  try {
    content = fs.readFileSync(path, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read prohibited-term table at ${path}`, [], { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in prohibited-term table ${path}`, [errorMessage(error)]);
  }

  return parseTermTable(raw);
}

function dedupe(rules: TermRule[]): TermRule[] {
  // Re-setting a key keeps its first-seen position
  const byTerm = new Map<string, TermRule>();
  for (const rule of rules) {
    const key = rule.term.toLowerCase();
    const existing = byTerm.get(key);
    if (!existing || compareSeverity(rule.severity, existing.severity) > 0) {
      byTerm.set(key, rule);
    }
  }
  return Array.from(byTerm.values());
}

function freezeRules(rules: TermRule[]): TermTable {
  return Object.freeze(rules.map((rule) => Object.freeze({ ...rule })));
}
