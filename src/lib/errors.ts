/**
 * Error taxonomy for the compliance gate.
 *
 * Compliance failures ("logo not found", "colour missing", a WARNING term)
 * are verdict values, never errors. These classes cover inputs that cannot
 * be evaluated at all.
 */

import { isBlocking } from "./legal/severity";
import type { LegalVerdict } from "./legal/types";

export type GateErrorCode = "INVALID_IMAGE" | "CONFIGURATION" | "CAMPAIGN_BLOCKED";

export abstract class GateError extends Error {
  abstract readonly code: GateErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Image could not be decoded, or has no usable pixels. */
export class InvalidImageError extends GateError {
  readonly code = "INVALID_IMAGE" as const;
}

/** Malformed brand spec, term table, brief or environment. Fatal to the run. */
export class ConfigurationError extends GateError {
  readonly code = "CONFIGURATION" as const;
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
    this.issues = issues;
  }
}

/** The campaign message carries at least one ERROR-severity term. */
export class CampaignBlockedError extends GateError {
  readonly code = "CAMPAIGN_BLOCKED" as const;
  readonly verdict: LegalVerdict;

  constructor(verdict: LegalVerdict) {
    const terms = verdict.findings
      .filter((f) => isBlocking(f.severity))
      .map((f) => `'${f.term}'`);
    super(`Campaign blocked by legal screen: ${terms.join(", ")}`);
    this.verdict = verdict;
  }
}

export function isGateError(error: unknown): error is GateError {
  return error instanceof GateError;
}

/** Message of any thrown value, for logs and reports. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
