/**
 * Compliance Gate
 *
 * One verdict per creative (logo AND brand colours) and one per campaign
 * message (original and translated, screened independently, merged).
 *
 * The gate returns verdicts and nothing else: it does not log, catch or
 * retry. Whether a verdict stops the campaign is the pipeline's call.
 */

import type { RasterImage } from "../images/raster";
import { validateBrandColors, DEFAULT_COLOR_OPTIONS } from "../colors/compliance";
import { toHex } from "../colors/vision";
import type { ColorComplianceOptions, ColorComplianceResult, ColorSample } from "../colors/types";
import { detectLogo, DEFAULT_LOGO_OPTIONS, type LogoDetectionOptions, type LogoMatch } from "../images/logo-detector";
import { mergeVerdicts, screenText } from "../legal/screener";
import type { LegalVerdict, MatchMode, TermTable } from "../legal/types";
import type { ResolvedBrand } from "./brand";

export interface ComplianceVerdict {
  logo: LogoMatch;
  colorPass: boolean;
  matchedColors: ColorSample[];
  overallPass: boolean;
  /** Human-readable reasons the creative failed; empty on pass */
  violations: string[];
  colors: ColorComplianceResult;
}

export interface ComplianceGateOptions {
  color: ColorComplianceOptions;
  logo: LogoDetectionOptions;
  matchMode: MatchMode;
}

export const DEFAULT_GATE_OPTIONS: ComplianceGateOptions = {
  color: DEFAULT_COLOR_OPTIONS,
  logo: DEFAULT_LOGO_OPTIONS,
  matchMode: "substring",
};

/** Overrides accepted by the constructor; anything omitted uses the defaults */
export interface ComplianceGateInit {
  color?: Partial<ColorComplianceOptions>;
  logo?: Partial<LogoDetectionOptions>;
  matchMode?: MatchMode;
}

export class ComplianceGate {
  readonly options: ComplianceGateOptions;

  constructor(options: ComplianceGateInit = {}) {
    this.options = {
      color: { ...DEFAULT_GATE_OPTIONS.color, ...options.color },
      logo: { ...DEFAULT_GATE_OPTIONS.logo, ...options.logo },
      matchMode: options.matchMode ?? DEFAULT_GATE_OPTIONS.matchMode,
    };
  }

  evaluateCreative(image: RasterImage, brand: ResolvedBrand): ComplianceVerdict {
    const colors = validateBrandColors(image, brand, this.options.color);
    const logo = detectLogo(image, brand.logo, this.options.logo);

    const violations: string[] = [];
    if (!logo.found) {
      violations.push(
        `Logo not detected (confidence ${logo.confidence.toFixed(2)} < ${this.options.logo.threshold})`
      );
    }
    for (const check of colors.checks) {
      if (check.present) continue;
      const nearest = check.nearestDistance === null ? "no significant colours" : `nearest ${check.nearestDistance.toFixed(1)}`;
      violations.push(
        `${check.role === "primary" ? "Primary" : "Secondary"} color ${check.hex} not present (${nearest} > ${this.options.color.colorDistanceThreshold})`
      );
    }

    return {
      logo,
      colorPass: colors.pass,
      matchedColors: colors.matched,
      overallPass: logo.found && colors.pass,
      violations,
      colors,
    };
  }

  evaluateMessage(original: string, translated: string, table: TermTable): LegalVerdict {
    return mergeVerdicts(
      screenText(original, table, { matchMode: this.options.matchMode, source: "original" }),
      screenText(translated, table, { matchMode: this.options.matchMode, source: "translated" })
    );
  }

  /** Screen one message on its own, e.g. before paying for a translation */
  screenMessage(text: string, table: TermTable): LegalVerdict {
    return screenText(text, table, { matchMode: this.options.matchMode, source: "original" });
  }
}

export function matchedColorsAsHex(verdict: ComplianceVerdict): string[] {
  return verdict.matchedColors.map(toHex);
}
