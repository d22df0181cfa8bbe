/**
 * Brand colour compliance
 *
 * A brand colour counts as present when any of its 11 shades sits within
 * `colorDistanceThreshold` of a palette cluster heavier than
 * `minClusterWeight`. Both primary and secondary must be present; one out
 * of two is a failure.
 */

import type { RasterImage } from "../images/raster";
import { DEFAULT_PALETTE_SEED, DEFAULT_PALETTE_SIZE, extractPalette } from "./palette";
import { DEFAULT_SHADE_STEP, generateShadeSet } from "./shades";
import { packRgb, rgbDistance, toHex } from "./vision";
import type {
  BrandColorCheck,
  BrandColorRole,
  ColorComplianceOptions,
  ColorComplianceResult,
  ColorSample,
  PaletteEntry,
} from "./types";

export const DEFAULT_COLOR_OPTIONS: ColorComplianceOptions = {
  colorDistanceThreshold: 40,
  shadeStep: DEFAULT_SHADE_STEP,
  paletteSize: DEFAULT_PALETTE_SIZE,
  seed: DEFAULT_PALETTE_SEED,
  minClusterWeight: 0.01,
};

export interface BrandColors {
  primary: ColorSample;
  secondary: ColorSample;
}

export function validateBrandColors(
  image: RasterImage,
  brand: BrandColors,
  options: Partial<ColorComplianceOptions> = {}
): ColorComplianceResult {
  const opts: ColorComplianceOptions = { ...DEFAULT_COLOR_OPTIONS, ...options };

  const palette = extractPalette(image, opts.paletteSize, { seed: opts.seed });
  const significant = palette.filter((entry) => entry.weight > opts.minClusterWeight);

  const checks = [
    checkBrandColor("primary", brand.primary, significant, opts),
    checkBrandColor("secondary", brand.secondary, significant, opts),
  ];

  const matched: ColorSample[] = [];
  const seen = new Set<number>();
  for (const check of checks) {
    for (const shade of check.matchedShades) {
      const key = packRgb(shade);
      if (seen.has(key)) continue;
      seen.add(key);
      matched.push(shade);
    }
  }

  return {
    pass: checks.every((check) => check.present),
    matched,
    checks,
    palette,
  };
}

function checkBrandColor(
  role: BrandColorRole,
  color: ColorSample,
  significant: PaletteEntry[],
  opts: ColorComplianceOptions
): BrandColorCheck {
  const shades = generateShadeSet(color, opts.shadeStep);
  const matchedShades: ColorSample[] = [];
  let nearest = Infinity;

  for (const shade of shades) {
    let shadeMatches = false;
    for (const entry of significant) {
      const distance = rgbDistance(shade, entry.color);
      nearest = Math.min(nearest, distance);
      if (distance <= opts.colorDistanceThreshold) shadeMatches = true;
    }
    if (shadeMatches && !matchedShades.some((s) => packRgb(s) === packRgb(shade))) {
      matchedShades.push(shade);
    }
  }

  return {
    role,
    hex: toHex(color),
    present: matchedShades.length > 0,
    matchedShades,
    nearestDistance: Number.isFinite(nearest) ? nearest : null,
  };
}
