import { clampChannel } from "./vision";
import type { ColorSample, ShadeSet } from "./types";

/** Shades on each side of the original colour */
export const SHADE_RANGE = 5;

export const DEFAULT_SHADE_STEP = 15;

/**
 * Build the 11-entry shade set for a brand colour: every channel shifted by
 * `i * step` for i = -5..5, clamped to [0, 255]. Index 5 is the input,
 * untouched. Entries run darkest to lightest; clamping can make neighbours
 * equal but never reverses the order.
 */
export function generateShadeSet(color: ColorSample, step: number = DEFAULT_SHADE_STEP): ShadeSet {
  const shades: ColorSample[] = [];
  for (let i = -SHADE_RANGE; i <= SHADE_RANGE; i++) {
    if (i === 0) {
      shades.push([color[0], color[1], color[2]]);
      continue;
    }
    const offset = i * step;
    shades.push([
      clampChannel(color[0] + offset),
      clampChannel(color[1] + offset),
      clampChannel(color[2] + offset),
    ]);
  }
  return shades;
}
