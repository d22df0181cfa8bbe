/**
 * Colour and pixel primitives shared by the palette extractor, the colour
 * validator and the logo detector.
 */

import chroma from "chroma-js";
import { ConfigurationError } from "../errors";
import type { RasterImage } from "../images/raster";
import type { ColorSample } from "./types";

const HEX_PATTERN = /^#?[0-9a-f]{6}$/i;

/** Parse "#rrggbb" into an RGB sample. */
export function parseHexColor(hex: string): ColorSample {
  const trimmed = hex.trim();
  if (!HEX_PATTERN.test(trimmed) || !chroma.valid(trimmed)) {
    throw new ConfigurationError(`Invalid hex colour "${hex}" (expected #RRGGBB)`);
  }
  const [r, g, b] = chroma(trimmed).rgb();
  return [r, g, b];
}

export function toHex(color: ColorSample): string {
  return chroma(color[0], color[1], color[2]).hex();
}

export function clampChannel(value: number): number {
  return Math.min(255, Math.max(0, Math.round(value)));
}

export function rgbDistance(a: ColorSample, b: ColorSample): number {
  const dr = a[0] - b[0];
  const dg = a[1] - b[1];
  const db = a[2] - b[2];
  return Math.sqrt(dr * dr + dg * dg + db * db);
}

/** Pack a sample into one integer (0xRRGGBB) for hashing and ordering. */
export function packRgb(color: ColorSample): number {
  return (color[0] << 16) | (color[1] << 8) | color[2];
}

export function unpackRgb(packed: number): ColorSample {
  return [(packed >> 16) & 0xff, (packed >> 8) & 0xff, packed & 0xff];
}

export function sameColor(a: ColorSample, b: ColorSample): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
}

/**
 * Visible pixels of an image, read on a square grid stepped so that about
 * `maxSamples` pixels are touched. Rows and columns are stepped separately so
 * narrow bands are seen whatever the image width. Fully transparent pixels
 * are skipped.
 */
export function samplePixels(image: RasterImage, maxSamples = 16_384): ColorSample[] {
  const step = Math.max(1, Math.ceil(Math.sqrt((image.width * image.height) / Math.max(1, maxSamples))));
  const samples: ColorSample[] = [];

  for (let y = 0; y < image.height; y += step) {
    for (let x = 0; x < image.width; x += step) {
      const i = (y * image.width + x) * 4;
      if (image.data[i + 3] === 0) continue;
      samples.push([image.data[i], image.data[i + 1], image.data[i + 2]]);
    }
  }

  return samples;
}

/**
 * Small deterministic PRNG (mulberry32). Same seed, same sequence.
 * Returns floats in [0, 1).
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
