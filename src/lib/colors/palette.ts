/**
 * Dominant palette extraction
 *
 * Reduces an image to its K dominant colours with weighted k-means over the
 * image's distinct colours. Initialisation is k-means++ driven by a seeded
 * PRNG, so the same image, k and seed always give the same palette.
 *
 * ── Public API ──────────────────────────────────────────────────────────
 * extractPalette(image, k, options) → PaletteEntry[] (heaviest first)
 */

import { ConfigurationError, InvalidImageError } from "../errors";
import { assertRaster, type RasterImage } from "../images/raster";
import { packRgb, rgbDistance, samplePixels, seededRandom, toHex, unpackRgb } from "./vision";
import type { ColorSample, PaletteEntry } from "./types";

// ─── Constants ──────────────────────────────────────────────────────────

export const DEFAULT_PALETTE_SIZE = 5;
export const DEFAULT_PALETTE_SEED = 42;
const DEFAULT_MAX_ITERATIONS = 24;
const DEFAULT_MAX_SAMPLES = 16_384;

export interface PaletteOptions {
  seed?: number;
  maxIterations?: number;
  maxSamples?: number;
}

/** A distinct colour and how many sampled pixels carry it */
interface WeightedColor {
  color: ColorSample;
  packed: number;
  count: number;
}

// ─── Extraction ─────────────────────────────────────────────────────────

export function extractPalette(
  image: RasterImage,
  k: number = DEFAULT_PALETTE_SIZE,
  options: PaletteOptions = {}
): PaletteEntry[] {
  if (!Number.isInteger(k) || k < 1) {
    throw new ConfigurationError(`Palette size must be a positive integer, got ${k}`);
  }
  assertRaster(image);

  const samples = samplePixels(image, options.maxSamples ?? DEFAULT_MAX_SAMPLES);
  if (samples.length === 0) {
    throw new InvalidImageError("Image has no visible pixels to extract a palette from");
  }

  const distinct = countDistinct(samples);
  const total = samples.length;

  // Fewer colours than clusters: the colours are the palette
  if (distinct.length <= k) {
    return sortEntries(
      distinct.map(({ color, count }) => ({ color, hex: toHex(color), weight: count / total }))
    );
  }

  const centroids = runKMeans(
    distinct,
    k,
    options.seed ?? DEFAULT_PALETTE_SEED,
    options.maxIterations ?? DEFAULT_MAX_ITERATIONS
  );

  return sortEntries(
    centroids.map(({ color, count }) => ({ color, hex: toHex(color), weight: count / total }))
  );
}

function countDistinct(samples: ColorSample[]): WeightedColor[] {
  const counts = new Map<number, number>();
  for (const sample of samples) {
    const key = packRgb(sample);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  // Map iteration follows first appearance; sort so the order depends on colours only
  return Array.from(counts.entries())
    .sort((a, b) => a[0] - b[0])
    .map(([packed, count]) => ({ color: unpackRgb(packed), packed, count }));
}

function sortEntries(entries: PaletteEntry[]): PaletteEntry[] {
  return entries.sort((a, b) => b.weight - a.weight || packRgb(a.color) - packRgb(b.color));
}

// ─── k-means ────────────────────────────────────────────────────────────

type Centroid = [number, number, number];

/**
 * Weighted Lloyd iterations. Stops when no assignment changes or after
 * `maxIterations`. Clusters that end up empty are dropped.
 */
function runKMeans(
  points: WeightedColor[],
  k: number,
  seed: number,
  maxIterations: number
): Array<{ color: ColorSample; count: number }> {
  const centroids = initialiseCentroids(points, k, seededRandom(seed));
  const assignment = new Int32Array(points.length).fill(-1);

  for (let iteration = 0; iteration < maxIterations; iteration++) {
    let changed = false;

    for (let p = 0; p < points.length; p++) {
      const nearest = nearestCentroid(points[p].color, centroids);
      if (assignment[p] !== nearest) {
        assignment[p] = nearest;
        changed = true;
      }
    }

    if (!changed) break;

    const sums = centroids.map(() => [0, 0, 0, 0]);
    for (let p = 0; p < points.length; p++) {
      const { color, count } = points[p];
      const sum = sums[assignment[p]];
      sum[0] += color[0] * count;
      sum[1] += color[1] * count;
      sum[2] += color[2] * count;
      sum[3] += count;
    }
    sums.forEach((sum, c) => {
      // An empty cluster keeps its position; it is dropped at the end if still empty
      if (sum[3] > 0) {
        centroids[c] = [sum[0] / sum[3], sum[1] / sum[3], sum[2] / sum[3]];
      }
    });
  }

  const counts = new Array<number>(centroids.length).fill(0);
  for (let p = 0; p < points.length; p++) {
    counts[assignment[p]] += points[p].count;
  }

  return centroids
    .map((centroid, c) => ({
      color: [
        Math.round(centroid[0]),
        Math.round(centroid[1]),
        Math.round(centroid[2]),
      ] as const,
      count: counts[c],
    }))
    .filter((cluster) => cluster.count > 0);
}

/** k-means++: first centroid by weight, the rest proportional to weight × D² */
function initialiseCentroids(points: WeightedColor[], k: number, random: () => number): Centroid[] {
  const centroids: Centroid[] = [];
  const first = pickWeighted(points, points.map((p) => p.count), random);
  centroids.push([first.color[0], first.color[1], first.color[2]]);

  const nearestSq = points.map((p) => squaredDistance(p.color, centroids[0]));

  while (centroids.length < k) {
    const weights = points.map((p, i) => p.count * nearestSq[i]);
    const next = pickWeighted(points, weights, random);
    const centroid: Centroid = [next.color[0], next.color[1], next.color[2]];
    centroids.push(centroid);
    for (let i = 0; i < points.length; i++) {
      nearestSq[i] = Math.min(nearestSq[i], squaredDistance(points[i].color, centroid));
    }
  }

  return centroids;
}

function pickWeighted(points: WeightedColor[], weights: number[], random: () => number): WeightedColor {
  const total = weights.reduce((sum, w) => sum + w, 0);
  // Every remaining point already coincides with a centroid
  if (total <= 0) return points[Math.floor(random() * points.length)];

  let target = random() * total;
  for (let i = 0; i < points.length; i++) {
    target -= weights[i];
    if (target < 0) return points[i];
  }
  return points[points.length - 1];
}

function nearestCentroid(color: ColorSample, centroids: Centroid[]): number {
  let best = 0;
  let bestDistance = Infinity;
  for (let c = 0; c < centroids.length; c++) {
    const d = squaredDistance(color, centroids[c]);
    if (d < bestDistance) {
      bestDistance = d;
      best = c;
    }
  }
  return best;
}

function squaredDistance(a: ColorSample, b: Centroid): number {
  const d = rgbDistance(a, b);
  return d * d;
}
