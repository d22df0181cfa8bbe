/**
 * Logo Detector
 *
 * Multi-scale template matching. The logo is slid over a working-resolution
 * copy of the creative at a handful of scale factors, scoring each placement
 * with zero-mean normalised cross-correlation (the TM_CCOEFF_NORMED measure).
 * Transparent logo pixels are left out of the score so a logo's empty
 * background does not have to match the creative behind it.
 *
 * A logo larger than the creative scores 0 without searching.
 *
 * Work is bounded: the creative is downscaled to `searchDimension`, and each
 * scale visits positions on a stride sized so that positions × template
 * pixels stays under `maxOperationsPerScale`, followed by a stride-1
 * refinement around the best coarse hit. At most MAX_LOGO_SCALES scales are
 * tried.
 *
 * ── Public API ──────────────────────────────────────────────────────────
 * detectLogo(image, logo, options) → LogoMatch
 */

import {
  assertRaster,
  opaqueMask,
  resizeRaster,
  toGrayscale,
  type RasterImage,
} from "./raster";

// ─── Constants ──────────────────────────────────────────────────────────

export const DEFAULT_LOGO_THRESHOLD = 0.7;
export const DEFAULT_LOGO_SCALES: readonly number[] = [0.5, 0.75, 1, 1.25, 1.5];
const DEFAULT_SEARCH_DIMENSION = 256;
const DEFAULT_MAX_OPERATIONS_PER_SCALE = 4_000_000;
/** Scales searched per call, nearest to 1 first */
export const MAX_LOGO_SCALES = 9;
const MIN_TEMPLATE_SIDE = 2;
const MIN_TEMPLATE_PIXELS = 4;
const FLAT_EPSILON = 1e-6;

// ─── Types ──────────────────────────────────────────────────────────────

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface LogoMatch {
  found: boolean;
  /** Best normalised correlation, clamped to [0, 1] */
  confidence: number;
  /** Best placement in creative pixels; null when nothing could be scored */
  location: BoundingBox | null;
  /** Scale factor of the best placement relative to the logo's own size */
  scale: number | null;
}

export interface LogoDetectionOptions {
  threshold: number;
  scales: readonly number[];
  /** Longest side of the working copy of the creative */
  searchDimension: number;
  maxOperationsPerScale: number;
}

export const DEFAULT_LOGO_OPTIONS: LogoDetectionOptions = {
  threshold: DEFAULT_LOGO_THRESHOLD,
  scales: DEFAULT_LOGO_SCALES,
  searchDimension: DEFAULT_SEARCH_DIMENSION,
  maxOperationsPerScale: DEFAULT_MAX_OPERATIONS_PER_SCALE,
};

/** Grayscale template restricted to its opaque pixels */
interface PreparedTemplate {
  width: number;
  height: number;
  /** Offsets (dy * targetWidth + dx) of opaque pixels into the target */
  offsets: Int32Array;
  /** Template values minus their mean, aligned with offsets */
  centered: Float64Array;
  norm: number;
}

interface Placement {
  x: number;
  y: number;
  score: number;
}

// ─── Detection ──────────────────────────────────────────────────────────

export function detectLogo(
  image: RasterImage,
  logo: RasterImage,
  options: Partial<LogoDetectionOptions> = {}
): LogoMatch {
  const opts: LogoDetectionOptions = { ...DEFAULT_LOGO_OPTIONS, ...options };
  assertRaster(image, "creative");
  assertRaster(logo, "logo");

  if (logo.width > image.width || logo.height > image.height) {
    return { found: false, confidence: 0, location: null, scale: null };
  }

  const workFactor = Math.min(1, opts.searchDimension / Math.max(image.width, image.height));
  const working =
    workFactor < 1
      ? resizeRaster(
          image,
          Math.max(1, Math.round(image.width * workFactor)),
          Math.max(1, Math.round(image.height * workFactor))
        )
      : image;
  const target = toGrayscale(working);

  // Native size first, so equal scores resolve to the unscaled logo
  const scales = [...opts.scales]
    .filter((s) => s > 0)
    .sort((a, b) => Math.abs(a - 1) - Math.abs(b - 1) || a - b)
    .slice(0, MAX_LOGO_SCALES);

  let best: (Placement & { scale: number; width: number; height: number }) | null = null;

  for (const scale of scales) {
    const template = prepareTemplate(logo, scale * workFactor, working.width, working.height);
    if (!template) continue;

    const placement = searchScale(target, working.width, working.height, template, opts.maxOperationsPerScale);
    if (placement && (best === null || placement.score > best.score)) {
      best = { ...placement, scale, width: template.width, height: template.height };
    }
  }

  if (best === null) {
    return { found: false, confidence: 0, location: null, scale: null };
  }

  const confidence = Math.min(1, Math.max(0, best.score));
  return {
    found: confidence >= opts.threshold,
    confidence,
    location: {
      x: Math.round(best.x / workFactor),
      y: Math.round(best.y / workFactor),
      width: Math.round(best.width / workFactor),
      height: Math.round(best.height / workFactor),
    },
    scale: best.scale,
  };
}

/**
 * Resize the logo by `factor` and reduce it to centred grayscale over its
 * opaque pixels. A single-colour mark is flat once its transparent
 * background is masked out, so it falls back to every pixel composited over
 * white. Returns null when it does not fit the target, is too small, or is
 * flat either way.
 */
function prepareTemplate(
  logo: RasterImage,
  factor: number,
  targetWidth: number,
  targetHeight: number
): PreparedTemplate | null {
  const width = Math.round(logo.width * factor);
  const height = Math.round(logo.height * factor);
  if (width < MIN_TEMPLATE_SIDE || height < MIN_TEMPLATE_SIDE) return null;
  if (width > targetWidth || height > targetHeight) return null;

  const resized = resizeRaster(logo, width, height);
  const gray = toGrayscale(resized);

  return (
    centreTemplate(gray, opaqueMask(resized), width, height, targetWidth) ??
    centreTemplate(gray, null, width, height, targetWidth)
  );
}

/** Zero-mean template over the pixels in `mask` (all pixels when null); null if flat */
function centreTemplate(
  gray: Float64Array,
  mask: Uint8Array | null,
  width: number,
  height: number,
  targetWidth: number
): PreparedTemplate | null {
  const offsets: number[] = [];
  const values: number[] = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const p = y * width + x;
      if (mask && !mask[p]) continue;
      offsets.push(y * targetWidth + x);
      values.push(gray[p]);
    }
  }
  if (values.length < MIN_TEMPLATE_PIXELS) return null;

  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const centered = new Float64Array(values.length);
  let sumSq = 0;
  for (let i = 0; i < values.length; i++) {
    centered[i] = values[i] - mean;
    sumSq += centered[i] * centered[i];
  }
  const norm = Math.sqrt(sumSq);
  if (norm < FLAT_EPSILON) return null;

  return { width, height, offsets: Int32Array.from(offsets), centered, norm };
}

function searchScale(
  target: Float64Array,
  targetWidth: number,
  targetHeight: number,
  template: PreparedTemplate,
  maxOperations: number
): Placement | null {
  const spanX = targetWidth - template.width + 1;
  const spanY = targetHeight - template.height + 1;
  const cost = spanX * spanY * template.offsets.length;
  const stride = Math.max(1, Math.ceil(Math.sqrt(cost / maxOperations)));

  const coarse = scanRegion(target, targetWidth, template, { x0: 0, x1: spanX - 1, y0: 0, y1: spanY - 1 }, stride, null);
  if (stride === 1 || coarse === null) return coarse;

  return scanRegion(
    target,
    targetWidth,
    template,
    {
      x0: Math.max(0, coarse.x - stride + 1),
      x1: Math.min(spanX - 1, coarse.x + stride - 1),
      y0: Math.max(0, coarse.y - stride + 1),
      y1: Math.min(spanY - 1, coarse.y + stride - 1),
    },
    1,
    coarse
  );
}

/** Row-major scan of an inclusive region; a placement must beat `best` strictly */
function scanRegion(
  target: Float64Array,
  targetWidth: number,
  template: PreparedTemplate,
  region: { x0: number; x1: number; y0: number; y1: number },
  step: number,
  best: Placement | null
): Placement | null {
  let current = best;
  for (let y = region.y0; y <= region.y1; y += step) {
    for (let x = region.x0; x <= region.x1; x += step) {
      const score = correlate(target, x + y * targetWidth, template);
      if (current === null || score > current.score) current = { x, y, score };
    }
  }
  return current;
}

/** Zero-mean normalised cross-correlation at one placement; 0 for flat windows */
function correlate(target: Float64Array, origin: number, template: PreparedTemplate): number {
  const n = template.offsets.length;
  let sum = 0;
  let sumSq = 0;
  let cross = 0;
  for (let i = 0; i < n; i++) {
    const w = target[origin + template.offsets[i]];
    sum += w;
    sumSq += w * w;
    cross += template.centered[i] * w;
  }
  const variance = sumSq - (sum * sum) / n;
  if (variance < FLAT_EPSILON) return 0;
  return cross / (template.norm * Math.sqrt(variance));
}
