/** RGB triple, each channel an integer in [0, 255]. */
export type ColorSample = readonly [r: number, g: number, b: number];

/** 11 shades of one brand colour: 5 darker, the original (index 5), 5 lighter. */
export type ShadeSet = readonly ColorSample[];

/** One cluster of an image's dominant palette */
export interface PaletteEntry {
  color: ColorSample;
  hex: string;
  /** Fraction of sampled pixels assigned to this cluster (0-1) */
  weight: number;
}

export type BrandColorRole = "primary" | "secondary";

/** Outcome of looking for one brand colour in a palette */
export interface BrandColorCheck {
  role: BrandColorRole;
  hex: string;
  present: boolean;
  /** Shades that fell within tolerance of a significant palette entry */
  matchedShades: ColorSample[];
  /** Smallest shade-to-cluster distance, null when no cluster was significant */
  nearestDistance: number | null;
}

/** Result of the brand colour check */
export interface ColorComplianceResult {
  pass: boolean;
  matched: ColorSample[];
  checks: BrandColorCheck[];
  palette: PaletteEntry[];
}

/** Tunables shared by shade generation, palette extraction and matching */
export interface ColorComplianceOptions {
  /** Max Euclidean RGB distance between a shade and a palette entry */
  colorDistanceThreshold: number;
  /** Per-channel offset between consecutive shades */
  shadeStep: number;
  /** Number of k-means clusters */
  paletteSize: number;
  /** PRNG seed for centroid initialisation */
  seed: number;
  /** Clusters at or below this weight are treated as noise */
  minClusterWeight: number;
}
