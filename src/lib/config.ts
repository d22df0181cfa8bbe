import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { ComplianceGateInit } from "./compliance/gate";
import { MAX_LOGO_SCALES } from "./images/logo-detector";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const scaleList = z
  .string()
  .transform((value) => value.split(",").map((part) => Number(part.trim())))
  .pipe(z.array(z.number().positive()).min(1).max(MAX_LOGO_SCALES));

const EnvSchema = z.object({
  COLOR_DISTANCE_THRESHOLD: z.coerce.number().positive().default(40),
  SHADE_STEP: z.coerce.number().int().min(1).max(51).default(15),
  PALETTE_SIZE: z.coerce.number().int().min(1).max(32).default(5),
  PALETTE_SEED: z.coerce.number().int().default(42),
  MIN_CLUSTER_WEIGHT: z.coerce.number().min(0).max(1).default(0.01),
  LOGO_MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  LOGO_SEARCH_DIMENSION: z.coerce.number().int().min(16).default(256),
  LOGO_SCALES: scaleList.default("0.5,0.75,1,1.25,1.5"),
  LEGAL_MATCH_MODE: z.enum(["substring", "word"]).default("substring"),
  PROHIBITED_TERMS_PATH: z.string().min(1).default("data/prohibited-terms.json"),
  OUTPUT_DIR: z.string().min(1).default("outputs"),
  REPORTS_DIR: z.string().min(1).default("reports"),
  BLOB_READ_WRITE_TOKEN: z.string().min(1).optional(),
  UPLOAD_ENABLED: booleanFlag.default("true"),
  UPLOAD_BASE_PATH: z.string().min(1).default("creative-automation"),
});

export interface AppConfig {
  colorDistanceThreshold: number;
  shadeStep: number;
  paletteSize: number;
  paletteSeed: number;
  minClusterWeight: number;
  logoMatchThreshold: number;
  logoSearchDimension: number;
  logoScales: number[];
  legalMatchMode: "substring" | "word";
  prohibitedTermsPath: string;
  outputDir: string;
  reportsDir: string;
  blobToken: string | null;
  uploadEnabled: boolean;
  uploadBasePath: string;
}

/**
 * Read settings from the environment. Empty strings count as unset so a
 * blank line in a .env file falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigurationError(
      "Invalid environment configuration",
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const e = result.data;
  return Object.freeze({
    colorDistanceThreshold: e.COLOR_DISTANCE_THRESHOLD,
    shadeStep: e.SHADE_STEP,
    paletteSize: e.PALETTE_SIZE,
    paletteSeed: e.PALETTE_SEED,
    minClusterWeight: e.MIN_CLUSTER_WEIGHT,
    logoMatchThreshold: e.LOGO_MATCH_THRESHOLD,
    logoSearchDimension: e.LOGO_SEARCH_DIMENSION,
    logoScales: e.LOGO_SCALES,
    legalMatchMode: e.LEGAL_MATCH_MODE,
    prohibitedTermsPath: e.PROHIBITED_TERMS_PATH,
    outputDir: e.OUTPUT_DIR,
    reportsDir: e.REPORTS_DIR,
    blobToken: e.BLOB_READ_WRITE_TOKEN ?? null,
    uploadEnabled: e.UPLOAD_ENABLED,
    uploadBasePath: e.UPLOAD_BASE_PATH,
  });
}

/** Gate tunables taken from the loaded config */
export function gateOptionsFromConfig(config: AppConfig): ComplianceGateInit {
  return {
    color: {
      colorDistanceThreshold: config.colorDistanceThreshold,
      shadeStep: config.shadeStep,
      paletteSize: config.paletteSize,
      seed: config.paletteSeed,
      minClusterWeight: config.minClusterWeight,
    },
    logo: {
      threshold: config.logoMatchThreshold,
      searchDimension: config.logoSearchDimension,
      scales: config.logoScales,
    },
    matchMode: config.legalMatchMode,
  };
}
