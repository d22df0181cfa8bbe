import { z } from "zod";
import { SEVERITIES } from "@/lib/legal/severity";
import type { Severity } from "@/lib/legal/severity";
import type { MessageSource } from "@/lib/legal/types";

// ─── Campaign brief ─────────────────────────────────────────────────────

const HexColorSchema = z
  .string()
  .trim()
  .regex(/^#[0-9A-Fa-f]{6}$/, "Expected a #RRGGBB colour");

export const BrandSpecSchema = z.object({
  logoPath: z.string().trim().min(1, "Logo reference is required"),
  primaryColor: HexColorSchema,
  secondaryColor: HexColorSchema,
  fontName: z.string().trim().min(1),
  theme: z.string().trim().min(1),
  domain: z.string().trim().optional(),
});

export type BrandSpec = z.infer<typeof BrandSpecSchema>;

export const ProductSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().trim().min(1),
  assetPath: z.string().trim().optional(),
});

export type Product = z.infer<typeof ProductSchema>;

export const CampaignBriefSchema = z.object({
  campaignId: z.string().trim().min(1),
  products: z.array(ProductSchema).min(1, "At least one product is required"),
  region: z.string().trim().min(1),
  targetAudience: z.string().trim().min(1),
  campaignMessage: z.string().trim().min(1).max(500),
  brand: BrandSpecSchema,
});

export type CampaignBrief = z.infer<typeof CampaignBriefSchema>;

// ─── Prohibited-term tables ─────────────────────────────────────────────

export const SeveritySchema = z.enum(SEVERITIES);

/** `{ "cures": "ERROR", "best": "WARNING" }` */
export const FlatTermTableSchema = z.record(z.string().trim().min(1), SeveritySchema);

/** `{ "medical_claims": { "severity": "ERROR", "words": ["cures"] } }` */
export const CategorisedTermTableSchema = z.record(
  z.string().trim().min(1),
  z.object({
    severity: SeveritySchema.default("WARNING"),
    words: z.array(z.string().trim().min(1)),
  })
);

export const TermTableSchema = z.union([FlatTermTableSchema, CategorisedTermTableSchema]);

export type TermTableInput = z.input<typeof TermTableSchema>;

// ─── Report ─────────────────────────────────────────────────────────────

export const ASPECT_RATIOS = ["1:1", "9:16", "16:9"] as const;

export type AspectRatio = (typeof ASPECT_RATIOS)[number];

export interface CreativeComplianceRecord {
  logoFound: boolean;
  logoConfidence: number;
  logoLocation: { x: number; y: number; width: number; height: number } | null;
  colorPass: boolean;
  matchedColors: string[];
  overallPass: boolean;
  violations: string[];
}

export interface CreativeRecord {
  productName: string;
  aspectRatio: AspectRatio;
  outputPath: string | null;
  language: string;
  translatedMessage: string;
  /** null when the creative could not be produced or evaluated */
  compliance: CreativeComplianceRecord | null;
  compliancePassed: boolean;
  error: string | null;
  legalFlags: string[];
  generationTimeSeconds: number;
  uploadedUrl: string | null;
}

export interface LegalFindingRecord {
  term: string;
  severity: Severity;
  location: string;
  category: string | null;
  source: MessageSource | null;
}

export type CampaignStatus = "blocked" | "completed" | "completed_with_errors";

export interface CampaignReport {
  campaignId: string;
  timestamp: string;
  status: CampaignStatus;
  legal: {
    blocked: boolean;
    highestSeverity: Severity | null;
    findings: LegalFindingRecord[];
  };
  summary: {
    totalCreatives: number;
    totalProducts: number;
    aspectRatios: AspectRatio[];
    compliancePassed: number;
    complianceFailed: number;
    totalLegalFlags: number;
    totalExecutionTimeSeconds: number;
  };
  products: Record<string, CreativeRecord[]>;
  errors: string[];
}
