/**
 * Campaign pipeline
 *
 * Order of work:
 *   1. legal screen of the original message   → stop here if blocked
 *   2. translate, screen original + translated → stop here if blocked
 *   3. resolve brand (colours, logo)           → configuration errors are fatal
 *   4. per product × aspect ratio: compose, decode, evaluate
 *   5. per product: upload; then report
 *
 * A blocked message stops the campaign before any composition or upload.
 * Anything that goes wrong with one creative or one upload is recorded and
 * the rest of the campaign carries on.
 */

import fs from "fs";
import {
  ASPECT_RATIOS,
  type BrandSpec,
  type CampaignBrief,
  type CampaignReport,
  type CampaignStatus,
  type CreativeRecord,
} from "@/types/api";
import { CampaignBlockedError, errorMessage } from "../errors";
import type { ComplianceGate } from "../compliance/gate";
import type { ResolvedBrand } from "../compliance/brand";
import { decodeImage, type RasterImage } from "../images/raster";
import type { LegalVerdict, TermTable } from "../legal/types";
import type { CreativeComposer } from "../creatives/composer";
import { languageForRegion, type MessageTranslator } from "../creatives/translator";
import type { AssetUploader } from "../storage/blob-upload";
import {
  buildReport,
  formatLegalFlag,
  printSummary,
  toComplianceRecord,
  writeReport,
} from "../report/reporter";

export interface CampaignDependencies {
  gate: ComplianceGate;
  termTable: TermTable;
  translator: MessageTranslator;
  composer: CreativeComposer;
  uploader: AssetUploader | null;
  resolveBrand: (spec: BrandSpec) => Promise<ResolvedBrand>;
  /** Where to write the JSON report; null keeps it in memory only */
  reportsDir: string | null;
  decode?: (buffer: Buffer) => Promise<RasterImage>;
}

export interface CampaignRunResult {
  status: CampaignStatus;
  legal: LegalVerdict;
  report: CampaignReport;
  reportPath: string | null;
  /** Set when the legal screen stopped the campaign */
  blockedBy: CampaignBlockedError | null;
}

export async function runCampaign(brief: CampaignBrief, deps: CampaignDependencies): Promise<CampaignRunResult> {
  const started = Date.now();
  const decode = deps.decode ?? decodeImage;
  const elapsed = () => (Date.now() - started) / 1000;

  console.log(
    `[Pipeline] Campaign: ${brief.campaignId} | Products: ${brief.products.length} | Region: ${brief.region}`
  );

  // ── 1. Original message, before paying for a translation ──────────────
  const originalVerdict = deps.gate.screenMessage(brief.campaignMessage, deps.termTable);
  if (originalVerdict.blocked) {
    return finishBlocked(brief, originalVerdict, deps, elapsed());
  }

  // ── 2. Translated message ─────────────────────────────────────────────
  const language = languageForRegion(brief.region);
  const translated = await deps.translator.translate(brief.campaignMessage, language, brief.targetAudience);
  const legal = deps.gate.evaluateMessage(brief.campaignMessage, translated, deps.termTable);
  if (legal.blocked) {
    return finishBlocked(brief, legal, deps, elapsed());
  }
  if (legal.findings.length > 0) {
    console.warn(`[Pipeline] Legal warnings: ${legal.findings.length} issue(s)`);
  }

  // ── 3. Brand ──────────────────────────────────────────────────────────
  const brand = await deps.resolveBrand(brief.brand);
  const legalFlags = legal.findings.map(formatLegalFlag);

  // ── 4 + 5. Creatives and uploads ──────────────────────────────────────
  const records: CreativeRecord[] = [];
  const errors: string[] = [];

  for (const product of brief.products) {
    console.log(`[Pipeline] Processing: ${product.name}`);
    const productRecords: CreativeRecord[] = [];

    for (const aspectRatio of ASPECT_RATIOS) {
      const creativeStarted = Date.now();
      const record: CreativeRecord = {
        productName: product.name,
        aspectRatio,
        outputPath: null,
        language,
        translatedMessage: translated,
        compliance: null,
        compliancePassed: false,
        error: null,
        legalFlags,
        generationTimeSeconds: 0,
        uploadedUrl: null,
      };

      try {
        const composed = await deps.composer.compose({
          campaignId: brief.campaignId,
          product,
          brand: brief.brand,
          message: translated,
          aspectRatio,
        });
        record.outputPath = composed.outputPath;

        const image = await decode(composed.buffer);
        const verdict = deps.gate.evaluateCreative(image, brand);
        record.compliance = toComplianceRecord(verdict);
        record.compliancePassed = verdict.overallPass;

        if (!verdict.overallPass) {
          console.warn(
            `[Pipeline] COMPLIANCE FAILED | Product: ${product.name} | Aspect: ${aspectRatio} | ` +
              `Violations: ${verdict.violations.join(", ")}`
          );
        }
      } catch (error) {
        const message = `${product.name} (${aspectRatio}): ${errorMessage(error)}`;
        console.error(`[Pipeline] Creative failed: ${message}`);
        record.error = errorMessage(error);
        errors.push(message);
      }

      record.generationTimeSeconds = Math.round((Date.now() - creativeStarted) / 10) / 100;
      productRecords.push(record);
    }

    if (deps.uploader) {
      await uploadProduct(brief.campaignId, product.name, product.assetPath, productRecords, deps.uploader, errors);
    }

    records.push(...productRecords);
  }

  const status: CampaignStatus = errors.length === 0 ? "completed" : "completed_with_errors";
  const report = buildReport({
    campaignId: brief.campaignId,
    status,
    legal,
    records,
    errors,
    totalTimeSeconds: elapsed(),
  });

  let reportPath: string | null = null;
  if (deps.reportsDir) {
    reportPath = await writeReport(report, deps.reportsDir);
    if (deps.uploader) {
      try {
        await deps.uploader.uploadReport(brief.campaignId, reportPath);
      } catch (error) {
        const message = `Report upload failed: ${errorMessage(error)}`;
        console.error(`[Pipeline] ${message}`);
        report.errors.push(message);
        report.status = "completed_with_errors";
      }
    }
  }

  printSummary(report, reportPath);
  return { status: report.status, legal, report, reportPath, blockedBy: null };
}

async function uploadProduct(
  campaignId: string,
  productName: string,
  assetPath: string | undefined,
  records: CreativeRecord[],
  uploader: AssetUploader,
  errors: string[]
): Promise<void> {
  const files = records.flatMap((r) => (r.outputPath ? [r.outputPath] : []));
  if (assetPath && fs.existsSync(assetPath)) files.unshift(assetPath);
  if (files.length === 0) return;

  try {
    const batch = await uploader.uploadCampaignAssets(campaignId, productName, files);
    for (const asset of batch.uploaded) {
      const record = records.find((r) => r.outputPath === asset.localPath);
      if (record) record.uploadedUrl = asset.url;
    }
    for (const failure of batch.failed) {
      errors.push(`Upload failed for ${productName} (${failure.localPath}): ${failure.error}`);
    }
  } catch (error) {
    const message = `Upload failed for ${productName}: ${errorMessage(error)}`;
    console.error(`[Pipeline] ${message}`);
    errors.push(message);
  }
}

async function finishBlocked(
  brief: CampaignBrief,
  legal: LegalVerdict,
  deps: CampaignDependencies,
  totalTimeSeconds: number
): Promise<CampaignRunResult> {
  const blockedBy = new CampaignBlockedError(legal);
  console.error(`[Pipeline] ${blockedBy.message}`);

  const report = buildReport({
    campaignId: brief.campaignId,
    status: "blocked",
    legal,
    records: [],
    errors: [blockedBy.message],
    totalTimeSeconds,
  });
  const reportPath = deps.reportsDir ? await writeReport(report, deps.reportsDir) : null;
  printSummary(report, reportPath);

  return { status: "blocked", legal, report, reportPath, blockedBy };
}
