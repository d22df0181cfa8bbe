import fs from "fs";
import path from "path";
import {
  ASPECT_RATIOS,
  type CampaignReport,
  type CampaignStatus,
  type CreativeComplianceRecord,
  type CreativeRecord,
  type LegalFindingRecord,
} from "@/types/api";
import { type ComplianceVerdict, matchedColorsAsHex } from "../compliance/gate";
import type { LegalFinding, LegalVerdict } from "../legal/types";

export interface ReportInput {
  campaignId: string;
  status: CampaignStatus;
  legal: LegalVerdict;
  records: CreativeRecord[];
  errors: string[];
  totalTimeSeconds: number;
  now?: Date;
}

/** Flatten a creative verdict into the report's JSON shape */
export function toComplianceRecord(verdict: ComplianceVerdict): CreativeComplianceRecord {
  return {
    logoFound: verdict.logo.found,
    logoConfidence: Math.round(verdict.logo.confidence * 1000) / 1000,
    logoLocation: verdict.logo.location,
    colorPass: verdict.colorPass,
    matchedColors: matchedColorsAsHex(verdict),
    overallPass: verdict.overallPass,
    violations: verdict.violations,
  };
}

/** e.g. `[ERROR] medical_claims: 'cures' in original message` */
export function formatLegalFlag(finding: LegalFinding): string {
  const category = finding.category ? ` ${finding.category}:` : "";
  const source = finding.source ? ` in ${finding.source} message` : "";
  return `[${finding.severity}]${category} '${finding.term}'${source}`;
}

function toFindingRecord(finding: LegalFinding): LegalFindingRecord {
  return {
    term: finding.term,
    severity: finding.severity,
    location: finding.location,
    category: finding.category ?? null,
    source: finding.source ?? null,
  };
}

export function buildReport(input: ReportInput): CampaignReport {
  const products: Record<string, CreativeRecord[]> = {};
  for (const record of input.records) {
    (products[record.productName] ??= []).push(record);
  }

  const compliancePassed = input.records.filter((r) => r.compliancePassed).length;

  return {
    campaignId: input.campaignId,
    timestamp: (input.now ?? new Date()).toISOString(),
    status: input.status,
    legal: {
      blocked: input.legal.blocked,
      highestSeverity: input.legal.highestSeverity,
      findings: input.legal.findings.map(toFindingRecord),
    },
    summary: {
      totalCreatives: input.records.length,
      totalProducts: Object.keys(products).length,
      aspectRatios: [...ASPECT_RATIOS],
      compliancePassed,
      complianceFailed: input.records.length - compliancePassed,
      totalLegalFlags: input.records.reduce((sum, r) => sum + r.legalFlags.length, 0),
      totalExecutionTimeSeconds: Math.round(input.totalTimeSeconds * 100) / 100,
    },
    products,
    errors: input.errors,
  };
}

/** `campaign_<id>_<yyyymmdd>_<hhmmss>.json`, UTC */
export function reportFileName(campaignId: string, now: Date): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").slice(0, 15).replace("T", "_");
  return `campaign_${campaignId}_${stamp}.json`;
}

export async function writeReport(report: CampaignReport, reportsDir: string): Promise<string> {
  await fs.promises.mkdir(reportsDir, { recursive: true });
  const reportPath = path.join(reportsDir, reportFileName(report.campaignId, new Date(report.timestamp)));
  await fs.promises.writeFile(reportPath, JSON.stringify(report, null, 2), "utf-8");
  return reportPath;
}

export function printSummary(report: CampaignReport, reportPath: string | null): void {
  const { summary } = report;
  console.log(`[Reporter] Campaign ${report.campaignId}: ${report.status}`);
  if (report.legal.findings.length > 0) {
    console.log(
      `[Reporter] Legal: ${report.legal.findings.length} finding(s), highest ${report.legal.highestSeverity}` +
        (report.legal.blocked ? " (BLOCKED)" : "")
    );
  }
  console.log(
    `[Reporter] Creatives: ${summary.totalCreatives} across ${summary.totalProducts} product(s) | ` +
      `compliance ${summary.compliancePassed} passed / ${summary.complianceFailed} failed | ` +
      `${summary.totalExecutionTimeSeconds}s`
  );
  for (const error of report.errors) {
    console.error(`[Reporter] Error: ${error}`);
  }
  if (reportPath) console.log(`[Reporter] Report: ${reportPath}`);
}
