import fs from "fs";
import { CampaignBriefSchema, type CampaignBrief } from "@/types/api";
import { ConfigurationError, errorMessage } from "../errors";

/** Validate a raw campaign brief object */
export function parseCampaignBrief(raw: unknown): CampaignBrief {
  const result = CampaignBriefSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      "Campaign brief validation failed",
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return result.data;
}

export function loadCampaignBrief(briefPath: string): CampaignBrief {
  if (!fs.existsSync(briefPath)) {
    throw new ConfigurationError(`Campaign brief file not found: ${briefPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(briefPath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in campaign brief ${briefPath}`, [errorMessage(error)]);
  }

  return parseCampaignBrief(raw);
}
