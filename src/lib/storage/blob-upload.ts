import fs from "fs";
import path from "path";
import { put } from "@vercel/blob";
import type { AppConfig } from "../config";
import { safeProductName } from "../creatives/composer";
import { errorMessage } from "../errors";

export interface UploadedAsset {
  localPath: string;
  url: string;
}

export interface FailedUpload {
  localPath: string;
  error: string;
}

/** Per-file outcome of a batch; one failed file does not void the others */
export interface UploadBatch {
  uploaded: UploadedAsset[];
  failed: FailedUpload[];
}

/** Pushes finished creatives and reports to shared storage */
export interface AssetUploader {
  uploadCampaignAssets(campaignId: string, productName: string, files: string[]): Promise<UploadBatch>;
  uploadReport(campaignId: string, reportPath: string): Promise<string>;
}

const CONTENT_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".webp": "image/webp",
  ".json": "application/json",
};

/**
 * Uploader backed by Vercel Blob. Pathnames are
 * `<basePath>/<campaignId>/<product>/<file>`; reports go under
 * `<basePath>/<campaignId>/reports/`.
 */
export class BlobUploader implements AssetUploader {
  constructor(
    private readonly token: string,
    private readonly basePath: string
  ) {}

  async uploadCampaignAssets(campaignId: string, productName: string, files: string[]): Promise<UploadBatch> {
    const prefix = `${this.basePath}/${campaignId}/${safeProductName(productName)}`;
    const results = await Promise.allSettled(
      files.map((localPath) => this.upload(localPath, `${prefix}/${path.basename(localPath)}`))
    );

    const batch: UploadBatch = { uploaded: [], failed: [] };
    results.forEach((result, i) => {
      const localPath = files[i];
      if (result.status === "fulfilled") {
        batch.uploaded.push({ localPath, url: result.value });
      } else {
        console.error(`[blob-upload] ${localPath} failed: ${errorMessage(result.reason)}`);
        batch.failed.push({ localPath, error: errorMessage(result.reason) });
      }
    });
    return batch;
  }

  async uploadReport(campaignId: string, reportPath: string): Promise<string> {
    return this.upload(reportPath, `${this.basePath}/${campaignId}/reports/${path.basename(reportPath)}`);
  }

  private async upload(localPath: string, pathname: string): Promise<string> {
    const body = await fs.promises.readFile(localPath);
    const blob = await put(pathname, body, {
      access: "public",
      contentType: CONTENT_TYPES[path.extname(localPath).toLowerCase()] ?? "application/octet-stream",
      addRandomSuffix: false,
      token: this.token,
    });
    console.log(`[blob-upload] ${localPath} → ${blob.url}`);
    return blob.url;
  }
}

/**
 * Uploader for the configured environment, or null when uploads are off or
 * no BLOB_READ_WRITE_TOKEN is set.
 */
export function createUploader(config: AppConfig): AssetUploader | null {
  if (!config.uploadEnabled) return null;
  if (!config.blobToken) {
    console.warn("[blob-upload] BLOB_READ_WRITE_TOKEN not set, uploads disabled");
    return null;
  }
  return new BlobUploader(config.blobToken, config.uploadBasePath);
}
