/**
 * Creative Composer
 *
 * Renders one campaign creative per product and aspect ratio: a primary
 * background with a secondary-colour panel along the bottom, the optional
 * product shot, the campaign message and the brand logo in the bottom-right
 * corner. Both brand colours are laid down as solid areas so the rendered
 * creative carries them at full strength. Everything is drawn locally
 * with Sharp from an SVG, so runs are repeatable and need no remote API.
 */

import fs from "fs";
import path from "path";
import sharp from "sharp";
import chroma from "chroma-js";
import type { AspectRatio, BrandSpec, Product } from "@/types/api";
import { scaleToFit } from "../images/raster";

// ─── Constants ──────────────────────────────────────────────────────────

export const CANVAS_SIZES: Record<AspectRatio, { width: number; height: number }> = {
  "1:1": { width: 1080, height: 1080 },
  "9:16": { width: 1080, height: 1920 },
  "16:9": { width: 1920, height: 1080 },
};

/** Longest side of the placed logo, as a share of the canvas' shorter side */
const LOGO_SHARE = 0.18;
const MARGIN_SHARE = 0.04;
const PRODUCT_SHARE = 0.55;
/** Height of the secondary-colour panel, as a share of the canvas height */
const PANEL_SHARE = 0.3;

// ─── Types ──────────────────────────────────────────────────────────────

export interface CreativeRequest {
  campaignId: string;
  product: Product;
  brand: BrandSpec;
  /** Message as it should appear on the creative (already translated) */
  message: string;
  aspectRatio: AspectRatio;
}

export interface ComposedCreative {
  outputPath: string;
  buffer: Buffer;
}

export interface CreativeComposer {
  compose(request: CreativeRequest): Promise<ComposedCreative>;
}

/** Longest side, in pixels, of the logo as placed on a canvas */
export function placedLogoSize(aspectRatio: AspectRatio): number {
  const { width, height } = CANVAS_SIZES[aspectRatio];
  return Math.round(Math.min(width, height) * LOGO_SHARE);
}

/** File-system-safe product folder name */
export function safeProductName(name: string): string {
  return name.replace(/[^A-Za-z0-9_ ]/g, "_").trim().replace(/ +/g, "_");
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Greedy word wrap by character budget */
function wrapLines(text: string, maxChars: number): string[] {
  const lines: string[] = [];
  let current = "";
  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (current && current.length + word.length + 1 > maxChars) {
      lines.push(current);
      current = word;
    } else {
      current = current ? `${current} ${word}` : word;
    }
  }
  if (current) lines.push(current);
  return lines;
}

// ─── Composer ───────────────────────────────────────────────────────────

export class SharpCreativeComposer implements CreativeComposer {
  constructor(private readonly outputDir: string) {}

  async compose(request: CreativeRequest): Promise<ComposedCreative> {
    const { width, height } = CANVAS_SIZES[request.aspectRatio];
    const shorter = Math.min(width, height);
    const margin = Math.round(shorter * MARGIN_SHARE);

    const background = await sharp(Buffer.from(this.backgroundSvg(request, width, height)))
      .resize(width, height)
      .png()
      .toBuffer();

    const layers: sharp.OverlayOptions[] = [];

    if (request.product.assetPath && fs.existsSync(request.product.assetPath)) {
      const productSize = Math.round(shorter * PRODUCT_SHARE);
      const productShot = await sharp(request.product.assetPath)
        .resize(productSize, productSize, { fit: "inside" })
        .png()
        .toBuffer();
      const meta = await sharp(productShot).metadata();
      layers.push({
        input: productShot,
        left: Math.round((width - (meta.width ?? productSize)) / 2),
        top: Math.round((height - (meta.height ?? productSize)) / 2),
      });
    }

    const logo = await scaleToFit(request.brand.logoPath, placedLogoSize(request.aspectRatio));
    const logoMeta = await sharp(logo).metadata();
    layers.push({
      input: logo,
      left: width - margin - (logoMeta.width ?? 0),
      top: height - margin - (logoMeta.height ?? 0),
    });

    const buffer = await sharp(background).composite(layers).png().toBuffer();

    const ratioName = request.aspectRatio.replace(":", "x");
    const outputPath = path.join(
      this.outputDir,
      request.campaignId,
      safeProductName(request.product.name),
      `${ratioName}.png`
    );
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.promises.writeFile(outputPath, buffer);

    return { outputPath, buffer };
  }

  /** Primary field, secondary panel below, message in a darker primary band */
  private backgroundSvg(request: CreativeRequest, width: number, height: number): string {
    const primary = chroma(request.brand.primaryColor);
    const secondary = chroma(request.brand.secondaryColor);
    const band = primary.darken(1.2).hex();
    const textColor = chroma.contrast(band, "#ffffff") >= 4.5 ? "#ffffff" : "#111111";

    const fontSize = Math.round(Math.min(width, height) * 0.05);
    const maxChars = Math.max(12, Math.floor(width / (fontSize * 0.6)) - 4);
    const lines = wrapLines(request.message, maxChars).slice(0, 4);
    const bandHeight = Math.round(fontSize * 1.4 * lines.length + fontSize * 1.6);
    const bandTop = Math.round(height * 0.08);
    const panelTop = Math.round(height * (1 - PANEL_SHARE));

    const text = lines
      .map(
        (line, i) =>
          `<text x="${Math.round(width * 0.06)}" y="${bandTop + Math.round(fontSize * 1.4 * (i + 1))}" ` +
          `font-family="${escapeXml(request.brand.fontName)}, sans-serif" font-size="${fontSize}" ` +
          `font-weight="700" fill="${textColor}">${escapeXml(line)}</text>`
      )
      .join("\n");

    return `
      <svg width="${width}" height="${height}" xmlns="http://www.w3.org/2000/svg">
        <rect width="${width}" height="${height}" fill="${primary.hex()}"/>
        <rect x="0" y="${panelTop}" width="${width}" height="${height - panelTop}" fill="${secondary.hex()}"/>
        <rect x="0" y="${bandTop}" width="${width}" height="${bandHeight}" fill="${band}" opacity="0.85"/>
        ${text}
      </svg>
    `;
  }
}
