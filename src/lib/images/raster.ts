import sharp from "sharp";
import { InvalidImageError } from "../errors";

/** Decoded RGBA image, 4 bytes per pixel, row-major. */
export interface RasterImage {
  width: number;
  height: number;
  data: Uint8Array;
}

export interface Rgba {
  r: number;
  g: number;
  b: number;
  alpha?: number;
}

/** Alpha at or above this counts as part of a logo mark. */
export const OPAQUE_ALPHA = 128;

/**
 * Decode an encoded image (PNG, JPEG, WebP, SVG…) or a file path into RGBA.
 * This is the only async step; everything downstream works on the raster.
 */
export async function decodeImage(input: Buffer | string): Promise<RasterImage> {
  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await sharp(input)
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (error) {
    const source = typeof input === "string" ? input : `${input.length}-byte buffer`;
    throw new InvalidImageError(`Cannot decode image (${source})`, { cause: error });
  }

  const { data, info } = decoded;
  if (info.width < 1 || info.height < 1 || info.channels !== 4) {
    throw new InvalidImageError(
      `Decoded image has unusable shape ${info.width}×${info.height}×${info.channels}`
    );
  }

  return { width: info.width, height: info.height, data: new Uint8Array(data) };
}

/**
 * Re-encode an image as PNG with its longest side at `size`. The composer
 * places logos this way and the brand resolver reads the reference logo the
 * same way, so a placed logo meets the detector at scale 1.
 */
export async function scaleToFit(input: Buffer | string, size: number): Promise<Buffer> {
  return sharp(input)
    .ensureAlpha()
    .resize(size, size, { fit: "inside" })
    .png()
    .toBuffer();
}

/** Throws unless the raster is at least 1×1 with a matching buffer. */
export function assertRaster(image: RasterImage, label = "image"): void {
  if (
    !Number.isInteger(image.width) ||
    !Number.isInteger(image.height) ||
    image.width < 1 ||
    image.height < 1
  ) {
    throw new InvalidImageError(`${label} has no pixels (${image.width}×${image.height})`);
  }
  if (image.data.length !== image.width * image.height * 4) {
    throw new InvalidImageError(
      `${label} buffer length ${image.data.length} does not match ${image.width}×${image.height} RGBA`
    );
  }
}

/** Blank raster filled with one colour (opaque unless alpha is given). */
export function createRaster(width: number, height: number, fill: Rgba): RasterImage {
  const data = new Uint8Array(width * height * 4);
  const alpha = fill.alpha ?? 255;
  for (let i = 0; i < data.length; i += 4) {
    data[i] = fill.r;
    data[i + 1] = fill.g;
    data[i + 2] = fill.b;
    data[i + 3] = alpha;
  }
  return { width, height, data };
}

/**
 * Bilinear resample to the given size. Returns a copy even when the size is
 * unchanged so callers never alias the input buffer.
 */
export function resizeRaster(image: RasterImage, width: number, height: number): RasterImage {
  if (width === image.width && height === image.height) {
    return { width, height, data: image.data.slice() };
  }

  const out = new Uint8Array(width * height * 4);
  const xRatio = image.width / width;
  const yRatio = image.height / height;

  for (let y = 0; y < height; y++) {
    const srcY = Math.min(Math.max((y + 0.5) * yRatio - 0.5, 0), image.height - 1);
    const y0 = Math.floor(srcY);
    const y1 = Math.min(y0 + 1, image.height - 1);
    const fy = srcY - y0;

    for (let x = 0; x < width; x++) {
      const srcX = Math.min(Math.max((x + 0.5) * xRatio - 0.5, 0), image.width - 1);
      const x0 = Math.floor(srcX);
      const x1 = Math.min(x0 + 1, image.width - 1);
      const fx = srcX - x0;

      const i00 = (y0 * image.width + x0) * 4;
      const i01 = (y0 * image.width + x1) * 4;
      const i10 = (y1 * image.width + x0) * 4;
      const i11 = (y1 * image.width + x1) * 4;
      const o = (y * width + x) * 4;

      for (let c = 0; c < 4; c++) {
        const top = image.data[i00 + c] * (1 - fx) + image.data[i01 + c] * fx;
        const bottom = image.data[i10 + c] * (1 - fx) + image.data[i11 + c] * fx;
        out[o + c] = Math.round(top * (1 - fy) + bottom * fy);
      }
    }
  }

  return { width, height, data: out };
}

/**
 * Rec. 601 luma per pixel, with alpha composited over white so transparent
 * areas read as background rather than black.
 */
export function toGrayscale(image: RasterImage): Float64Array {
  const gray = new Float64Array(image.width * image.height);
  for (let p = 0, i = 0; p < gray.length; p++, i += 4) {
    const a = image.data[i + 3] / 255;
    const luma = 0.299 * image.data[i] + 0.587 * image.data[i + 1] + 0.114 * image.data[i + 2];
    gray[p] = luma * a + 255 * (1 - a);
  }
  return gray;
}

/** 1 where the pixel's alpha is at least `minAlpha`, else 0. */
export function opaqueMask(image: RasterImage, minAlpha = OPAQUE_ALPHA): Uint8Array {
  const mask = new Uint8Array(image.width * image.height);
  for (let p = 0; p < mask.length; p++) {
    mask[p] = image.data[p * 4 + 3] >= minAlpha ? 1 : 0;
  }
  return mask;
}
