import { describe, expect, it } from "vitest";
import { extractPalette } from "@/lib/colors/palette";
import { rgbDistance } from "@/lib/colors/vision";
import { createRaster, type RasterImage } from "@/lib/images/raster";
import { ConfigurationError, InvalidImageError } from "@/lib/errors";
import { validateBrandColors } from "@/lib/colors/compliance";
import { PRIMARY, SECONDARY, bandCanvas, runsImage } from "../helpers/rasters";

function gradient(width: number, height: number): RasterImage {
  const image = createRaster(width, height, { r: 0, g: 0, b: 0 });
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 4;
      image.data[i] = x * 8;
      image.data[i + 1] = y * 8;
      image.data[i + 2] = (x * y) % 256;
    }
  }
  return image;
}

describe("extractPalette", () => {
  it("returns the distinct colours directly when there are no more than k", () => {
    const image = runsImage(4, 4, [
      [[255, 0, 0], 12],
      [[0, 0, 255], 4],
    ]);

    const palette = extractPalette(image, 5);

    expect(palette).toEqual([
      { color: [255, 0, 0], hex: "#ff0000", weight: 0.75 },
      { color: [0, 0, 255], hex: "#0000ff", weight: 0.25 },
    ]);
  });

  it("orders equal weights by colour value", () => {
    const image = runsImage(2, 1, [
      [[255, 0, 0], 1],
      [[0, 255, 0], 1],
    ]);

    expect(extractPalette(image).map((entry) => entry.hex)).toEqual(["#00ff00", "#ff0000"]);
  });

  it("is deterministic for a given seed", () => {
    const image = gradient(32, 32);

    const first = extractPalette(image, 5, { seed: 7 });
    const second = extractPalette(image, 5, { seed: 7 });

    expect(second).toEqual(first);
  });

  it("returns at most k clusters whose weights sum to 1", () => {
    const palette = extractPalette(gradient(32, 32), 5);

    expect(palette.length).toBeGreaterThan(0);
    expect(palette.length).toBeLessThanOrEqual(5);
    expect(palette.reduce((sum, entry) => sum + entry.weight, 0)).toBeCloseTo(1, 10);
    for (let i = 1; i < palette.length; i++) {
      expect(palette[i].weight).toBeLessThanOrEqual(palette[i - 1].weight);
    }
  });

  it("reduces to a single cluster for k = 1", () => {
    const palette = extractPalette(gradient(16, 16), 1);

    expect(palette).toHaveLength(1);
    expect(palette[0].weight).toBe(1);
  });

  it("separates two tight colour groups", () => {
    const image = runsImage(10, 10, [
      [[250, 0, 0], 20],
      [[255, 0, 0], 20],
      [[245, 5, 0], 20],
      [[0, 0, 250], 15],
      [[0, 5, 255], 15],
      [[5, 0, 245], 10],
    ]);

    const palette = extractPalette(image, 2);

    expect(palette).toHaveLength(2);
    expect(palette[0].weight).toBeCloseTo(0.6, 10);
    expect(rgbDistance(palette[0].color, [250, 2, 0])).toBeLessThan(5);
    expect(palette[1].weight).toBeCloseTo(0.4, 10);
    expect(rgbDistance(palette[1].color, [1, 2, 251])).toBeLessThan(5);
  });

  it("sees a narrow vertical band on a large image", () => {
    const image = bandCanvas(1080, 1080, 1, 70);

    const palette = extractPalette(image);

    expect(palette.map((entry) => entry.hex)).toEqual(["#f2a900", "#1f6feb"]);
    expect(palette[0].weight).toBeCloseTo(113 / 120, 10);
    expect(palette[1].weight).toBeCloseTo(7 / 120, 10);
    expect(validateBrandColors(image, { primary: PRIMARY, secondary: SECONDARY }).pass).toBe(true);
  });

  it("skips fully transparent pixels", () => {
    const image = createRaster(2, 2, { r: 0, g: 0, b: 0, alpha: 0 });
    image.data.set([10, 20, 30, 255], 0);

    expect(extractPalette(image)).toEqual([{ color: [10, 20, 30], hex: "#0a141e", weight: 1 }]);
  });

  it("rejects an image with no visible pixels", () => {
    const image = createRaster(4, 4, { r: 0, g: 0, b: 0, alpha: 0 });

    expect(() => extractPalette(image)).toThrow(InvalidImageError);
  });

  it("rejects an empty raster", () => {
    expect(() => extractPalette({ width: 0, height: 0, data: new Uint8Array(0) })).toThrow(InvalidImageError);
  });

  it.each([0, -1, 2.5])("rejects palette size %s", (k) => {
    expect(() => extractPalette(gradient(4, 4), k)).toThrow(ConfigurationError);
  });
});
