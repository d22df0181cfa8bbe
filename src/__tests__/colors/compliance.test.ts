import { describe, expect, it } from "vitest";
import { validateBrandColors } from "@/lib/colors/compliance";
import { createRaster } from "@/lib/images/raster";
import { PRIMARY, SECONDARY, runsImage } from "../helpers/rasters";

const brand = { primary: PRIMARY, secondary: SECONDARY };

describe("validateBrandColors", () => {
  it("passes when both brand colours fill the image", () => {
    const image = runsImage(10, 10, [
      [PRIMARY, 50],
      [SECONDARY, 50],
    ]);

    const result = validateBrandColors(image, brand);

    expect(result.pass).toBe(true);
    expect(result.checks.map((check) => check.present)).toEqual([true, true]);
    expect(result.checks[0].nearestDistance).toBe(0);
    expect(result.matched).toEqual([
      [16, 96, 220],
      [31, 111, 235],
      [46, 126, 250],
      [227, 154, 0],
      [242, 169, 0],
      [255, 184, 15],
    ]);
  });

  it("fails with nothing matched when neither colour appears", () => {
    const image = createRaster(8, 8, { r: 0, g: 0, b: 0 });

    const result = validateBrandColors(image, brand);

    expect(result.pass).toBe(false);
    expect(result.matched).toEqual([]);
    expect(result.checks.every((check) => !check.present)).toBe(true);
    expect(result.checks[0].nearestDistance).toBeGreaterThan(40);
  });

  it("fails when only the primary colour is present", () => {
    const image = createRaster(8, 8, { r: PRIMARY[0], g: PRIMARY[1], b: PRIMARY[2] });

    const result = validateBrandColors(image, brand);

    expect(result.pass).toBe(false);
    expect(result.checks[0]).toMatchObject({ role: "primary", hex: "#1f6feb", present: true });
    expect(result.checks[1]).toMatchObject({ role: "secondary", hex: "#f2a900", present: false });
    expect(result.matched).toHaveLength(3);
  });

  it.each([
    [10, false],
    [20, true],
    [25, true],
  ])("with threshold %s a colour 20 units off the primary is present: %s", (threshold, expected) => {
    const image = createRaster(4, 4, { r: PRIMARY[0] + 20, g: PRIMARY[1], b: PRIMARY[2] });

    const result = validateBrandColors(image, brand, { colorDistanceThreshold: threshold });

    expect(result.checks[0].present).toBe(expected);
  });

  it("ignores clusters at or below the minimum weight", () => {
    const image = runsImage(20, 10, [
      [PRIMARY, 199],
      [SECONDARY, 1],
    ]);

    expect(validateBrandColors(image, brand).pass).toBe(false);
    expect(validateBrandColors(image, brand, { minClusterWeight: 0.001 }).pass).toBe(true);
  });

  it("matches lighter and darker shades of a brand colour", () => {
    const image = runsImage(10, 10, [
      [[91, 171, 255], 50],
      [[182, 109, 0], 50],
    ]);

    const result = validateBrandColors(image, brand);

    expect(result.pass).toBe(true);
    expect(result.checks[0].matchedShades).toContainEqual([91, 171, 255]);
    expect(result.checks[1].matchedShades).toContainEqual([182, 109, 0]);
  });
});
