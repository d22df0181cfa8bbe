import { describe, expect, it } from "vitest";
import { generateShadeSet, SHADE_RANGE } from "@/lib/colors/shades";

describe("generateShadeSet", () => {
  it("returns 11 shades with the original colour in the middle", () => {
    const shades = generateShadeSet([100, 150, 200], 15);

    expect(shades).toHaveLength(2 * SHADE_RANGE + 1);
    expect(shades[5]).toEqual([100, 150, 200]);
    expect(shades[0]).toEqual([25, 75, 125]);
    expect(shades[4]).toEqual([85, 135, 185]);
    expect(shades[6]).toEqual([115, 165, 215]);
  });

  it("clamps channels to [0, 255]", () => {
    const shades = generateShadeSet([250, 10, 128], 15);

    expect(shades[0]).toEqual([175, 0, 53]);
    expect(shades[10]).toEqual([255, 85, 203]);
  });

  it("never decreases along the set on any channel", () => {
    const shades = generateShadeSet([3, 240, 77], 30);

    for (let i = 1; i < shades.length; i++) {
      for (let c = 0; c < 3; c++) {
        expect(shades[i][c]).toBeGreaterThanOrEqual(shades[i - 1][c]);
      }
    }
  });

  it("uses the default step of 15", () => {
    expect(generateShadeSet([100, 100, 100])[6]).toEqual([115, 115, 115]);
  });
});
