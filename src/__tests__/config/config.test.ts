import { describe, expect, it } from "vitest";
import { gateOptionsFromConfig, loadConfig } from "@/lib/config";
import { ConfigurationError } from "@/lib/errors";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      colorDistanceThreshold: 40,
      shadeStep: 15,
      paletteSize: 5,
      paletteSeed: 42,
      minClusterWeight: 0.01,
      logoMatchThreshold: 0.7,
      logoSearchDimension: 256,
      logoScales: [0.5, 0.75, 1, 1.25, 1.5],
      legalMatchMode: "substring",
      prohibitedTermsPath: "data/prohibited-terms.json",
      outputDir: "outputs",
      reportsDir: "reports",
      blobToken: null,
      uploadEnabled: true,
      uploadBasePath: "creative-automation",
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      COLOR_DISTANCE_THRESHOLD: "25",
      LOGO_SCALES: "1, 2",
      LEGAL_MATCH_MODE: "word",
      UPLOAD_ENABLED: "no",
      BLOB_READ_WRITE_TOKEN: "test-token",
    });

    expect(config.colorDistanceThreshold).toBe(25);
    expect(config.logoScales).toEqual([1, 2]);
    expect(config.legalMatchMode).toBe("word");
    expect(config.uploadEnabled).toBe(false);
    expect(config.blobToken).toBe("test-token");
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ SHADE_STEP: "  " }).shadeStep).toBe(15);
  });

  it.each([
    ["SHADE_STEP", "80"],
    ["LOGO_MATCH_THRESHOLD", "1.5"],
    ["LOGO_SCALES", "1,abc"],
    ["LOGO_SCALES", "0.5,0.6,0.7,0.8,0.9,1,1.1,1.2,1.3,1.4"],
    ["LEGAL_MATCH_MODE", "fuzzy"],
    ["UPLOAD_ENABLED", "maybe"],
  ])("rejects %s=%s", (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow(ConfigurationError);
    expect(() => loadConfig({ [key]: value })).toThrow(key);
  });
});

describe("gateOptionsFromConfig", () => {
  it("maps config onto gate options", () => {
    const options = gateOptionsFromConfig(loadConfig({ PALETTE_SEED: "7", LOGO_SEARCH_DIMENSION: "128" }));

    expect(options.color).toMatchObject({ seed: 7, colorDistanceThreshold: 40, shadeStep: 15 });
    expect(options.logo).toEqual({ threshold: 0.7, searchDimension: 128, scales: [0.5, 0.75, 1, 1.25, 1.5] });
    expect(options.matchMode).toBe("substring");
  });
});
