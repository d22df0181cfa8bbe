import fs from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { describe, expect, it } from "vitest";
import { loadTermTable, parseTermTable } from "@/lib/legal/term-table";
import { ConfigurationError } from "@/lib/errors";

const TERMS_PATH = fileURLToPath(new URL("../../../data/prohibited-terms.json", import.meta.url));

describe("parseTermTable", () => {
  it("reads a flat term → severity table", () => {
    expect(parseTermTable({ cures: "ERROR", best: "WARNING" })).toEqual([
      { term: "cures", severity: "ERROR" },
      { term: "best", severity: "WARNING" },
    ]);
  });

  it("reads a categorised table, defaulting severity to WARNING", () => {
    const table = parseTermTable({
      medical_claims: { severity: "ERROR", words: ["cures", "heals"] },
      superlatives: { words: ["best"] },
    });

    expect(table).toEqual([
      { term: "cures", severity: "ERROR", category: "medical_claims" },
      { term: "heals", severity: "ERROR", category: "medical_claims" },
      { term: "best", severity: "WARNING", category: "superlatives" },
    ]);
  });

  it("keeps the highest severity for a repeated term", () => {
    const table = parseTermTable({
      absolute_claims: { severity: "WARNING", words: ["guaranteed", "always"] },
      financial_promises: { severity: "ERROR", words: ["Guaranteed"] },
    });

    expect(table).toEqual([
      { term: "Guaranteed", severity: "ERROR", category: "financial_promises" },
      { term: "always", severity: "WARNING", category: "absolute_claims" },
    ]);
  });

  it("freezes the result", () => {
    const table = parseTermTable({ cures: "ERROR" });

    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table[0])).toBe(true);
  });

  it.each([
    ["an unknown severity", { cures: "FATAL" }],
    ["a list", ["cures"]],
    ["a number", 42],
    ["words that are not a list", { medical: { severity: "ERROR", words: "cures" } }],
  ])("rejects %s", (_label, raw) => {
    expect(() => parseTermTable(raw)).toThrow(ConfigurationError);
  });
});

describe("loadTermTable", () => {
  it("loads the bundled table", () => {
    const table = loadTermTable(TERMS_PATH);

    expect(table).toHaveLength(24);
    expect(table).toContainEqual({ term: "cures", severity: "ERROR", category: "medical_claims" });
    expect(table).toContainEqual({ term: "best", severity: "WARNING", category: "unverified_superlatives" });
  });

  it("raises a configuration error for a missing file", () => {
    expect(() => loadTermTable(path.join(os.tmpdir(), "no-such-terms.json"))).toThrow(ConfigurationError);
  });

  it("raises a configuration error for invalid JSON", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "terms-"));
    const file = path.join(dir, "terms.json");
    fs.writeFileSync(file, "{ not json");

    expect(() => loadTermTable(file)).toThrow(/Invalid JSON/);

    fs.rmSync(dir, { recursive: true, force: true });
  });
});
