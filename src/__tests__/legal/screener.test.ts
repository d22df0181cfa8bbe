import { describe, expect, it } from "vitest";
import { mergeVerdicts, screenText } from "@/lib/legal/screener";
import type { TermTable } from "@/lib/legal/types";

const table: TermTable = [
  { term: "cures", severity: "ERROR", category: "medical_claims" },
  { term: "best", severity: "WARNING" },
];

describe("screenText", () => {
  it("blocks a message with an ERROR term", () => {
    const verdict = screenText("this treatment cures cancer", [{ term: "cures", severity: "ERROR" }]);

    expect(verdict.blocked).toBe(true);
    expect(verdict.highestSeverity).toBe("ERROR");
    expect(verdict.findings).toEqual([
      { term: "cures", severity: "ERROR", location: "this treatment cures cancer", index: 15 },
    ]);
  });

  it("lets WARNING terms through", () => {
    const verdict = screenText("the best toothpaste ever", [{ term: "best", severity: "WARNING" }]);

    expect(verdict.blocked).toBe(false);
    expect(verdict.highestSeverity).toBe("WARNING");
    expect(verdict.findings).toHaveLength(1);
  });

  it("returns an empty verdict for a clean message", () => {
    expect(screenText("fresh fruit flavour", table)).toEqual({
      findings: [],
      blocked: false,
      highestSeverity: null,
    });
  });

  it("matches case-insensitively", () => {
    const verdict = screenText("CURES everything", table);

    expect(verdict.findings[0]).toMatchObject({ term: "cures", index: 0, category: "medical_claims" });
  });

  it("reports every occurrence in text order", () => {
    const verdict = screenText("best way: it cures colds, cures flu", table);

    expect(verdict.findings.map((f) => [f.term, f.index])).toEqual([
      ["best", 0],
      ["cures", 13],
      ["cures", 26],
    ]);
  });

  it("matches inside longer words in substring mode only", () => {
    expect(screenText("the securest option", table).findings).toHaveLength(1);
    expect(screenText("the securest option", table, { matchMode: "word" }).findings).toHaveLength(0);
    expect(screenText("it cures, fast", table, { matchMode: "word" }).findings).toHaveLength(1);
  });

  it("treats accented letters as part of a word", () => {
    const accented: TermTable = [{ term: "café", severity: "WARNING" }];

    expect(screenText("les cafés", accented, { matchMode: "word" }).findings).toHaveLength(0);
    expect(screenText("un café noir", accented, { matchMode: "word" }).findings).toHaveLength(1);
  });

  it("escapes terms with regex characters", () => {
    const special: TermTable = [
      { term: "#1", severity: "WARNING" },
      { term: "100%", severity: "WARNING" },
    ];

    const verdict = screenText("the #1 choice, 100% natural", special);

    expect(verdict.findings.map((f) => f.index)).toEqual([4, 15]);
  });

  it("lists the longer term first when two start at the same offset", () => {
    const overlapping: TermTable = [
      { term: "cure", severity: "WARNING" },
      { term: "cure cancer", severity: "ERROR" },
    ];

    const verdict = screenText("we cure cancer", overlapping);

    expect(verdict.findings.map((f) => f.term)).toEqual(["cure cancer", "cure"]);
  });

  it("clips long excerpts around the hit", () => {
    const text = `${"x".repeat(30)} cures ${"y".repeat(30)}`;

    const [finding] = screenText(text, table).findings;

    expect(finding.location).toBe(`…${"x".repeat(23)} cures ${"y".repeat(23)}…`);
  });

  it("tags findings with their source", () => {
    const verdict = screenText("best", table, { source: "translated" });

    expect(verdict.findings[0].source).toBe("translated");
  });
});

describe("mergeVerdicts", () => {
  it("concatenates findings and ORs blocked", () => {
    const warning = screenText("best deal", table, { source: "original" });
    const error = screenText("cures all", table, { source: "translated" });

    const merged = mergeVerdicts(warning, error);

    expect(merged.blocked).toBe(true);
    expect(merged.highestSeverity).toBe("ERROR");
    expect(merged.findings.map((f) => [f.term, f.source])).toEqual([
      ["best", "original"],
      ["cures", "translated"],
    ]);
  });

  it("is not blocked when no input is", () => {
    const merged = mergeVerdicts(screenText("best", table), screenText("clean", table));

    expect(merged.blocked).toBe(false);
    expect(merged.findings).toHaveLength(1);
  });

  it("returns an empty verdict for no inputs", () => {
    expect(mergeVerdicts()).toEqual({ findings: [], blocked: false, highestSeverity: null });
  });
});
