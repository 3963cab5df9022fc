import { describe, it, expect } from "vitest";
import { isSeverity, meetsThreshold, summarizeSeverity } from "../scoring.js";

describe("summarizeSeverity", () => {
  it("starts every bucket at zero", () => {
    expect(summarizeSeverity([])).toEqual({ high: 0, medium: 0, low: 0 });
  });

  it("counts each severity", () => {
    const counts = summarizeSeverity([
      { severity: "high" },
      { severity: "low" },
      { severity: "high" },
      { severity: "medium" },
    ]);
    expect(counts).toEqual({ high: 2, medium: 1, low: 1 });
  });

  it("ignores unknown severities", () => {
    expect(summarizeSeverity([{ severity: "critical" }, { severity: "low" }])).toEqual({
      high: 0,
      medium: 0,
      low: 1,
    });
  });
});

describe("meetsThreshold", () => {
  it("matches findings at or above the threshold", () => {
    const findings = [{ severity: "medium" as const }];
    expect(meetsThreshold(findings, "low")).toBe(true);
    expect(meetsThreshold(findings, "medium")).toBe(true);
    expect(meetsThreshold(findings, "high")).toBe(false);
  });

  it("is false for no findings", () => {
    expect(meetsThreshold([], "low")).toBe(false);
  });
});

describe("isSeverity", () => {
  it("accepts only low, medium and high", () => {
    expect(isSeverity("high")).toBe(true);
    expect(isSeverity("info")).toBe(false);
  });
});
