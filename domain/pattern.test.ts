import { describe, expect, it } from "vitest";
import { GENERAL_LONG_PATTERN, ROUND_TRIP_PATTERN, resolvePattern, tokenizePattern } from "./pattern.js";

describe("tokenizePattern", () => {
  it("groups repeated letters into one run and maps separators", () => {
    expect(tokenizePattern("HH:mm")).toEqual([
      { kind: "unit", unit: "hours", count: 2 },
      { kind: "timeSeparator" },
      { kind: "unit", unit: "minutes", count: 2 },
    ]);
    expect(tokenizePattern("y/d")).toEqual([
      { kind: "unit", unit: "years", count: 1 },
      { kind: "dateSeparator" },
      { kind: "unit", unit: "days", count: 1 },
    ]);
  });

  it("treats quoted text as literal", () => {
    expect(tokenizePattern("e'-'n")).toEqual([
      { kind: "unit", unit: "totalYears", count: 1 },
      { kind: "literal", text: "-" },
      { kind: "unit", unit: "nanoseconds", count: 1 },
    ]);
    expect(tokenizePattern(`d "days"`)).toEqual([
      { kind: "unit", unit: "days", count: 1 },
      { kind: "literal", text: " days" },
    ]);
  });

  it("treats an escaped letter as literal", () => {
    expect(tokenizePattern("s\\s")).toEqual([
      { kind: "unit", unit: "seconds", count: 1 },
      { kind: "literal", text: "s" },
    ]);
  });

  it("ends a run at %", () => {
    expect(tokenizePattern("s%s")).toEqual([
      { kind: "unit", unit: "seconds", count: 1 },
      { kind: "unit", unit: "seconds", count: 1 },
    ]);
  });

  it("merges h and H into one run and splits adjacent units", () => {
    expect(tokenizePattern("hH")).toEqual([{ kind: "unit", unit: "hours", count: 2 }]);
    expect(tokenizePattern("Hm")).toEqual([
      { kind: "unit", unit: "hours", count: 1 },
      { kind: "unit", unit: "minutes", count: 1 },
    ]);
  });

  it("keeps characters without a unit as literal text", () => {
    expect(tokenizePattern("ss.FFF")).toEqual([
      { kind: "unit", unit: "seconds", count: 2 },
      { kind: "literal", text: "." },
      { kind: "unit", unit: "secondFraction", count: 3 },
    ]);
  });
});

describe("resolvePattern", () => {
  it("expands standard letters", () => {
    expect(resolvePattern("o")).toEqual({ kind: "custom", tokens: tokenizePattern(ROUND_TRIP_PATTERN) });
    expect(resolvePattern("T")).toEqual({ kind: "custom", tokens: tokenizePattern("HH:mm:ss") });
  });

  it("recognizes the extensible pattern", () => {
    expect(resolvePattern("X")).toEqual({ kind: "extensible" });
  });

  it("falls back to the general long pattern", () => {
    const general = { kind: "custom", tokens: tokenizePattern(GENERAL_LONG_PATTERN) };
    expect(resolvePattern(undefined)).toEqual(general);
    expect(resolvePattern("  ")).toEqual(general);
    expect(resolvePattern("q")).toEqual(general);
  });
});
