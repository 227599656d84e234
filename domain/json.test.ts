import { describe, expect, it } from "vitest";
import { negate } from "./arithmetic.js";
import { Duration } from "./duration.js";
import { DurationFormatError, InvariantViolation } from "./errors.js";
import { durationFromJSON, durationToJSON, fromStructured, toStructured } from "./json.js";

const sample = Duration.fromComponents({
  years: 1,
  days: 2,
  hours: 3,
  minutes: 4,
  seconds: 5,
  milliseconds: 6,
  microseconds: 7,
  nanoseconds: 8,
  picoseconds: 9,
  femtoseconds: 10,
  attoseconds: 11,
  zeptoseconds: 12,
  yoctoseconds: 13,
  planckTime: 14,
});

describe("durationToJSON / durationFromJSON", () => {
  it("writes round-trip text", () => {
    expect(durationToJSON(sample)).toBe("1-183845006007008:9010011012013:14");
    expect(durationToJSON(Duration.NEGATIVE_INFINITY)).toBe("-Infinity");
  });

  it("reads back what JSON.stringify wrote", () => {
    const json = JSON.stringify({ elapsed: negate(sample) });
    const parsed: unknown = JSON.parse(json);
    const elapsed = typeof parsed === "object" && parsed !== null && "elapsed" in parsed ? parsed.elapsed : undefined;
    expect(durationFromJSON(elapsed).equals(negate(sample))).toBe(true);
  });

  it("accepts infinity symbols", () => {
    expect(durationFromJSON("Infinity")).toBe(Duration.POSITIVE_INFINITY);
  });

  it("rejects any other shape", () => {
    expect(() => durationFromJSON("1 2 03:04:05")).toThrow(DurationFormatError);
    expect(() => durationFromJSON(42)).toThrow(DurationFormatError);
    expect(() => durationFromJSON(null)).toThrow(DurationFormatError);
  });

  it("rejects text the writer would not produce", () => {
    expect(() => durationFromJSON(" 0-5000000000:0:0 ")).toThrow(DurationFormatError);
    expect(() => durationFromJSON("0-99999999999999999999:0:0")).toThrow(DurationFormatError);
    expect(() => durationFromJSON("-0-0:0:0")).toThrow(DurationFormatError);
    expect(durationFromJSON("0-5000000000:0:0").equals(Duration.fromComponents({ seconds: 5 }))).toBe(true);
  });
});

describe("toStructured / fromStructured", () => {
  it("exposes the canonical fields as strings", () => {
    expect(toStructured(sample)).toEqual({
      isNegative: false,
      isPerpetual: false,
      planckTime: "14",
      totalYoctoseconds: "9010011012013",
      totalNanoseconds: "183845006007008",
      years: 1,
      aeons: null,
    });
  });

  it("rebuilds equal values", () => {
    const big = Duration.fromComponents({ aeons: 10n ** 30n, years: 42, isNegative: true });
    expect(fromStructured(toStructured(sample)).equals(sample)).toBe(true);
    expect(fromStructured(toStructured(big)).equals(big)).toBe(true);
    expect(fromStructured(toStructured(Duration.POSITIVE_INFINITY))).toBe(Duration.POSITIVE_INFINITY);
  });

  it("treats missing aeons and Planck time as zero", () => {
    const d = fromStructured({
      isNegative: false,
      isPerpetual: false,
      totalYoctoseconds: "0",
      totalNanoseconds: "1000",
      years: 0,
    });
    expect(d.equals(Duration.fromComponents({ microseconds: 1 }))).toBe(true);
  });

  it("refuses non-canonical fields", () => {
    expect(() =>
      fromStructured({ ...toStructured(sample), totalNanoseconds: "31557600000000000" })
    ).toThrow(InvariantViolation);
  });

  it("refuses malformed input", () => {
    expect(() => fromStructured("1-0:0:0")).toThrow(DurationFormatError);
    expect(() => fromStructured({ ...toStructured(sample), totalNanoseconds: "-5" })).toThrow(DurationFormatError);
    expect(() => fromStructured({ ...toStructured(sample), years: "1" })).toThrow(DurationFormatError);
  });
});
