import { Decimal } from "decimal.js";
import { describe, expect, it } from "vitest";
import { fromDays, fromHours, fromYears } from "./conversions.js";
import { INVARIANT_CULTURE, type DurationCulture } from "./culture.js";
import { Duration } from "./duration.js";
import { DurationFormatError, ValidationError } from "./errors.js";
import {
  RelativeDuration,
  formatRelativeDuration,
  parseRelativeDuration,
  tryParseRelativeDuration,
} from "./relativeDuration.js";

const GERMAN: DurationCulture = { ...INVARIANT_CULTURE, numberGroupSeparator: ".", numberDecimalSeparator: "," };

describe("RelativeDuration", () => {
  it("resolves proportions against day and year lengths", () => {
    expect(RelativeDuration.fromProportionOfDay(0.25).toUniversalDuration().equals(fromHours(6))).toBe(true);
    expect(RelativeDuration.fromProportionOfYear(0.5).toUniversalDuration().equals(fromDays(182.625))).toBe(true);
    expect(
      RelativeDuration.fromProportionOfDay(0.5).toUniversalDuration(fromYears(1), fromHours(20)).equals(fromHours(10))
    ).toBe(true);
  });

  it("returns absolute durations unchanged", () => {
    const d = fromHours(3);
    expect(RelativeDuration.fromDuration(d).toUniversalDuration()).toBe(d);
  });

  it("compares relativity before value", () => {
    const day = RelativeDuration.fromProportionOfDay(0.25);
    expect(day.equals(RelativeDuration.fromProportionOfDay(new Decimal("0.250")))).toBe(true);
    expect(day.equals(RelativeDuration.fromProportionOfYear(0.25))).toBe(false);
    expect(RelativeDuration.fromDuration(fromHours(6)).equals(RelativeDuration.fromDuration(fromHours(6)))).toBe(true);
  });

  it("scales and negates", () => {
    const day = RelativeDuration.fromProportionOfDay(0.25);
    expect(day.multiply(2).equals(RelativeDuration.fromProportionOfDay(0.5))).toBe(true);
    expect(day.divide(5).equals(RelativeDuration.fromProportionOfDay(0.05))).toBe(true);
    expect(day.negate().proportion.toNumber()).toBe(-0.25);
    expect(RelativeDuration.fromDuration(fromHours(1)).multiply(3).duration.equals(fromHours(3))).toBe(true);
  });

  it("reports zero and perpetual values", () => {
    expect(RelativeDuration.ZERO.isZero).toBe(true);
    expect(RelativeDuration.fromProportionOfYear(0).isZero).toBe(true);
    expect(RelativeDuration.fromDuration(Duration.POSITIVE_INFINITY).isPerpetual).toBe(true);
  });

  it("rejects proportions that are not finite", () => {
    expect(() => RelativeDuration.fromProportionOfDay(NaN)).toThrow(ValidationError);
    expect(() => RelativeDuration.fromProportionOfDay(0.5).divide(0)).toThrow(ValidationError);
  });
});

describe("formatRelativeDuration", () => {
  it("prefixes proportions with their period", () => {
    expect(RelativeDuration.fromProportionOfDay(0.25).toString()).toBe("Dx0.25");
    expect(RelativeDuration.fromProportionOfYear(0.25).toString()).toBe("Yx0.25");
    expect(RelativeDuration.fromProportionOfDay(-0.5).toString()).toBe("Dx-0.5");
    expect(formatRelativeDuration(RelativeDuration.fromProportionOfDay(0.25), null, GERMAN)).toBe("Dx0,25");
  });

  it("uses the duration pattern for absolute values", () => {
    expect(RelativeDuration.fromDuration(Duration.fromComponents({ hours: 3, minutes: 4, seconds: 5 })).toString("T")).toBe(
      "03:04:05"
    );
  });
});

describe("parseRelativeDuration", () => {
  it("reads proportions", () => {
    expect(parseRelativeDuration("Yx0.25").equals(RelativeDuration.fromProportionOfYear(0.25))).toBe(true);
    expect(parseRelativeDuration("Dx-0.5").equals(RelativeDuration.fromProportionOfDay(-0.5))).toBe(true);
    expect(parseRelativeDuration("Dx0,25", null, GERMAN).equals(RelativeDuration.fromProportionOfDay(0.25))).toBe(true);
  });

  it("reads durations with or without a pattern", () => {
    const expected = RelativeDuration.fromDuration(Duration.fromComponents({ hours: 3, minutes: 4 }));
    expect(tryParseRelativeDuration("03:04")?.equals(expected)).toBe(true);
    expect(tryParseRelativeDuration("0304", "HHmm")?.equals(expected)).toBe(true);
  });

  it("fails on anything else", () => {
    expect(tryParseRelativeDuration("Dxabc")).toBeNull();
    expect(() => parseRelativeDuration("bogus")).toThrow(DurationFormatError);
  });
});
