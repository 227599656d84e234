import { describe, expect, it } from "vitest";
import { Duration } from "./duration.js";
import { InvariantViolation, OverflowError, ValidationError } from "./errors.js";
import {
  NANOSECONDS_PER_YEAR,
  PLANCK_TIME_PER_YOCTOSECOND,
  YOCTOSECONDS_PER_NANOSECOND,
} from "./units.js";

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

describe("Duration.ZERO", () => {
  it("is zero with sign 0", () => {
    expect(Duration.ZERO.isZero).toBe(true);
    expect(Duration.ZERO.sign).toBe(0);
    expect(Duration.ZERO.aeons).toBeNull();
    expect(Duration.ZERO.planckTime).toBeNull();
  });

  it("instances are frozen", () => {
    expect(Object.isFrozen(sample)).toBe(true);
  });
});

describe("Duration.fromComponents", () => {
  it("carries a billion nanoseconds into one second", () => {
    const a = Duration.fromComponents({ nanoseconds: 1_000_000_000 });
    const b = Duration.fromComponents({ seconds: 1 });
    expect(a.equals(b)).toBe(true);
    expect(a.totalNanoseconds).toBe(1_000_000_000n);
  });

  it("exposes every sub-unit projection", () => {
    expect(sample.totalYears).toBe(1n);
    expect(sample.years).toBe(1);
    expect(sample.totalNanoseconds).toBe(183_845_006_007_008n);
    expect(sample.totalYoctoseconds).toBe(9_010_011_012_013n);
    expect(sample.planckTime).toBe(14n);
    expect([
      sample.days,
      sample.hours,
      sample.minutes,
      sample.seconds,
      sample.milliseconds,
      sample.microseconds,
      sample.nanoseconds,
      sample.picoseconds,
      sample.femtoseconds,
      sample.attoseconds,
      sample.zeptoseconds,
      sample.yoctoseconds,
    ]).toEqual([2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13]);
  });

  it("carries Planck time into yoctoseconds", () => {
    const d = Duration.fromComponents({ planckTime: PLANCK_TIME_PER_YOCTOSECOND + 5n });
    expect(d.totalYoctoseconds).toBe(1n);
    expect(d.planckTime).toBe(5n);
  });

  it("carries years into aeons", () => {
    const d = Duration.fromComponents({ years: 2_500_000_000 });
    expect(d.aeons).toBe(2n);
    expect(d.years).toBe(500_000_000);
    expect(d.totalYears).toBe(2_500_000_000n);
  });

  it("normalizes negative zero to zero", () => {
    const d = Duration.fromComponents({ isNegative: true });
    expect(d).toBe(Duration.ZERO);
    expect(d.isNegative).toBe(false);
  });

  it("reports sign -1 for negative values", () => {
    expect(Duration.fromComponents({ isNegative: true, seconds: 1 }).sign).toBe(-1);
  });

  it("rejects negative and fractional components", () => {
    expect(() => Duration.fromComponents({ seconds: -1 })).toThrow(ValidationError);
    expect(() => Duration.fromComponents({ days: 1.5 })).toThrow(ValidationError);
    expect(() => Duration.fromComponents({ planckTime: -1n })).toThrow(ValidationError);
  });

  it("rejects aeon counts beyond the digit limit", () => {
    expect(() => Duration.fromComponents({ aeons: 10n ** 1000n })).toThrow(OverflowError);
    expect(Duration.fromComponents({ aeons: 10n ** 999n }).aeons).toBe(10n ** 999n);
  });
});

describe("Duration.fromCanonicalFields", () => {
  const canonical = {
    isNegative: false,
    isPerpetual: false,
    planckTime: null,
    totalYoctoseconds: 0n,
    totalNanoseconds: 0n,
    years: 0,
    aeons: null,
  };

  it("stores canonical fields as given", () => {
    const d = Duration.fromCanonicalFields({ ...canonical, totalYoctoseconds: YOCTOSECONDS_PER_NANOSECOND - 1n });
    expect(d.totalYoctoseconds).toBe(YOCTOSECONDS_PER_NANOSECOND - 1n);
    expect(d.totalNanoseconds).toBe(0n);
  });

  it("throws InvariantViolation instead of carrying", () => {
    expect(() => Duration.fromCanonicalFields({ ...canonical, totalNanoseconds: NANOSECONDS_PER_YEAR })).toThrow(
      InvariantViolation
    );
    expect(() => Duration.fromCanonicalFields({ ...canonical, years: 1_000_000_000 })).toThrow(InvariantViolation);
  });

  it("drops magnitude fields of perpetual values", () => {
    const d = Duration.fromCanonicalFields({ ...canonical, isPerpetual: true, isNegative: true, years: 3 });
    expect(d).toBe(Duration.NEGATIVE_INFINITY);
    expect(d.years).toBe(0);
  });

  it("treats zero aeons and Planck time as absent", () => {
    const d = Duration.fromCanonicalFields({ ...canonical, aeons: 0n, planckTime: 0n });
    expect(d).toBe(Duration.ZERO);
  });
});

describe("Duration text", () => {
  it("toString defaults to the general long pattern", () => {
    expect(sample.toString()).toBe("1 2 03:04:05");
  });

  it("serializes to round-trip text in JSON", () => {
    expect(JSON.stringify({ d: sample })).toBe('{"d":"1-183845006007008:9010011012013:14"}');
  });

  it("perpetual values report infinity", () => {
    expect(Duration.POSITIVE_INFINITY.isPositiveInfinity).toBe(true);
    expect(Duration.NEGATIVE_INFINITY.isNegativeInfinity).toBe(true);
    expect(Duration.POSITIVE_INFINITY.isZero).toBe(false);
    expect(Duration.NEGATIVE_INFINITY.sign).toBe(-1);
  });
});
