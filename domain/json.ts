/**
 * JSON adapters — round-trip text and the structured canonical fields.
 * Framework-independent.
 */

import { INVARIANT_CULTURE } from "./culture.js";
import { Duration } from "./duration.js";
import { DurationFormatError } from "./errors.js";
import { formatDuration } from "./format.js";
import { tryParseExact } from "./parse.js";
import { ROUND_TRIP_PATTERN } from "./pattern.js";

/** Canonical fields with bigints as decimal strings. `null` is zero for aeons and planckTime. */
export interface StructuredDuration {
  isNegative: boolean;
  isPerpetual: boolean;
  planckTime: string | null;
  totalYoctoseconds: string;
  totalNanoseconds: string;
  years: number;
  aeons: string | null;
}

export function durationToJSON(d: Duration): string {
  return formatDuration(d, ROUND_TRIP_PATTERN, INVARIANT_CULTURE);
}

/**
 * Only round-trip text (or an infinity symbol) is accepted, exactly as
 * durationToJSON writes it: no surrounding whitespace, no uncarried fields.
 */
export function durationFromJSON(value: unknown): Duration {
  if (typeof value !== "string") {
    throw new DurationFormatError("Duration JSON must be a string", { type: typeof value });
  }
  const d = tryParseExact(value, ROUND_TRIP_PATTERN, INVARIANT_CULTURE);
  if (d === null || durationToJSON(d) !== value) {
    throw new DurationFormatError("Duration JSON is not in round-trip format", { value });
  }
  return d;
}

export function toStructured(d: Duration): StructuredDuration {
  return {
    isNegative: d.isNegative,
    isPerpetual: d.isPerpetual,
    planckTime: d.planckTime?.toString() ?? null,
    totalYoctoseconds: d.totalYoctoseconds.toString(),
    totalNanoseconds: d.totalNanoseconds.toString(),
    years: d.years,
    aeons: d.aeons?.toString() ?? null,
  };
}

const UNSIGNED = /^[0-9]+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function unsigned(value: unknown, field: string): bigint {
  if (typeof value !== "string" || !UNSIGNED.test(value)) {
    throw new DurationFormatError(`${field} must be a string of digits`, { field });
  }
  return BigInt(value);
}

function optionalUnsigned(value: unknown, field: string): bigint | null {
  return value == null ? null : unsigned(value, field);
}

/**
 * Rebuild a duration from its structured fields through the trusted factory.
 * Fields outside their radix raise InvariantViolation.
 */
export function fromStructured(value: unknown): Duration {
  if (!isRecord(value)) {
    throw new DurationFormatError("Structured duration must be an object");
  }
  const { isNegative, isPerpetual, years } = value;
  if (typeof isNegative !== "boolean" || typeof isPerpetual !== "boolean") {
    throw new DurationFormatError("isNegative and isPerpetual must be booleans");
  }
  if (typeof years !== "number") {
    throw new DurationFormatError("years must be a number", { field: "years" });
  }
  return Duration.fromCanonicalFields({
    isNegative,
    isPerpetual,
    planckTime: optionalUnsigned(value.planckTime, "planckTime"),
    totalYoctoseconds: unsigned(value.totalYoctoseconds, "totalYoctoseconds"),
    totalNanoseconds: unsigned(value.totalNanoseconds, "totalNanoseconds"),
    years,
    aeons: optionalUnsigned(value.aeons, "aeons"),
  });
}
