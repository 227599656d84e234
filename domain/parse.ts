/**
 * Parse engine — reads text written by the format writer back into a Duration.
 * Framework-independent.
 *
 * The try* entry points return null on a mismatch; parse and parseExact
 * throw DurationFormatError. An OverflowError is never turned into a
 * mismatch.
 */

import { add, negate } from "./arithmetic.js";
import type { TimeUnit } from "./core.js";
import { fromUnit } from "./conversions.js";
import { INVARIANT_CULTURE, type DurationCulture } from "./culture.js";
import { Dec } from "./decimal.js";
import { Duration } from "./duration.js";
import { DurationFormatError } from "./errors.js";
import { AUTO_DETECT_ORDER, resolvePattern, type FormatUnit, type PatternToken } from "./pattern.js";
import { NANOSECOND_FRACTION_DIGITS, PLANCK_TIME_PER_YOCTOSECOND, YOCTOSECOND_FRACTION_DIGITS } from "./units.js";
import { isDigits, pow10 } from "./utils.js";
import { neverReached } from "./validation.js";

type Segment = { kind: "unit"; unit: FormatUnit; count: number } | { kind: "text"; text: string };

type ComponentKey =
  | "years"
  | "days"
  | "hours"
  | "minutes"
  | "seconds"
  | "milliseconds"
  | "microseconds"
  | "nanoseconds"
  | "picoseconds"
  | "femtoseconds"
  | "attoseconds"
  | "zeptoseconds"
  | "yoctoseconds"
  | "planckTime";

type Accumulator = Record<ComponentKey, bigint>;

const COMPONENT_OF: Readonly<Record<Exclude<FormatUnit, "secondFraction">, ComponentKey>> = {
  totalYears: "years",
  years: "years",
  days: "days",
  hours: "hours",
  minutes: "minutes",
  seconds: "seconds",
  milliseconds: "milliseconds",
  microseconds: "microseconds",
  nanoseconds: "nanoseconds",
  picoseconds: "picoseconds",
  femtoseconds: "femtoseconds",
  attoseconds: "attoseconds",
  zeptoseconds: "zeptoseconds",
  yoctoseconds: "yoctoseconds",
  planckTime: "planckTime",
};

/** Unit symbols the extensible reader accepts. */
const EXTENSIBLE_UNITS: Readonly<Record<string, TimeUnit>> = {
  y: "years",
  a: "years",
  d: "days",
  h: "hours",
  min: "minutes",
  s: "seconds",
  ms: "milliseconds",
  "μs": "microseconds",
  "µs": "microseconds",
  us: "microseconds",
  ns: "nanoseconds",
  ps: "picoseconds",
  fs: "femtoseconds",
  as: "attoseconds",
  zs: "zeptoseconds",
  ys: "yoctoseconds",
  tP: "planckTime",
};

const PLAIN_NUMBER = /^[0-9]+(\.[0-9]+)?([eE][+-]?[0-9]+)?$/;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function emptyAccumulator(): Accumulator {
  return {
    years: 0n,
    days: 0n,
    hours: 0n,
    minutes: 0n,
    seconds: 0n,
    milliseconds: 0n,
    microseconds: 0n,
    nanoseconds: 0n,
    picoseconds: 0n,
    femtoseconds: 0n,
    attoseconds: 0n,
    zeptoseconds: 0n,
    yoctoseconds: 0n,
    planckTime: 0n,
  };
}

/** Literal runs of the pattern as they appear in text under `culture`, merged. */
function segmentsOf(tokens: readonly PatternToken[], culture: DurationCulture): Segment[] {
  const segments: Segment[] = [];
  const pushText = (text: string): void => {
    const last = segments[segments.length - 1];
    if (last?.kind === "text") last.text += text;
    else segments.push({ kind: "text", text });
  };
  for (const t of tokens) {
    switch (t.kind) {
      case "unit":
        segments.push({ kind: "unit", unit: t.unit, count: t.count });
        break;
      case "literal":
        pushText(t.text);
        break;
      case "timeSeparator":
        pushText(culture.timeSeparator);
        break;
      case "dateSeparator":
        pushText(culture.dateSeparator);
        break;
      default:
        neverReached(t, "Unknown pattern token");
    }
  }
  return segments;
}

/**
 * Split second-fraction digits the way the writer places them: nine for
 * nanoseconds, fifteen for yoctoseconds, the rest as a share of a
 * yoctosecond in Planck time.
 */
export function splitSecondFraction(digits: string): Pick<Accumulator, "nanoseconds" | "yoctoseconds" | "planckTime"> {
  const nsEnd = NANOSECOND_FRACTION_DIGITS;
  const ysEnd = nsEnd + YOCTOSECOND_FRACTION_DIGITS;
  const rest = digits.slice(ysEnd);
  return {
    nanoseconds: BigInt(digits.slice(0, nsEnd).padEnd(nsEnd, "0")),
    yoctoseconds: BigInt(digits.slice(nsEnd, ysEnd).padEnd(YOCTOSECOND_FRACTION_DIGITS, "0")),
    planckTime: rest ? (BigInt(rest) * PLANCK_TIME_PER_YOCTOSECOND) / pow10(rest.length) : 0n,
  };
}

/** Widest run that may be sliced by its letter count when another unit follows directly. */
const MAX_FIXED_WIDTH = 2;

function stripNegativeSign(text: string, culture: DurationCulture): { body: string; isNegative: boolean } {
  const sign = culture.negativeSign;
  return sign && text.startsWith(sign)
    ? { body: text.slice(sign.length), isNegative: true }
    : { body: text, isNegative: false };
}

function parseCustom(text: string, tokens: readonly PatternToken[], culture: DurationCulture): Duration | null {
  const { body, isNegative } = stripNegativeSign(text, culture);
  const segments = segmentsOf(tokens, culture);
  const acc = emptyAccumulator();
  let pos = 0;

  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    if (segment === undefined) break;
    if (segment.kind === "text") {
      if (!body.startsWith(segment.text, pos)) return null;
      pos += segment.text.length;
      continue;
    }

    const next = segments[i + 1];
    let end: number;
    if (next === undefined) end = body.length;
    else if (next.kind === "text") end = body.indexOf(next.text, pos);
    else if (segment.count <= MAX_FIXED_WIDTH) end = pos + segment.count;
    else return null;
    if (end < 0 || end > body.length) return null;

    const slice = body.slice(pos, end);
    if (!isDigits(slice)) return null;
    if (segment.unit === "secondFraction") {
      const fraction = splitSecondFraction(slice);
      acc.nanoseconds += fraction.nanoseconds;
      acc.yoctoseconds += fraction.yoctoseconds;
      acc.planckTime += fraction.planckTime;
    } else {
      acc[COMPONENT_OF[segment.unit]] += BigInt(slice);
    }
    pos = end;
  }
  if (pos !== body.length) return null;
  return Duration.fromComponents({ ...acc, isNegative });
}

function parseExtensible(text: string, culture: DurationCulture): Duration | null {
  const { body, isNegative } = stripNegativeSign(text, culture);
  if (body === "0") return Duration.ZERO;

  const separators = [culture.numberGroupSeparator, culture.numberDecimalSeparator]
    .filter((s) => s !== "")
    .map(escapeRegExp);
  const digitRun = `[0-9](?:[0-9]|${separators.join("|") || "[0-9]"})*(?:[eE][+-]?[0-9]+)?`;
  const pair = new RegExp(`\\s*(${digitRun})\\s*([^\\s0-9]+)`, "y");

  let total = Duration.ZERO;
  let matched = false;
  let pos = 0;
  while (pos < body.length) {
    pair.lastIndex = pos;
    const m = pair.exec(body);
    if (m === null) return null;
    const unit = EXTENSIBLE_UNITS[m[2] ?? ""];
    const amount = normalizeNumber(m[1] ?? "", culture);
    if (unit === undefined || amount === null) return null;
    total = add(total, fromUnit(new Dec(amount), unit));
    matched = true;
    pos = pair.lastIndex;
  }
  if (!matched) return null;
  return isNegative ? negate(total) : total;
}

/** Drop group separators and use "." as the decimal point. Null if the result is not a plain number. */
function normalizeNumber(raw: string, culture: DurationCulture): string | null {
  let s = raw;
  if (culture.numberGroupSeparator) s = s.split(culture.numberGroupSeparator).join("");
  if (culture.numberDecimalSeparator) s = s.split(culture.numberDecimalSeparator).join(".");
  return PLAIN_NUMBER.test(s) ? s : null;
}

/** Parse `text` under one pattern. Null when it does not match. */
export function tryParseExact(
  text: string | null | undefined,
  pattern?: string | null,
  culture: DurationCulture = INVARIANT_CULTURE
): Duration | null {
  const input = text?.trim() ?? "";
  if (input === "") return null;
  if (input === culture.positiveInfinitySymbol) return Duration.POSITIVE_INFINITY;
  if (input === culture.negativeInfinitySymbol) return Duration.NEGATIVE_INFINITY;

  const resolved = resolvePattern(pattern);
  return resolved.kind === "extensible"
    ? parseExtensible(input, culture)
    : parseCustom(input, resolved.tokens, culture);
}

export function parseExact(
  text: string | null | undefined,
  pattern?: string | null,
  culture: DurationCulture = INVARIANT_CULTURE
): Duration {
  const result = tryParseExact(text, pattern, culture);
  if (result === null) {
    throw new DurationFormatError("Text does not match the duration pattern", { text, pattern });
  }
  return result;
}

/** Try every standard pattern, round trip first. */
export function tryParse(text: string | null | undefined, culture: DurationCulture = INVARIANT_CULTURE): Duration | null {
  for (const pattern of AUTO_DETECT_ORDER) {
    const result = tryParseExact(text, pattern, culture);
    if (result !== null) return result;
  }
  return null;
}

export function parse(text: string | null | undefined, culture: DurationCulture = INVARIANT_CULTURE): Duration {
  const result = tryParse(text, culture);
  if (result === null) {
    throw new DurationFormatError("Text is not a recognized duration", { text });
  }
  return result;
}
