/**
 * Format writer — renders a Duration under a standard or custom pattern.
 * Framework-independent.
 */

import type { DurationCulture } from "./culture.js";
import type { Duration } from "./duration.js";
import { resolvePattern, type FormatUnit, type PatternToken } from "./pattern.js";
import {
  NANOSECONDS_PER_SECOND,
  NANOSECOND_FRACTION_DIGITS,
  PLANCK_TIME_PER_YOCTOSECOND,
  YOCTOSECOND_FRACTION_DIGITS,
} from "./units.js";
import { formatSignificant, padDigits, pow10 } from "./utils.js";
import { neverReached } from "./validation.js";

// Units that take the sub-microsecond remainder away from `n`, and the sub-nanosecond remainder from `Y`.
const ABOVE_NANOSECONDS: ReadonlySet<FormatUnit> = new Set([
  "days",
  "hours",
  "minutes",
  "seconds",
  "milliseconds",
  "microseconds",
]);
const ABOVE_YOCTOSECONDS: ReadonlySet<FormatUnit> = new Set([
  "picoseconds",
  "femtoseconds",
  "attoseconds",
  "zeptoseconds",
]);

/** Symbols of the extensible pattern, most significant first. */
export const EXTENSIBLE_SYMBOLS = {
  years: "y",
  days: "d",
  hours: "h",
  minutes: "min",
  seconds: "s",
  milliseconds: "ms",
  microseconds: "μs",
  nanoseconds: "ns",
  picoseconds: "ps",
  femtoseconds: "fs",
  attoseconds: "as",
  zeptoseconds: "zs",
  yoctoseconds: "ys",
  planckTime: "tP",
} as const;

/**
 * First `count` digits after the decimal point of the seconds value:
 * nine nanosecond digits, fifteen yoctosecond digits, then the Planck time
 * share of a yoctosecond, truncated.
 */
export function secondFractionDigits(d: Duration, count: number): string {
  let digits =
    padDigits(d.totalNanoseconds % NANOSECONDS_PER_SECOND, NANOSECOND_FRACTION_DIGITS) +
    padDigits(d.totalYoctoseconds, YOCTOSECOND_FRACTION_DIGITS);
  const planckDigits = count - digits.length;
  if (planckDigits > 0) {
    const scaled = ((d.planckTime ?? 0n) * pow10(planckDigits)) / PLANCK_TIME_PER_YOCTOSECOND;
    digits += padDigits(scaled, planckDigits);
  }
  return digits.slice(0, count);
}

function unitText(d: Duration, unit: FormatUnit, count: number, units: ReadonlySet<FormatUnit>): string {
  switch (unit) {
    case "totalYears":
      return formatSignificant(d.totalYears, count);
    case "planckTime":
      return formatSignificant(d.planckTime ?? 0n, count);
    case "secondFraction":
      return secondFractionDigits(d, count);
    case "years":
      return padDigits(d.years, count);
    case "days":
      return padDigits(d.days, count);
    case "hours":
      return padDigits(d.hours, count);
    case "minutes":
      return padDigits(d.minutes, count);
    case "seconds":
      return padDigits(d.seconds, count);
    case "milliseconds":
      return padDigits(d.milliseconds, count);
    case "microseconds":
      return padDigits(d.microseconds, count);
    case "nanoseconds":
      return padDigits([...units].some((u) => ABOVE_NANOSECONDS.has(u)) ? d.nanoseconds : d.totalNanoseconds, count);
    case "picoseconds":
      return padDigits(d.picoseconds, count);
    case "femtoseconds":
      return padDigits(d.femtoseconds, count);
    case "attoseconds":
      return padDigits(d.attoseconds, count);
    case "zeptoseconds":
      return padDigits(d.zeptoseconds, count);
    case "yoctoseconds":
      return padDigits(
        [...units].some((u) => ABOVE_YOCTOSECONDS.has(u)) ? d.yoctoseconds : d.totalYoctoseconds,
        count
      );
    default:
      return neverReached(unit, "Unknown format unit");
  }
}

function formatCustom(d: Duration, tokens: readonly PatternToken[], culture: DurationCulture): string {
  const units = new Set<FormatUnit>();
  for (const t of tokens) if (t.kind === "unit") units.add(t.unit);

  let out = "";
  for (const t of tokens) {
    switch (t.kind) {
      case "unit":
        out += unitText(d, t.unit, t.count, units);
        break;
      case "literal":
        out += t.text;
        break;
      case "timeSeparator":
        out += culture.timeSeparator;
        break;
      case "dateSeparator":
        out += culture.dateSeparator;
        break;
      default:
        neverReached(t, "Unknown pattern token");
    }
  }
  return out;
}

function formatExtensible(d: Duration): string {
  const parts: Array<[number | bigint, string]> = [
    [d.totalYears, EXTENSIBLE_SYMBOLS.years],
    [d.days, EXTENSIBLE_SYMBOLS.days],
    [d.hours, EXTENSIBLE_SYMBOLS.hours],
    [d.minutes, EXTENSIBLE_SYMBOLS.minutes],
    [d.seconds, EXTENSIBLE_SYMBOLS.seconds],
    [d.milliseconds, EXTENSIBLE_SYMBOLS.milliseconds],
    [d.microseconds, EXTENSIBLE_SYMBOLS.microseconds],
    [d.nanoseconds, EXTENSIBLE_SYMBOLS.nanoseconds],
    [d.picoseconds, EXTENSIBLE_SYMBOLS.picoseconds],
    [d.femtoseconds, EXTENSIBLE_SYMBOLS.femtoseconds],
    [d.attoseconds, EXTENSIBLE_SYMBOLS.attoseconds],
    [d.zeptoseconds, EXTENSIBLE_SYMBOLS.zeptoseconds],
    [d.yoctoseconds, EXTENSIBLE_SYMBOLS.yoctoseconds],
    [d.planckTime ?? 0n, EXTENSIBLE_SYMBOLS.planckTime],
  ];
  const text = parts
    .filter(([value]) => value > 0)
    .map(([value, symbol]) => `${value} ${symbol}`)
    .join(" ");
  return text || "0";
}

/**
 * Render `d` under `pattern`. Perpetual values ignore the pattern and print
 * the culture's infinity symbol; other negative values get its negative sign.
 */
export function formatDuration(d: Duration, pattern: string | null | undefined, culture: DurationCulture): string {
  if (d.isPerpetual) {
    return d.isNegative ? culture.negativeInfinitySymbol : culture.positiveInfinitySymbol;
  }
  const resolved = resolvePattern(pattern);
  const body = resolved.kind === "extensible" ? formatExtensible(d) : formatCustom(d, resolved.tokens, culture);
  return d.isNegative && !d.isZero ? `${culture.negativeSign}${body}` : body;
}
