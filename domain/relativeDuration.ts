/**
 * RelativeDuration — a literal duration, or a proportion of a day or a year
 * whose length is only known to the caller.
 * Framework-independent.
 */

import type { Decimal } from "decimal.js";
import { negate as negateDuration } from "./arithmetic.js";
import type { Scalar } from "./core.js";
import { fromDays, fromYears } from "./conversions.js";
import { INVARIANT_CULTURE, type DurationCulture } from "./culture.js";
import { Dec, toDecimal } from "./decimal.js";
import { Duration } from "./duration.js";
import { DurationFormatError, ValidationError } from "./errors.js";
import { formatDuration } from "./format.js";
import { tryParse, tryParseExact } from "./parse.js";
import { divide as divideDuration, multiply as multiplyDuration } from "./scaling.js";
import { neverReached } from "./validation.js";

export type Relativity = "absolute" | "proportionOfDay" | "proportionOfYear";

const DAY_PREFIX = "Dx";
const YEAR_PREFIX = "Yx";

function proportionOrThrow(value: Scalar): Decimal {
  const proportion = toDecimal(value);
  if (!proportion.isFinite()) {
    throw new ValidationError("Proportion must be a finite number");
  }
  return proportion;
}

export class RelativeDuration {
  private constructor(
    readonly relativity: Relativity,
    readonly duration: Duration,
    readonly proportion: Decimal
  ) {
    Object.freeze(this);
  }

  static fromDuration(duration: Duration): RelativeDuration {
    return new RelativeDuration("absolute", duration, new Dec(0));
  }

  static fromProportionOfDay(proportion: Scalar): RelativeDuration {
    return new RelativeDuration("proportionOfDay", Duration.ZERO, proportionOrThrow(proportion));
  }

  static fromProportionOfYear(proportion: Scalar): RelativeDuration {
    return new RelativeDuration("proportionOfYear", Duration.ZERO, proportionOrThrow(proportion));
  }

  static readonly ZERO = RelativeDuration.fromDuration(Duration.ZERO);

  get isZero(): boolean {
    return this.relativity === "absolute" ? this.duration.isZero : this.proportion.isZero();
  }

  get isPerpetual(): boolean {
    return this.relativity === "absolute" && this.duration.isPerpetual;
  }

  equals(other: RelativeDuration): boolean {
    if (this.relativity !== other.relativity) return false;
    return this.relativity === "absolute"
      ? this.duration.equals(other.duration)
      : this.proportion.eq(other.proportion);
  }

  negate(): RelativeDuration {
    return this.relativity === "absolute"
      ? RelativeDuration.fromDuration(negateDuration(this.duration))
      : new RelativeDuration(this.relativity, Duration.ZERO, this.proportion.neg());
  }

  multiply(factor: Scalar): RelativeDuration {
    return this.relativity === "absolute"
      ? RelativeDuration.fromDuration(multiplyDuration(this.duration, factor))
      : new RelativeDuration(this.relativity, Duration.ZERO, proportionOrThrow(this.proportion.times(toDecimal(factor))));
  }

  divide(divisor: Scalar): RelativeDuration {
    return this.relativity === "absolute"
      ? RelativeDuration.fromDuration(divideDuration(this.duration, divisor))
      : new RelativeDuration(this.relativity, Duration.ZERO, proportionOrThrow(this.proportion.div(toDecimal(divisor))));
  }

  /** Resolve against concrete year and day lengths; by default 365.25 days and 86,400 s. */
  toUniversalDuration(yearDuration: Duration = fromYears(1), dayDuration: Duration = fromDays(1)): Duration {
    switch (this.relativity) {
      case "absolute":
        return this.duration;
      case "proportionOfDay":
        return multiplyDuration(dayDuration, this.proportion);
      case "proportionOfYear":
        return multiplyDuration(yearDuration, this.proportion);
      default:
        return neverReached(this.relativity, "Unknown relativity");
    }
  }

  toString(pattern?: string, culture: DurationCulture = INVARIANT_CULTURE): string {
    return formatRelativeDuration(this, pattern, culture);
  }
}

/** Absolute values use the duration format; proportions are `Dx<p>` or `Yx<p>`. */
export function formatRelativeDuration(
  r: RelativeDuration,
  pattern: string | null | undefined,
  culture: DurationCulture = INVARIANT_CULTURE
): string {
  if (r.relativity === "absolute") return formatDuration(r.duration, pattern, culture);
  const prefix = r.relativity === "proportionOfDay" ? DAY_PREFIX : YEAR_PREFIX;
  const digits = r.proportion.abs().toString().replace(".", culture.numberDecimalSeparator);
  return `${prefix}${r.proportion.isNegative() && !r.proportion.isZero() ? culture.negativeSign : ""}${digits}`;
}

const PLAIN_PROPORTION = /^-?[0-9]+(\.[0-9]+)?$/;

function parseProportion(text: string, culture: DurationCulture): Decimal | null {
  let s = text;
  if (culture.negativeSign && s.startsWith(culture.negativeSign)) s = `-${s.slice(culture.negativeSign.length)}`;
  if (culture.numberDecimalSeparator) s = s.replace(culture.numberDecimalSeparator, ".");
  return PLAIN_PROPORTION.test(s) ? new Dec(s) : null;
}

/** Null when `text` is neither a proportion nor a duration. Without a pattern every standard one is tried. */
export function tryParseRelativeDuration(
  text: string | null | undefined,
  pattern?: string | null,
  culture: DurationCulture = INVARIANT_CULTURE
): RelativeDuration | null {
  const input = text?.trim() ?? "";
  if (input.startsWith(DAY_PREFIX) || input.startsWith(YEAR_PREFIX)) {
    const proportion = parseProportion(input.slice(DAY_PREFIX.length), culture);
    if (proportion === null) return null;
    return input.startsWith(DAY_PREFIX)
      ? RelativeDuration.fromProportionOfDay(proportion)
      : RelativeDuration.fromProportionOfYear(proportion);
  }
  const duration = pattern ? tryParseExact(input, pattern, culture) : tryParse(input, culture);
  return duration === null ? null : RelativeDuration.fromDuration(duration);
}

export function parseRelativeDuration(
  text: string | null | undefined,
  pattern?: string | null,
  culture: DurationCulture = INVARIANT_CULTURE
): RelativeDuration {
  const result = tryParseRelativeDuration(text, pattern, culture);
  if (result === null) {
    throw new DurationFormatError("Text is not a recognized relative duration", { text, pattern });
  }
  return result;
}
