/**
 * Scaled arithmetic — multiply and divide by a scalar, ratio of two
 * durations, modulus.
 * Framework-independent.
 */

import type { Decimal } from "decimal.js";
import { abs, add, negate, subtract } from "./arithmetic.js";
import type { Scalar, TimeUnit } from "./core.js";
import { DECIMAL_PRECISION, Dec, floorToBigInt, roundToBigInt, toDecimal } from "./decimal.js";
import { Duration } from "./duration.js";
import {
  fromAeons,
  fromNanoseconds,
  fromPlanckTime,
  fromYears,
  fromYoctoseconds,
  toUnit,
  totalPlanckTime,
} from "./conversions.js";
import { OverflowError, ValidationError } from "./errors.js";
import { MAX_AEON_DIGITS, YEARS_PER_AEON } from "./units.js";

function scalarOrThrow(value: Scalar, name: string): Decimal {
  const scalar = toDecimal(value);
  if (scalar.isNaN()) {
    throw new ValidationError(`${name} must not be NaN`);
  }
  return scalar;
}

/** A zero scalar counts as positive when it meets a perpetual value. */
function isNegativeScalar(scalar: Decimal): boolean {
  return !scalar.isZero() && scalar.isNegative();
}

function signedInfinity(isNegative: boolean): Duration {
  return isNegative ? Duration.NEGATIVE_INFINITY : Duration.POSITIVE_INFINITY;
}

/**
 * d × factor. Each field is scaled on its own and the parts are summed most
 * significant first; whole aeons stay aeons and their fraction is carried down.
 */
export function multiply(d: Duration, factor: Scalar): Duration {
  const f = scalarOrThrow(factor, "factor");
  const isNegative = d.isNegative !== isNegativeScalar(f);
  if (d.isPerpetual) return signedInfinity(isNegative);
  if (f.isZero() || d.isZero) return Duration.ZERO;
  if (!f.isFinite()) return signedInfinity(isNegative);

  const scale = f.abs();
  const parts: Duration[] = [];
  if (d.aeons != null) {
    const aeons = new Dec(d.aeons.toString()).times(scale);
    const whole = floorToBigInt(aeons);
    parts.push(Duration.fromComponents({ aeons: whole }), fromAeons(aeons.minus(whole.toString())));
  }
  if (d.years > 0) parts.push(fromYears(scale.times(d.years)));
  if (d.totalNanoseconds > 0n) parts.push(fromNanoseconds(scale.times(d.totalNanoseconds.toString())));
  if (d.totalYoctoseconds > 0n) parts.push(fromYoctoseconds(scale.times(d.totalYoctoseconds.toString())));
  if (d.planckTime != null) parts.push(fromPlanckTime(scale.times(d.planckTime.toString())));

  const product = parts.reduce((sum, part) => add(sum, part), Duration.ZERO);
  return isNegative ? negate(product) : product;
}

/**
 * d ÷ divisor. The whole magnitude in Planck time is divided at once and
 * rounded to the nearest Planck time. A zero divisor gives infinity with the
 * sign of `d`.
 */
export function divide(d: Duration, divisor: Scalar): Duration {
  const f = scalarOrThrow(divisor, "divisor");
  if (d.isZero) return Duration.ZERO;
  const isNegative = d.isNegative !== isNegativeScalar(f);
  if (d.isPerpetual) return signedInfinity(isNegative);
  if (f.isZero()) return signedInfinity(d.isNegative);
  if (!f.isFinite()) return Duration.ZERO;

  const quotient = new Dec(totalPlanckTime(abs(d)).toString()).div(f.abs());
  if (quotient.e >= DECIMAL_PRECISION) {
    throw new OverflowError(`Quotient exceeds ${MAX_AEON_DIGITS} aeon digits`, { divisor: f.toString() });
  }
  const magnitude = Duration.fromComponents({ planckTime: roundToBigInt(quotient) });
  return isNegative ? negate(magnitude) : magnitude;
}

/** Common units tried by divideByDuration, finest first. */
const RATIO_UNITS: readonly TimeUnit[] = ["planckTime", "yoctoseconds", "nanoseconds", "seconds", "years"];

/**
 * a ÷ b as a double. Tries successively coarser common units and returns the
 * first finite, non-zero ratio; the final aeon-level ratio is returned even
 * when it is zero or infinite.
 */
export function divideByDuration(a: Duration, b: Duration): number {
  if (a.isZero) return b.isZero ? NaN : 0;
  if (a.isPerpetual || b.isZero) {
    const isNegative = b.isZero ? a.isNegative : a.isNegative !== b.isNegative;
    return isNegative ? -Infinity : Infinity;
  }
  if (b.isPerpetual) return 0;

  for (const unit of RATIO_UNITS) {
    const first = toUnit(a, unit);
    const second = toUnit(b, unit);
    if (Number.isFinite(first) && Number.isFinite(second)) {
      const ratio = first / second;
      if (Number.isFinite(ratio) && ratio !== 0) return ratio;
    }
  }
  const aeons = (d: Duration): Decimal =>
    new Dec(d.totalYears.toString()).div(YEARS_PER_AEON).times(d.isNegative ? -1 : 1);
  return aeons(a).div(aeons(b)).toNumber();
}

/** ⌊|a| ÷ |b|⌋, exact. */
function floorQuotient(a: Duration, b: Duration): bigint {
  return totalPlanckTime(abs(a)) / totalPlanckTime(abs(b));
}

/**
 * sign(a) · (|a| − |b| · ⌊|a| ÷ |b|⌋). A zero divisor leaves `a`, and so does
 * a perpetual divisor; a perpetual dividend leaves zero.
 */
export function modulus(a: Duration, b: Duration): Duration {
  if (a.isZero && b.isZero) {
    throw new ValidationError("Modulus of zero by zero is undefined");
  }
  if (a.isPerpetual) return Duration.ZERO;
  if (b.isPerpetual || b.isZero) return a;
  const remainder = subtract(abs(a), multiply(abs(b), floorQuotient(a, b)));
  return a.isNegative ? negate(remainder) : remainder;
}
