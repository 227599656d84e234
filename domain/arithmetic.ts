/**
 * Exact arithmetic — negate, absolute value, add, subtract, compare.
 * Framework-independent. Every result goes through the trusted factory.
 */

import { asSign, type Sign } from "./core.js";
import { Duration } from "./duration.js";
import {
  NANOSECONDS_PER_YEAR,
  PLANCK_TIME_PER_YOCTOSECOND,
  YEARS_PER_AEON_BIG,
  YOCTOSECONDS_PER_NANOSECOND,
} from "./units.js";

/** Magnitude as five bigints, most significant first. */
type Magnitude = readonly [aeons: bigint, years: bigint, ns: bigint, ys: bigint, planck: bigint];

/** Radix of each field of a Magnitude; aeons have none. */
const RADICES: readonly bigint[] = [
  0n,
  YEARS_PER_AEON_BIG,
  NANOSECONDS_PER_YEAR,
  YOCTOSECONDS_PER_NANOSECOND,
  PLANCK_TIME_PER_YOCTOSECOND,
];

function magnitude(d: Duration): Magnitude {
  return [d.aeons ?? 0n, BigInt(d.years), d.totalNanoseconds, d.totalYoctoseconds, d.planckTime ?? 0n];
}

function fromMagnitude(m: readonly bigint[], isNegative: boolean): Duration {
  return Duration.fromCanonicalFields({
    isNegative,
    isPerpetual: false,
    aeons: m[0] ?? 0n,
    years: Number(m[1] ?? 0n),
    totalNanoseconds: m[2] ?? 0n,
    totalYoctoseconds: m[3] ?? 0n,
    planckTime: m[4] ?? 0n,
  });
}

/** Lexicographic comparison of |a| and |b|, ignoring sign and perpetuity. */
export function compareMagnitude(a: Duration, b: Duration): Sign {
  const ma = magnitude(a);
  const mb = magnitude(b);
  for (let i = 0; i < ma.length; i++) {
    const x = ma[i] ?? 0n;
    const y = mb[i] ?? 0n;
    if (x !== y) return x < y ? -1 : 1;
  }
  return 0;
}

/** |a| + |b|, carrying bottom-up. */
function addMagnitudes(a: Duration, b: Duration, isNegative: boolean): Duration {
  const ma = magnitude(a);
  const mb = magnitude(b);
  const out: bigint[] = [0n, 0n, 0n, 0n, 0n];
  let carry = 0n;
  for (let i = ma.length - 1; i >= 0; i--) {
    let sum = (ma[i] ?? 0n) + (mb[i] ?? 0n) + carry;
    const radix = RADICES[i] ?? 0n;
    carry = 0n;
    if (radix > 0n && sum >= radix) {
      carry = sum / radix;
      sum %= radix;
    }
    out[i] = sum;
  }
  return fromMagnitude(out, isNegative);
}

/** |a| − |b| for |a| ≥ |b|, borrowing from the next more significant field. */
function subtractMagnitudes(a: Duration, b: Duration, isNegative: boolean): Duration {
  const ma = magnitude(a);
  const mb = magnitude(b);
  const out: bigint[] = [0n, 0n, 0n, 0n, 0n];
  let borrow = 0n;
  for (let i = ma.length - 1; i >= 0; i--) {
    let diff = (ma[i] ?? 0n) - (mb[i] ?? 0n) - borrow;
    borrow = 0n;
    if (diff < 0n) {
      diff += RADICES[i] ?? 0n;
      borrow = 1n;
    }
    out[i] = diff;
  }
  return fromMagnitude(out, isNegative);
}

export function negate(d: Duration): Duration {
  if (d.isZero) return Duration.ZERO;
  if (d.isPerpetual) return d.isNegative ? Duration.POSITIVE_INFINITY : Duration.NEGATIVE_INFINITY;
  return Duration.fromCanonicalFields({ ...d.toFields(), isNegative: !d.isNegative });
}

export function abs(d: Duration): Duration {
  return d.isNegative ? negate(d) : d;
}

/**
 * a + b. Opposite perpetual values cancel to zero; a perpetual value
 * absorbs any finite one.
 */
export function add(a: Duration, b: Duration): Duration {
  if (a.isPerpetual || b.isPerpetual) {
    if (a.isPerpetual && b.isPerpetual && a.isNegative !== b.isNegative) return Duration.ZERO;
    return a.isPerpetual ? a : b;
  }
  if (a.isZero) return b;
  if (b.isZero) return a;
  if (a.isNegative !== b.isNegative) return subtract(a, negate(b));
  return addMagnitudes(a, b, a.isNegative);
}

/** a − b. */
export function subtract(a: Duration, b: Duration): Duration {
  if (a.isPerpetual && b.isPerpetual) {
    return a.isNegative === b.isNegative ? Duration.ZERO : a;
  }
  if (a.isPerpetual) return a;
  if (b.isPerpetual) return negate(b);
  if (b.isZero) return a;
  if (a.isZero) return negate(b);

  if (a.isNegative !== b.isNegative) {
    return b.isNegative ? add(a, negate(b)) : negate(add(negate(a), b));
  }
  // Both negative: (−|a|) − (−|b|) = |b| − |a|.
  if (a.isNegative) return subtract(negate(b), negate(a));

  const cmp = compareMagnitude(a, b);
  if (cmp === 0) return Duration.ZERO;
  return cmp < 0 ? subtractMagnitudes(b, a, true) : subtractMagnitudes(a, b, false);
}

/**
 * Total order: −∞ < negative finite < 0 < positive finite < +∞.
 * Perpetual values of the same sign compare equal.
 */
export function compare(a: Duration, b: Duration): Sign {
  const sa = a.sign;
  const sb = b.sign;
  if (sa !== sb) return asSign(sa - sb);
  if (sa === 0) return 0;
  if (a.isPerpetual || b.isPerpetual) {
    if (a.isPerpetual && b.isPerpetual) return 0;
    return a.isPerpetual ? sa : asSign(-sa);
  }
  return asSign(compareMagnitude(a, b) * sa);
}

export function min(a: Duration, b: Duration): Duration {
  return compare(a, b) <= 0 ? a : b;
}

export function max(a: Duration, b: Duration): Duration {
  return compare(a, b) >= 0 ? a : b;
}
