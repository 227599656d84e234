/**
 * Duration value object — the radix chain and its two construction paths.
 *
 * A duration is a sign, a perpetual flag and five magnitude fields, most
 * significant first: aeons, years, totalNanoseconds, totalYoctoseconds,
 * planckTime. Each bounded field stays below its radix, so every value has
 * exactly one representation and structural equality is value equality.
 */

import type { ComponentValue, Sign } from "./core.js";
import { OverflowError } from "./errors.js";
import { formatDuration } from "./format.js";
import { INVARIANT_CULTURE, type DurationCulture } from "./culture.js";
import {
  ATTOSECONDS_PER_FEMTOSECOND,
  FEMTOSECONDS_PER_PICOSECOND,
  HOURS_PER_DAY,
  MAX_AEON_DIGITS,
  MICROSECONDS_PER_MILLISECOND,
  MILLISECONDS_PER_SECOND,
  MINUTES_PER_HOUR,
  NANOSECONDS_PER_DAY,
  NANOSECONDS_PER_HOUR,
  NANOSECONDS_PER_MICROSECOND,
  NANOSECONDS_PER_MILLISECOND,
  NANOSECONDS_PER_MINUTE,
  NANOSECONDS_PER_SECOND,
  NANOSECONDS_PER_YEAR,
  PLANCK_TIME_PER_YOCTOSECOND,
  SECONDS_PER_MINUTE,
  YEARS_PER_AEON,
  YEARS_PER_AEON_BIG,
  YOCTOSECONDS_PER_ATTOSECOND,
  YOCTOSECONDS_PER_FEMTOSECOND,
  YOCTOSECONDS_PER_NANOSECOND,
  YOCTOSECONDS_PER_PICOSECOND,
  YOCTOSECONDS_PER_ZEPTOSECOND,
  ZEPTOSECONDS_PER_ATTOSECOND,
} from "./units.js";
import { positiveOrNull } from "./utils.js";
import { assert, invariant } from "./validation.js";

/** The canonical fields. `null` means zero for the two unbounded fields. */
export interface DurationFields {
  readonly isNegative: boolean;
  readonly isPerpetual: boolean;
  readonly planckTime: bigint | null;
  readonly totalYoctoseconds: bigint;
  readonly totalNanoseconds: bigint;
  readonly years: number;
  readonly aeons: bigint | null;
}

/** Inputs to the normalizing constructor. Any component may exceed its natural range. */
export interface DurationComponents {
  readonly isNegative?: boolean;
  readonly aeons?: ComponentValue | null;
  readonly years?: ComponentValue;
  readonly days?: ComponentValue;
  readonly hours?: ComponentValue;
  readonly minutes?: ComponentValue;
  readonly seconds?: ComponentValue;
  readonly milliseconds?: ComponentValue;
  readonly microseconds?: ComponentValue;
  readonly nanoseconds?: ComponentValue;
  readonly picoseconds?: ComponentValue;
  readonly femtoseconds?: ComponentValue;
  readonly attoseconds?: ComponentValue;
  readonly zeptoseconds?: ComponentValue;
  readonly yoctoseconds?: ComponentValue;
  readonly planckTime?: ComponentValue | null;
}

function component(value: ComponentValue | null | undefined, name: string): bigint {
  if (value == null) return 0n;
  if (typeof value === "bigint") {
    assert(value >= 0n, `${name} must not be negative`, { [name]: value.toString() });
    return value;
  }
  assert(Number.isInteger(value) && value >= 0, `${name} must be a non-negative integer`, { [name]: value });
  return BigInt(value);
}

function checkAeonDigits(aeons: bigint | null): void {
  if (aeons != null && aeons.toString().length > MAX_AEON_DIGITS) {
    throw new OverflowError(`Aeon count exceeds ${MAX_AEON_DIGITS} digits`, {
      digits: aeons.toString().length,
    });
  }
}

export class Duration implements DurationFields {
  readonly isNegative: boolean;
  readonly isPerpetual: boolean;
  readonly planckTime: bigint | null;
  readonly totalYoctoseconds: bigint;
  readonly totalNanoseconds: bigint;
  readonly years: number;
  readonly aeons: bigint | null;

  private constructor(fields: DurationFields) {
    this.isNegative = fields.isNegative;
    this.isPerpetual = fields.isPerpetual;
    this.planckTime = fields.planckTime;
    this.totalYoctoseconds = fields.totalYoctoseconds;
    this.totalNanoseconds = fields.totalNanoseconds;
    this.years = fields.years;
    this.aeons = fields.aeons;
    Object.freeze(this);
  }

  static readonly ZERO = new Duration({
    isNegative: false,
    isPerpetual: false,
    planckTime: null,
    totalYoctoseconds: 0n,
    totalNanoseconds: 0n,
    years: 0,
    aeons: null,
  });

  static readonly POSITIVE_INFINITY = new Duration({ ...Duration.ZERO.toFields(), isPerpetual: true });

  static readonly NEGATIVE_INFINITY = new Duration({
    ...Duration.ZERO.toFields(),
    isPerpetual: true,
    isNegative: true,
  });

  /**
   * Normalizing constructor. Carries every overflow bottom-up:
   * Planck time → yoctoseconds → nanoseconds → years → aeons.
   */
  static fromComponents(c: DurationComponents): Duration {
    let planck = component(c.planckTime, "planckTime");
    let ys = planck / PLANCK_TIME_PER_YOCTOSECOND;
    planck %= PLANCK_TIME_PER_YOCTOSECOND;

    ys +=
      component(c.yoctoseconds, "yoctoseconds") +
      component(c.zeptoseconds, "zeptoseconds") * YOCTOSECONDS_PER_ZEPTOSECOND +
      component(c.attoseconds, "attoseconds") * YOCTOSECONDS_PER_ATTOSECOND +
      component(c.femtoseconds, "femtoseconds") * YOCTOSECONDS_PER_FEMTOSECOND +
      component(c.picoseconds, "picoseconds") * YOCTOSECONDS_PER_PICOSECOND;
    let ns = ys / YOCTOSECONDS_PER_NANOSECOND;
    ys %= YOCTOSECONDS_PER_NANOSECOND;

    ns +=
      component(c.nanoseconds, "nanoseconds") +
      component(c.microseconds, "microseconds") * NANOSECONDS_PER_MICROSECOND +
      component(c.milliseconds, "milliseconds") * NANOSECONDS_PER_MILLISECOND +
      component(c.seconds, "seconds") * NANOSECONDS_PER_SECOND +
      component(c.minutes, "minutes") * NANOSECONDS_PER_MINUTE +
      component(c.hours, "hours") * NANOSECONDS_PER_HOUR +
      component(c.days, "days") * NANOSECONDS_PER_DAY;
    let years = ns / NANOSECONDS_PER_YEAR;
    ns %= NANOSECONDS_PER_YEAR;

    years += component(c.years, "years");
    const aeons = years / YEARS_PER_AEON_BIG + component(c.aeons, "aeons");
    years %= YEARS_PER_AEON_BIG;

    return Duration.fromCanonicalFields({
      isNegative: c.isNegative ?? false,
      isPerpetual: false,
      planckTime: planck,
      totalYoctoseconds: ys,
      totalNanoseconds: ns,
      years: Number(years),
      aeons,
    });
  }

  /**
   * Trusted constructor for fields that are already canonical (arithmetic
   * results, structured deserialization). Stores them as given; a bound that
   * does not hold is an InvariantViolation, never a silent carry.
   */
  static fromCanonicalFields(fields: DurationFields): Duration {
    if (fields.isPerpetual) {
      return fields.isNegative ? Duration.NEGATIVE_INFINITY : Duration.POSITIVE_INFINITY;
    }
    const planckTime = positiveOrNull(fields.planckTime);
    const aeons = positiveOrNull(fields.aeons);
    invariant(
      planckTime == null || planckTime < PLANCK_TIME_PER_YOCTOSECOND,
      "planckTime out of range",
      { planckTime: planckTime?.toString() }
    );
    invariant(
      fields.totalYoctoseconds >= 0n && fields.totalYoctoseconds < YOCTOSECONDS_PER_NANOSECOND,
      "totalYoctoseconds out of range",
      { totalYoctoseconds: fields.totalYoctoseconds.toString() }
    );
    invariant(
      fields.totalNanoseconds >= 0n && fields.totalNanoseconds < NANOSECONDS_PER_YEAR,
      "totalNanoseconds out of range",
      { totalNanoseconds: fields.totalNanoseconds.toString() }
    );
    invariant(
      Number.isInteger(fields.years) && fields.years >= 0 && fields.years < YEARS_PER_AEON,
      "years out of range",
      { years: fields.years }
    );
    checkAeonDigits(aeons);

    const isZero =
      planckTime == null &&
      aeons == null &&
      fields.totalYoctoseconds === 0n &&
      fields.totalNanoseconds === 0n &&
      fields.years === 0;
    if (isZero) return Duration.ZERO;

    return new Duration({
      isNegative: fields.isNegative,
      isPerpetual: false,
      planckTime,
      totalYoctoseconds: fields.totalYoctoseconds,
      totalNanoseconds: fields.totalNanoseconds,
      years: fields.years,
      aeons,
    });
  }

  // --- State ---

  get isZero(): boolean {
    return (
      !this.isPerpetual &&
      this.aeons == null &&
      this.years === 0 &&
      this.totalNanoseconds === 0n &&
      this.totalYoctoseconds === 0n &&
      this.planckTime == null
    );
  }

  get sign(): Sign {
    if (this.isZero) return 0;
    return this.isNegative ? -1 : 1;
  }

  get isPositiveInfinity(): boolean {
    return this.isPerpetual && !this.isNegative;
  }

  get isNegativeInfinity(): boolean {
    return this.isPerpetual && this.isNegative;
  }

  // --- Projections (derived, never stored) ---

  /** aeons × YEARS_PER_AEON + years. */
  get totalYears(): bigint {
    return (this.aeons ?? 0n) * YEARS_PER_AEON_BIG + BigInt(this.years);
  }

  get days(): number {
    return Number(this.totalNanoseconds / NANOSECONDS_PER_DAY);
  }

  get hours(): number {
    return Number((this.totalNanoseconds / NANOSECONDS_PER_HOUR) % HOURS_PER_DAY);
  }

  get minutes(): number {
    return Number((this.totalNanoseconds / NANOSECONDS_PER_MINUTE) % MINUTES_PER_HOUR);
  }

  get seconds(): number {
    return Number((this.totalNanoseconds / NANOSECONDS_PER_SECOND) % SECONDS_PER_MINUTE);
  }

  get milliseconds(): number {
    return Number((this.totalNanoseconds / NANOSECONDS_PER_MILLISECOND) % MILLISECONDS_PER_SECOND);
  }

  get microseconds(): number {
    return Number((this.totalNanoseconds / NANOSECONDS_PER_MICROSECOND) % MICROSECONDS_PER_MILLISECOND);
  }

  /** Nanoseconds within the current microsecond. */
  get nanoseconds(): number {
    return Number(this.totalNanoseconds % NANOSECONDS_PER_MICROSECOND);
  }

  get picoseconds(): number {
    return Number(this.totalYoctoseconds / YOCTOSECONDS_PER_PICOSECOND);
  }

  get femtoseconds(): number {
    return Number((this.totalYoctoseconds / YOCTOSECONDS_PER_FEMTOSECOND) % FEMTOSECONDS_PER_PICOSECOND);
  }

  get attoseconds(): number {
    return Number((this.totalYoctoseconds / YOCTOSECONDS_PER_ATTOSECOND) % ATTOSECONDS_PER_FEMTOSECOND);
  }

  get zeptoseconds(): number {
    return Number((this.totalYoctoseconds / YOCTOSECONDS_PER_ZEPTOSECOND) % ZEPTOSECONDS_PER_ATTOSECOND);
  }

  /** Yoctoseconds within the current zeptosecond. */
  get yoctoseconds(): number {
    return Number(this.totalYoctoseconds % YOCTOSECONDS_PER_ZEPTOSECOND);
  }

  // --- Equality & serialization ---

  /** Component-wise equality of the canonical tuple. */
  equals(other: Duration): boolean {
    return (
      this.isNegative === other.isNegative &&
      this.isPerpetual === other.isPerpetual &&
      this.planckTime === other.planckTime &&
      this.totalYoctoseconds === other.totalYoctoseconds &&
      this.totalNanoseconds === other.totalNanoseconds &&
      this.years === other.years &&
      this.aeons === other.aeons
    );
  }

  /** The canonical fields, verbatim, for structured encoders. */
  toFields(): DurationFields {
    return {
      isNegative: this.isNegative,
      isPerpetual: this.isPerpetual,
      planckTime: this.planckTime,
      totalYoctoseconds: this.totalYoctoseconds,
      totalNanoseconds: this.totalNanoseconds,
      years: this.years,
      aeons: this.aeons,
    };
  }

  toString(pattern?: string, culture: DurationCulture = INVARIANT_CULTURE): string {
    return formatDuration(this, pattern, culture);
  }

  /** Round-trip text; the only shape the JSON adapter accepts back. */
  toJSON(): string {
    return formatDuration(this, "o", INVARIANT_CULTURE);
  }
}
