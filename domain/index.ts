/**
 * Public surface of the duration engine.
 */

export type { ComponentValue, Scalar, Sign, TimeUnit } from "./core.js";
export { TIME_UNITS } from "./core.js";
export { Duration, type DurationComponents, type DurationFields } from "./duration.js";
export { abs, add, compare, max, min, negate, subtract } from "./arithmetic.js";
export { divide, divideByDuration, modulus, multiply } from "./scaling.js";
export * from "./conversions.js";
export { formatDuration } from "./format.js";
export { parse, parseExact, tryParse, tryParseExact } from "./parse.js";
export { STANDARD_PATTERNS, ROUND_TRIP_PATTERN } from "./pattern.js";
export { INVARIANT_CULTURE, cultureFromLocale, type DurationCulture } from "./culture.js";
export {
  RelativeDuration,
  formatRelativeDuration,
  parseRelativeDuration,
  tryParseRelativeDuration,
  type Relativity,
} from "./relativeDuration.js";
export { durationFromJSON, durationToJSON, fromStructured, toStructured, type StructuredDuration } from "./json.js";
export { DomainError, DurationFormatError, InvariantViolation, OverflowError, ValidationError } from "./errors.js";
export { MAX_AEON_DIGITS, PLANCK_TIME_PER_UNIT, YEARS_PER_AEON } from "./units.js";
