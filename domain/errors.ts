/**
 * Domain error model — base and concrete error types.
 * Framework-independent. Sentinel results (NaN, infinity, zero) are not errors.
 */

/** Optional metadata attached to domain errors. */
export type ErrorMetadata = Record<string, unknown>;

/** Base for all domain errors. Preserves prototype chain for instanceof. */
export class DomainError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when an argument is unusable (NaN factor, negative component, ...). */
export class ValidationError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown when the trusted construction path is handed non-canonical fields. */
export class InvariantViolation extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown when an aeon count would need more digits than MAX_AEON_DIGITS. */
export class OverflowError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown by the throwing parse entry points when text does not match. */
export class DurationFormatError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}
