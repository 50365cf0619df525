/**
 * Base error class for all library errors.
 * Provides an optional error code for programmatic handling.
 */
export class ColorError extends Error {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'ColorError';
  }
}

/**
 * Error thrown when a channel value lies outside the domain a conversion
 * accepts (e.g., a negative encoded value, NaN, Infinity).
 */
export class DomainError extends ColorError {
  constructor(operation: string, detail: string) {
    super(`[${operation}] ${detail}`, 'DOMAIN_ERROR');
    this.name = 'DomainError';
  }
}

/**
 * Error thrown when a value tagged with one color space is handed to an
 * operation that expects another.
 */
export class ColorSpaceMismatchError extends ColorError {
  constructor(
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`Expected a ${expected} value, got ${actual}`, 'COLOR_SPACE_MISMATCH');
    this.name = 'ColorSpaceMismatchError';
  }
}

/**
 * Error thrown when a simulation or correction variant name is not known.
 */
export class UnsupportedVariantError extends ColorError {
  constructor(
    public readonly kind: 'simulation' | 'correction',
    public readonly variant: string
  ) {
    super(`Unsupported ${kind} variant: "${variant}"`, 'UNSUPPORTED_VARIANT');
    this.name = 'UnsupportedVariantError';
  }
}

/**
 * Error thrown when invalid arguments are passed to an API method
 * (e.g., a non-finite parameter, a malformed image buffer).
 */
export class ValidationError extends ColorError {
  constructor(detail: string) {
    super(detail, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when images that must be compared pixel for pixel do not
 * share width and height.
 */
export class ShapeMismatchError extends ColorError {
  constructor(detail: string) {
    super(detail, 'SHAPE_MISMATCH');
    this.name = 'ShapeMismatchError';
  }
}
