/**
 * Galois field error codes and error classes
 *
 * Domain failures are returned through `Safe` tuples; these classes give the
 * error slot a stable `code` to branch on and a `context` for logging.
 */

export enum GaloisFieldErrorCode {
  UNSUPPORTED_FIELD_ORDER = 'UNSUPPORTED_FIELD_ORDER',
  INVALID_PRIMITIVE_POLYNOMIAL = 'INVALID_PRIMITIVE_POLYNOMIAL',
  FIELD_MISMATCH = 'FIELD_MISMATCH',
  DIVISION_BY_ZERO = 'DIVISION_BY_ZERO',
  INVALID_EXPONENT_TYPE = 'INVALID_EXPONENT_TYPE',
  INVARIANT_VIOLATION = 'INVARIANT_VIOLATION',
}

export class GaloisFieldError extends Error {
  constructor(
    message: string,
    public readonly code: GaloisFieldErrorCode,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'GaloisFieldError'
  }
}

export class UnsupportedFieldOrderError extends GaloisFieldError {
  constructor(public readonly order: number) {
    super(
      `No default primitive polynomial for field order ${order}`,
      GaloisFieldErrorCode.UNSUPPORTED_FIELD_ORDER,
      { order },
    )
    this.name = 'UnsupportedFieldOrderError'
  }
}

export class InvalidPrimitivePolynomialError extends GaloisFieldError {
  constructor(
    reason: string,
    public readonly exponents: readonly number[],
  ) {
    super(
      `Invalid primitive polynomial [${exponents.join(', ')}]: ${reason}`,
      GaloisFieldErrorCode.INVALID_PRIMITIVE_POLYNOMIAL,
      { exponents: [...exponents] },
    )
    this.name = 'InvalidPrimitivePolynomialError'
  }
}

export class FieldMismatchError extends GaloisFieldError {
  constructor(
    public readonly leftOrder: number,
    public readonly rightOrder: number,
  ) {
    super(
      `Cannot combine elements of GF(${leftOrder}) and GF(${rightOrder})`,
      GaloisFieldErrorCode.FIELD_MISMATCH,
      { leftOrder, rightOrder },
    )
    this.name = 'FieldMismatchError'
  }
}

export class DivisionByZeroError extends GaloisFieldError {
  constructor(order: number) {
    super(
      `Division by zero in GF(${order})`,
      GaloisFieldErrorCode.DIVISION_BY_ZERO,
      { order },
    )
    this.name = 'DivisionByZeroError'
  }
}

export class InvalidExponentTypeError extends GaloisFieldError {
  constructor(public readonly value: unknown) {
    super(
      `Exponent must be an integer, got ${String(value)}`,
      GaloisFieldErrorCode.INVALID_EXPONENT_TYPE,
      { value },
    )
    this.name = 'InvalidExponentTypeError'
  }
}

export class InvariantViolationError extends GaloisFieldError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, GaloisFieldErrorCode.INVARIANT_VIOLATION, context)
    this.name = 'InvariantViolationError'
  }
}

/**
 * Failures of field construction
 */
export type FieldConstructionError =
  | UnsupportedFieldOrderError
  | InvalidPrimitivePolynomialError

/**
 * Failures of binary element operations
 */
export type ElementOperationError =
  | FieldMismatchError
  | DivisionByZeroError
  | InvalidExponentTypeError
