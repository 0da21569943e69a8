/**
 * Binary Extension Field Types
 *
 * Shared shapes for GF(2^m) construction and element values
 */

/**
 * Field specifier: a catalog field order (e.g. 16), or the exponents with
 * coefficient 1 of an explicit primitive polynomial (e.g. [0, 1, 4] for
 * x^4 + x + 1)
 */
export type FieldSpecifier = number | readonly number[]

/**
 * Zero element, held outside the exponent range
 */
export interface ZeroValue {
  readonly kind: 'zero'
}

/**
 * Nonzero element α^exponent, exponent in [0, q-2]
 */
export interface PowerValue {
  readonly kind: 'power'
  readonly exponent: number
}

export type ElementValue = ZeroValue | PowerValue

/** Binary digit of a vector or coefficient representation */
export type Bit = 0 | 1

/**
 * Read-only view of field metadata
 */
export interface BinaryFieldInfo {
  /** Primitive polynomial bitmask (bit i set ⇔ coefficient of x^i is 1) */
  readonly primitivePolynomial: number
  /** Extension degree */
  readonly m: number
  /** Field order 2^m */
  readonly q: number
  /** Order of the multiplicative group, q - 1 */
  readonly order: number
}

export const ZERO: ZeroValue = { kind: 'zero' }

export function powerValue(exponent: number): PowerValue {
  return { kind: 'power', exponent }
}

export function sameValue(a: ElementValue, b: ElementValue): boolean {
  if (a.kind === 'zero' || b.kind === 'zero') {
    return a.kind === b.kind
  }
  return a.exponent === b.exponent
}
