/**
 * Default primitive polynomials
 *
 * One primitive polynomial per supported field order, given as the exponents
 * of x with coefficient 1.
 */

/** Largest extension degree accepted for an explicit primitive polynomial */
export const MAX_FIELD_DEGREE = 20

const PRIMITIVE_POLYNOMIALS: ReadonlyMap<number, readonly number[]> = new Map<
  number,
  readonly number[]
>([
  [4, Object.freeze([0, 1, 2])], // x^2 + x + 1
  [8, Object.freeze([0, 1, 3])], // x^3 + x + 1
  [16, Object.freeze([0, 1, 4])], // x^4 + x + 1
  [32, Object.freeze([0, 2, 5])], // x^5 + x^2 + 1
  [64, Object.freeze([0, 1, 6])], // x^6 + x + 1
  [128, Object.freeze([0, 3, 7])], // x^7 + x^3 + 1
  [256, Object.freeze([0, 2, 3, 4, 8])], // x^8 + x^4 + x^3 + x^2 + 1
])

/**
 * Get the default primitive polynomial for a field order
 */
export function lookupPrimitivePolynomial(
  order: number,
): readonly number[] | undefined {
  return PRIMITIVE_POLYNOMIALS.get(order)
}

/**
 * Field orders with a default primitive polynomial, ascending
 */
export function supportedFieldOrders(): number[] {
  return [...PRIMITIVE_POLYNOMIALS.keys()].sort((a, b) => a - b)
}
