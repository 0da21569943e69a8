/**
 * Polynomials over GF(2)
 *
 * Coefficient vectors are MSB first: `[1, 0, 1, 1]` is x^3 + x + 1.
 */

import type { Bit } from '@gf2m/types'
import { toBits } from './bits'

/**
 * Monic candidate of the given degree with constant term 1 and the interior
 * coefficients taken MSB first from `pattern`
 */
export function candidatePolynomial(pattern: number, degree: number): Bit[] {
  return [1, ...toBits(pattern, degree - 1), 1]
}

/**
 * Ascending exponents of the nonzero coefficients
 */
export function nonzeroPositions(coefficients: readonly Bit[]): number[] {
  const degree = coefficients.length - 1
  const positions: number[] = []
  for (let power = 0; power <= degree; power++) {
    if (coefficients[degree - power] === 1) positions.push(power)
  }
  return positions
}

/**
 * Human-readable form of a polynomial given by its nonzero exponents,
 * highest term first, e.g. `x^4 + x + 1`
 */
export function formatTerms(positions: readonly number[]): string {
  if (positions.length === 0) return '0'
  return [...positions]
    .sort((a, b) => b - a)
    .map((power) => {
      if (power === 0) return '1'
      if (power === 1) return 'x'
      return `x^${power}`
    })
    .join(' + ')
}
