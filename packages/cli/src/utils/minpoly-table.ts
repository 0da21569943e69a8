/**
 * Minimal polynomial table
 *
 * Lists the distinct minimal polynomials of a field by walking the odd
 * powers of α, one row per conjugacy class, in the layout of the classic
 * coding-theory appendices.
 */

import { FieldElement, type FieldTables } from '@gf2m/binary-field'
import type { Safe } from '@gf2m/types'
import { safeError, safeResult } from '@gf2m/types'
import { cluster } from 'radash'

export interface MinimalPolynomialRow {
  /** Smallest odd power of α in the conjugacy class */
  power: number
  /** Ascending exponents of the nonzero coefficients */
  positions: number[]
}

export function buildMinimalPolynomialTable(
  field: FieldTables,
): Safe<MinimalPolynomialRow[]> {
  const alpha = FieldElement.alpha(field)
  const seen = new Set<string>()
  const rows: MinimalPolynomialRow[] = []
  let degreeSum = 0

  for (let power = 1; power < field.q - 2; power += 2) {
    const [powError, element] = alpha.pow(power)
    if (powError) {
      return safeError(powError)
    }
    const [error, positions] = element.minpoly(true)
    if (error) {
      return safeError(error)
    }

    const key = positions.join(',')
    if (seen.has(key)) continue
    seen.add(key)
    rows.push({ power, positions })

    degreeSum += positions[positions.length - 1]
    if (degreeSum >= field.q - 2) break
  }
  return safeResult(rows)
}

/**
 * Two entries per line: `<power>: [<positions>]`
 */
export function renderMinimalPolynomialTable(
  rows: readonly MinimalPolynomialRow[],
): string {
  return cluster([...rows], 2)
    .map((pair) =>
      pair
        .map(
          ({ power, positions }) =>
            `${String(power).padStart(3)}: ${`[${positions.join(', ')}]`.padEnd(30)}`,
        )
        .join('')
        .trimEnd(),
    )
    .join('\n')
}
