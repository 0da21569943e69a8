import { type FieldElement, formatTerms } from '@gf2m/binary-field'
import type { InvariantViolationError, Safe } from '@gf2m/types'
import { safeError, safeResult } from '@gf2m/types'

export interface ElementSummary {
  display: string
  vector: string
  conjugates: string[]
  coefficients: number[]
  positions: number[]
}

export function summarizeElement(
  element: FieldElement,
): Safe<ElementSummary, InvariantViolationError> {
  const [error, coefficients] = element.minpoly()
  if (error) {
    return safeError(error)
  }
  const [positionsError, positions] = element.minpoly(true)
  if (positionsError) {
    return safeError(positionsError)
  }

  return safeResult({
    display: element.toString({ withField: true }),
    vector: element.vec().join(''),
    conjugates: element.conjugates().map((conjugate) => conjugate.toString()),
    coefficients,
    positions,
  })
}

export function renderElementSummary(summary: ElementSummary): string {
  return [
    `element:      ${summary.display}`,
    `vector:       ${summary.vector}`,
    `conjugates:   ${summary.conjugates.join(', ')}`,
    `minpoly:      ${formatTerms(summary.positions)}`,
    `coefficients: [${summary.coefficients.join(', ')}]`,
    `positions:    [${summary.positions.join(', ')}]`,
  ].join('\n')
}
