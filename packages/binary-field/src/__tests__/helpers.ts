import type { Safe } from '@gf2m/types'
import { FieldElement } from '../field-element'
import { FieldTables } from '../field-tables'

export function unwrap<T>(result: Safe<T>): T {
  const [error, value] = result
  if (error) throw error
  return value
}

export function tables(specifier: number | readonly number[]): FieldTables {
  return unwrap(FieldTables.create(specifier))
}

export function element(
  field: FieldTables,
  exponent?: number | null,
): FieldElement {
  return unwrap(FieldElement.create(field, exponent))
}
