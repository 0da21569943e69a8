/**
 * Binary extension field arithmetic
 *
 * GF(2^m) lookup tables, field elements, conjugate orbits and minimal
 * polynomials.
 */

export type {
  Bit,
  ElementValue,
  FieldSpecifier,
} from '@gf2m/types'
export { mod, toBits, formatBinary } from './bits'
export {
  lookupPrimitivePolynomial,
  MAX_FIELD_DEGREE,
  supportedFieldOrders,
} from './catalog'
export { type ElementFormatOptions, FieldElement } from './field-element'
export { FieldTables } from './field-tables'
export {
  candidatePolynomial,
  formatTerms,
  nonzeroPositions,
} from './gf2-polynomial'
