/**
 * Lookup tables for GF(2^m)
 *
 * Builds the power → polynomial (antilog) and polynomial → power (discrete
 * log) tables of a binary extension field from its primitive polynomial.
 * Tables are filled once at construction and never written again, so one
 * instance can back any number of elements.
 */

import { logger } from '@gf2m/core'
import type {
  BinaryFieldInfo,
  ElementValue,
  FieldConstructionError,
  FieldSpecifier,
  Safe,
} from '@gf2m/types'
import {
  InvalidPrimitivePolynomialError,
  powerValue,
  safeError,
  safeResult,
  UnsupportedFieldOrderError,
  ZERO,
} from '@gf2m/types'
import { formatBinary } from './bits'
import { lookupPrimitivePolynomial, MAX_FIELD_DEGREE } from './catalog'
import { formatTerms } from './gf2-polynomial'

/** Discrete-log cell never reached by the construction walk */
const UNASSIGNED = -1

/**
 * Resolve a specifier to the sorted exponent set of a primitive polynomial
 */
function resolvePrimitivePolynomial(
  specifier: FieldSpecifier,
): Safe<readonly number[], FieldConstructionError> {
  if (typeof specifier === 'number') {
    const exponents = lookupPrimitivePolynomial(specifier)
    if (!exponents) {
      return safeError(new UnsupportedFieldOrderError(specifier))
    }
    return safeResult(exponents)
  }
  return validateExponents(specifier)
}

function validateExponents(
  exponents: readonly number[],
): Safe<readonly number[], InvalidPrimitivePolynomialError> {
  const invalid = (reason: string) =>
    safeError(new InvalidPrimitivePolynomialError(reason, exponents))

  if (exponents.length === 0) {
    return invalid('polynomial has no terms')
  }
  for (const exponent of exponents) {
    if (!Number.isInteger(exponent) || exponent < 0) {
      return invalid(`exponent ${exponent} is not a non-negative integer`)
    }
  }
  if (new Set(exponents).size !== exponents.length) {
    return invalid('duplicate exponent')
  }
  if (!exponents.includes(0)) {
    return invalid('missing constant term')
  }

  const sorted = [...exponents].sort((a, b) => a - b)
  const degree = sorted[sorted.length - 1]
  if (degree < 1) {
    return invalid('missing leading term')
  }
  if (degree > MAX_FIELD_DEGREE) {
    return invalid(
      `degree ${degree} exceeds the supported maximum of ${MAX_FIELD_DEGREE}`,
    )
  }
  return safeResult(Object.freeze(sorted))
}

/**
 * GF(2^m) arithmetic tables
 */
export class FieldTables implements BinaryFieldInfo {
  readonly primitivePolynomial: number
  /** Exponents of the primitive polynomial, ascending */
  readonly exponents: readonly number[]
  readonly m: number
  readonly q: number
  readonly order: number
  /** Whether the construction walk reached every nonzero polynomial */
  readonly primitive: boolean
  private readonly powerTable: Uint32Array
  private readonly logTable: Int32Array

  private constructor(exponents: readonly number[]) {
    this.exponents = exponents
    this.primitivePolynomial = exponents.reduce(
      (bits, exponent) => bits | (1 << exponent),
      0,
    )
    this.m = 31 - Math.clz32(this.primitivePolynomial)
    this.q = 1 << this.m
    this.order = this.q - 1

    this.powerTable = new Uint32Array(this.order)
    this.logTable = new Int32Array(this.q).fill(UNASSIGNED)
    this.primitive = this.initializeTables()

    logger.debug('GF(2^m) field tables initialized', {
      m: this.m,
      q: this.q,
      primitivePolynomial: this.describePolynomial(),
    })
    if (!this.primitive) {
      logger.warn(
        `${this.describePolynomial()} is not primitive; arithmetic in GF(${this.q}) is undefined`,
      )
    }
  }

  /**
   * Build the tables for a field order from the catalog or an explicit
   * primitive polynomial
   */
  static create(
    specifier: FieldSpecifier,
  ): Safe<FieldTables, FieldConstructionError> {
    const [error, exponents] = resolvePrimitivePolynomial(specifier)
    if (error) {
      return safeError(error)
    }
    return safeResult(new FieldTables(exponents))
  }

  /**
   * Walk α^0 … α^(q-2), multiplying by x and reducing modulo the primitive
   * polynomial whenever the degree reaches m
   */
  private initializeTables(): boolean {
    const reduction = this.primitivePolynomial & (this.q - 1)
    let revisited = false
    let element = 1
    for (let n = 0; n < this.order; n++) {
      if (this.logTable[element] !== UNASSIGNED) revisited = true
      this.powerTable[n] = element
      this.logTable[element] = n
      element <<= 1
      if (element & this.q) {
        element = (element & (this.q - 1)) ^ reduction
      }
    }
    return !revisited
  }

  /**
   * Vector (polynomial) form of an element; zero maps to 0
   */
  powerToPoly(value: ElementValue): number {
    if (value.kind === 'zero') return 0
    return this.powerTable[value.exponent]
  }

  /**
   * Exponent form of a vector; 0 maps to the zero element
   */
  polyToPower(poly: number): ElementValue {
    if (poly === 0) return ZERO
    const exponent = this.logTable[poly]
    return exponent === UNASSIGNED ? ZERO : powerValue(exponent)
  }

  /**
   * m-digit binary string of a vector, MSB first
   */
  formatPolynomial(poly: number): string {
    return formatBinary(poly, this.m)
  }

  /**
   * The primitive polynomial, e.g. `x^4 + x + 1`
   */
  describePolynomial(): string {
    return formatTerms(this.exponents)
  }

  sameOrder(other: BinaryFieldInfo): boolean {
    return this.q === other.q
  }

  toString(): string {
    return `GF(${this.q})`
  }
}
