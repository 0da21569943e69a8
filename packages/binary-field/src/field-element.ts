/**
 * Elements of GF(2^m)
 *
 * An element is a power of the primitive element α (or zero) plus a shared
 * reference to its field tables. Multiplication, division and powers work
 * on exponents; addition goes through the vector form.
 */

import type {
  Bit,
  ElementOperationError,
  ElementValue,
  FieldConstructionError,
  FieldSpecifier,
  PowerValue,
  Safe,
} from '@gf2m/types'
import {
  DivisionByZeroError,
  FieldMismatchError,
  InvalidExponentTypeError,
  InvariantViolationError,
  powerValue,
  safeError,
  safeResult,
  sameValue,
  ZERO,
} from '@gf2m/types'
import { mod, toBits } from './bits'
import { FieldTables } from './field-tables'
import { candidatePolynomial, nonzeroPositions } from './gf2-polynomial'

export interface ElementFormatOptions {
  /** Append the field order, e.g. `a^3 GF(16)` */
  withField?: boolean
}

function resolveField(
  field: FieldTables | FieldSpecifier,
): Safe<FieldTables, FieldConstructionError> {
  if (field instanceof FieldTables) {
    return safeResult(field)
  }
  return FieldTables.create(field)
}

/**
 * Immutable element of a binary extension field
 */
export class FieldElement {
  private constructor(
    readonly value: ElementValue,
    readonly field: FieldTables,
  ) {}

  /**
   * Create α^exponent in a field
   *
   * @param field - Shared field tables, or a specifier to build them from
   * @param exponent - Power of α (reduced modulo q-1); omitted for 1, `null`
   * for zero
   */
  static create(
    field: FieldTables | FieldSpecifier,
    exponent?: number | null,
  ): Safe<FieldElement, FieldConstructionError | InvalidExponentTypeError> {
    const [fieldError, tables] = resolveField(field)
    if (fieldError) {
      return safeError(fieldError)
    }
    if (exponent === null) {
      return safeResult(new FieldElement(ZERO, tables))
    }

    const power = exponent ?? 0
    if (!Number.isInteger(power)) {
      return safeError(new InvalidExponentTypeError(power))
    }
    return safeResult(
      new FieldElement(powerValue(mod(power, tables.order)), tables),
    )
  }

  static zero(field: FieldTables): FieldElement {
    return new FieldElement(ZERO, field)
  }

  static one(field: FieldTables): FieldElement {
    return new FieldElement(powerValue(0), field)
  }

  /** The primitive element α */
  static alpha(field: FieldTables): FieldElement {
    return new FieldElement(powerValue(mod(1, field.order)), field)
  }

  /**
   * The q-1 nonzero elements α^0 … α^(q-2) in exponent order
   */
  static elements(field: FieldTables): FieldElement[] {
    return Array.from(
      { length: field.order },
      (_, exponent) => new FieldElement(powerValue(exponent), field),
    )
  }

  /** Power of α, or `null` for zero */
  get exponent(): number | null {
    return this.value.kind === 'zero' ? null : this.value.exponent
  }

  get q(): number {
    return this.field.q
  }

  isZero(): boolean {
    return this.value.kind === 'zero'
  }

  isOne(): boolean {
    return this.value.kind === 'power' && this.value.exponent === 0
  }

  /**
   * Add two elements (XOR of vector forms). Identical to subtraction in
   * characteristic 2.
   */
  add(other: FieldElement): Safe<FieldElement, FieldMismatchError> {
    const mismatch = this.checkField(other)
    if (mismatch) {
      return safeError(mismatch)
    }
    const sum =
      this.field.powerToPoly(this.value) ^ other.field.powerToPoly(other.value)
    return safeResult(this.withValue(this.field.polyToPower(sum)))
  }

  subtract(other: FieldElement): Safe<FieldElement, FieldMismatchError> {
    return this.add(other)
  }

  multiply(other: FieldElement): Safe<FieldElement, FieldMismatchError> {
    const mismatch = this.checkField(other)
    if (mismatch) {
      return safeError(mismatch)
    }
    return safeResult(this.withValue(this.product(this.value, other.value)))
  }

  /**
   * Divide by an element, or by α^divisor when given a raw exponent
   */
  divide(
    divisor: FieldElement | number,
  ): Safe<FieldElement, ElementOperationError> {
    if (typeof divisor === 'number') {
      if (!Number.isInteger(divisor)) {
        return safeError(new InvalidExponentTypeError(divisor))
      }
      return safeResult(this.withValue(this.quotient(powerValue(divisor))))
    }

    const mismatch = this.checkField(divisor)
    if (mismatch) {
      return safeError(mismatch)
    }
    if (divisor.value.kind === 'zero') {
      return safeError(new DivisionByZeroError(this.field.q))
    }
    return safeResult(this.withValue(this.quotient(divisor.value)))
  }

  /**
   * Multiplicative inverse, α^(-exponent)
   */
  inverse(): Safe<FieldElement, DivisionByZeroError> {
    if (this.value.kind === 'zero') {
      return safeError(new DivisionByZeroError(this.field.q))
    }
    return safeResult(
      this.withValue(powerValue(mod(-this.value.exponent, this.field.order))),
    )
  }

  /**
   * Raise to an integer power; negative powers invert. Zero stays zero for
   * every power.
   */
  pow(k: number): Safe<FieldElement, InvalidExponentTypeError> {
    if (!Number.isInteger(k)) {
      return safeError(new InvalidExponentTypeError(k))
    }
    return safeResult(this.withValue(this.power(k)))
  }

  /** Integer vector form (bit i is the coefficient of x^i) */
  polynomial(): number {
    return this.field.powerToPoly(this.value)
  }

  /** m-bit vector form, MSB first */
  vec(): Bit[] {
    return toBits(this.polynomial(), this.field.m)
  }

  /**
   * Frobenius orbit e, e^2, e^4, … up to (not including) the return to e
   */
  conjugates(): FieldElement[] {
    if (this.value.kind === 'zero') {
      return [this]
    }

    const start = this.value.exponent
    const orbit: FieldElement[] = []
    let exponent = start
    do {
      orbit.push(this.withValue(powerValue(exponent)))
      exponent = mod(2 * exponent, this.field.order)
    } while (exponent !== start)
    return orbit
  }

  /**
   * Evaluate a polynomial over GF(2) at this element by Horner's rule
   *
   * @param coefficients - MSB first, e.g. `[1, 0, 1, 1]` for x^3 + x + 1
   */
  evaluate(coefficients: readonly Bit[]): FieldElement {
    let acc: ElementValue = ZERO
    for (const coefficient of coefficients) {
      acc = this.product(acc, this.value)
      if (coefficient === 1) {
        acc = this.sum(acc, powerValue(0))
      }
    }
    return this.withValue(acc)
  }

  /**
   * Minimal polynomial over GF(2)
   *
   * Searches monic polynomials of degree equal to the orbit length with
   * constant term 1, interior coefficients in ascending bit-pattern order,
   * and returns the first with this element as a root.
   *
   * @param asPositions - Return the ascending exponents of the nonzero
   * coefficients instead of the coefficient vector
   */
  minpoly(asPositions?: false): Safe<Bit[], InvariantViolationError>
  minpoly(asPositions: true): Safe<number[], InvariantViolationError>
  minpoly(asPositions: boolean): Safe<number[], InvariantViolationError>
  minpoly(asPositions = false): Safe<number[], InvariantViolationError> {
    const [error, coefficients] = this.minimalPolynomial()
    if (error) {
      return safeError(error)
    }
    return safeResult(
      asPositions ? nonzeroPositions(coefficients) : coefficients,
    )
  }

  private minimalPolynomial(): Safe<Bit[], InvariantViolationError> {
    if (this.value.kind === 'zero') {
      return safeResult<Bit[]>([1, 0])
    }
    if (this.value.exponent === 0) {
      return safeResult<Bit[]>([1, 1])
    }

    const degree = this.conjugates().length
    const candidates = 2 ** (degree - 1)
    for (let pattern = 0; pattern < candidates; pattern++) {
      const candidate = candidatePolynomial(pattern, degree)
      if (this.evaluate(candidate).isZero()) {
        return safeResult(candidate)
      }
    }

    return safeError(
      new InvariantViolationError(
        `No minimal polynomial of degree ${degree} found for ${this.toString({ withField: true })}`,
        { exponent: this.value.exponent, primitive: this.field.primitive },
      ),
    )
  }

  /**
   * Compare with another element, or with the literals 0 and 1
   */
  equals(other: FieldElement | 0 | 1): boolean {
    if (other === 0) return this.isZero()
    if (other === 1) return this.isOne()
    return (
      this.field.sameOrder(other.field) && sameValue(this.value, other.value)
    )
  }

  /**
   * `0`, `1` or `a^<exponent>`, optionally followed by ` GF(<q>)`
   */
  toString(options: ElementFormatOptions = {}): string {
    const fieldSuffix = options.withField ? ` ${this.field.toString()}` : ''
    if (this.value.kind === 'zero') return `0${fieldSuffix}`
    if (this.value.exponent === 0) return `1${fieldSuffix}`
    return `a^${this.value.exponent}${fieldSuffix}`
  }

  private checkField(other: FieldElement): FieldMismatchError | undefined {
    if (this.field.sameOrder(other.field)) return undefined
    return new FieldMismatchError(this.field.q, other.field.q)
  }

  private withValue(value: ElementValue): FieldElement {
    return new FieldElement(value, this.field)
  }

  private sum(a: ElementValue, b: ElementValue): ElementValue {
    return this.field.polyToPower(
      this.field.powerToPoly(a) ^ this.field.powerToPoly(b),
    )
  }

  private product(a: ElementValue, b: ElementValue): ElementValue {
    if (a.kind === 'zero' || b.kind === 'zero') return ZERO
    return powerValue(mod(a.exponent + b.exponent, this.field.order))
  }

  private quotient(divisor: PowerValue): ElementValue {
    if (this.value.kind === 'zero') return ZERO
    return powerValue(
      mod(this.value.exponent - divisor.exponent, this.field.order),
    )
  }

  private power(k: number): ElementValue {
    if (this.value.kind === 'zero') return ZERO
    const order = this.field.order
    return powerValue(mod(mod(k, order) * this.value.exponent, order))
  }
}
