import type { Safe } from '@gf2m/types'
import {
  DivisionByZeroError,
  FieldMismatchError,
  GaloisFieldErrorCode,
  InvalidExponentTypeError,
  UnsupportedFieldOrderError,
} from '@gf2m/types'
import { describe, expect, it } from 'vitest'
import { FieldElement } from '../field-element'
import { element, tables, unwrap } from './helpers'

const gf16 = tables([0, 1, 4])
const gf8 = tables([0, 1, 3])

describe('FieldElement construction', () => {
  it('defaults to α^0 when no exponent is given', () => {
    const one = element(gf16)
    expect(one.exponent).toBe(0)
    expect(one.isOne()).toBe(true)
  })

  it('uses null for the zero element', () => {
    const zero = element(gf16, null)
    expect(zero.exponent).toBeNull()
    expect(zero.isZero()).toBe(true)
  })

  it('reduces exponents modulo q-1', () => {
    expect(element(gf16, 15).exponent).toBe(0)
    expect(element(gf16, 17).exponent).toBe(2)
    expect(element(gf16, -1).exponent).toBe(14)
    expect(element(gf16, -30).exponent).toBe(0)
  })

  it('builds its own tables from a specifier', () => {
    const a = unwrap(FieldElement.create(16, 3))
    expect(a.q).toBe(16)
    expect(a.exponent).toBe(3)
    expect(a.field.describePolynomial()).toBe('x^4 + x + 1')
  })

  it('forwards field construction failures', () => {
    const [error, value] = FieldElement.create(12, 1)
    expect(value).toBeUndefined()
    expect(error).toBeInstanceOf(UnsupportedFieldOrderError)
  })

  it('rejects a non-integer exponent', () => {
    const [error] = FieldElement.create(gf16, 1.5)
    expect(error).toBeInstanceOf(InvalidExponentTypeError)
    expect(error?.code).toBe(GaloisFieldErrorCode.INVALID_EXPONENT_TYPE)
  })

  it('lists the nonzero elements in exponent order', () => {
    const elements = FieldElement.elements(gf8)
    expect(elements.map((e) => e.exponent)).toEqual([0, 1, 2, 3, 4, 5, 6])
    expect(FieldElement.alpha(gf8).exponent).toBe(1)
  })
})

describe('FieldElement addition', () => {
  const sums16: Array<[number | null, number | null, number | null]> = [
    [null, null, null],
    [1, 1, null],
    [13, 13, null],
    [15, 15, null],
    [1, null, 1],
    [null, 1, 1],
    [13, null, 13],
    [null, 13, 13],
    [15, null, 0],
    [null, 15, 0],
  ]

  it.each(sums16)('%s + %s = %s in GF(16)', (a, b, sum) => {
    const result = unwrap(element(gf16, a).add(element(gf16, b)))
    expect(result.equals(element(gf16, sum))).toBe(true)
  })

  it('adds through the vector form', () => {
    // α = 0010, α^4 = 0011
    expect(unwrap(element(gf16, 1).add(element(gf16, 4))).exponent).toBe(0)
    // 1 + α = 0011 = α^4
    expect(unwrap(element(gf16, 0).add(element(gf16, 1))).exponent).toBe(4)
    // α^3 + α^5 = 1000 ^ 0110 = 1110 = α^11
    expect(unwrap(element(gf16, 3).add(element(gf16, 5))).exponent).toBe(11)
  })

  it('subtracts exactly as it adds', () => {
    const a = element(gf16, 3)
    const b = element(gf16, 5)
    expect(unwrap(a.subtract(b)).equals(unwrap(a.add(b)))).toBe(true)
  })

  it('leaves the operands untouched', () => {
    const a = element(gf16, 3)
    const b = element(gf16, 5)
    unwrap(a.add(b))
    unwrap(a.multiply(b))
    expect(a.exponent).toBe(3)
    expect(b.exponent).toBe(5)
  })
})

describe('FieldElement multiplication and division', () => {
  it('adds exponents modulo q-1', () => {
    expect(unwrap(element(gf16, 7).multiply(element(gf16, 10))).exponent).toBe(
      2,
    )
  })

  it('absorbs zero', () => {
    const zero = element(gf16, null)
    expect(unwrap(element(gf16, 7).multiply(zero)).isZero()).toBe(true)
    expect(unwrap(zero.multiply(element(gf16, 7))).isZero()).toBe(true)
  })

  it('subtracts exponents modulo q-1', () => {
    expect(unwrap(element(gf16, 3).divide(element(gf16, 5))).exponent).toBe(
      13,
    )
  })

  it('divides by a raw exponent of α', () => {
    expect(unwrap(element(gf16, 2).divide(4)).exponent).toBe(13)
    expect(unwrap(element(gf16, null).divide(4)).isZero()).toBe(true)
  })

  it('divides zero into zero', () => {
    const result = unwrap(element(gf16, null).divide(element(gf16, 6)))
    expect(result.isZero()).toBe(true)
  })

  it('fails on division by zero', () => {
    const [error, value] = element(gf16, 6).divide(element(gf16, null))
    expect(value).toBeUndefined()
    expect(error).toBeInstanceOf(DivisionByZeroError)
    expect(error?.message).toBe('Division by zero in GF(16)')

    const [zeroByZero] = element(gf16, null).divide(element(gf16, null))
    expect(zeroByZero).toBeInstanceOf(DivisionByZeroError)
  })

  it('rejects a fractional raw divisor', () => {
    const [error] = element(gf16, 6).divide(2.5)
    expect(error).toBeInstanceOf(InvalidExponentTypeError)
  })

  it('inverts nonzero elements', () => {
    expect(unwrap(element(gf16, 4).inverse()).exponent).toBe(11)
    expect(unwrap(element(gf16, 0).inverse()).exponent).toBe(0)
    const [error] = element(gf16, null).inverse()
    expect(error).toBeInstanceOf(DivisionByZeroError)
  })
})

describe('FieldElement exponentiation', () => {
  it('multiplies the exponent by the power', () => {
    expect(unwrap(element(gf16, 3).pow(5)).exponent).toBe(0)
    expect(unwrap(element(gf16, 4).pow(2)).exponent).toBe(8)
  })

  it('reduces negative powers with a true modulo', () => {
    expect(unwrap(element(gf16, 2).pow(-1)).exponent).toBe(13)
    expect(unwrap(element(gf16, 4).pow(-3)).exponent).toBe(3)
  })

  it('keeps zero at zero for every power', () => {
    const zero = element(gf16, null)
    expect(unwrap(zero.pow(0)).isZero()).toBe(true)
    expect(unwrap(zero.pow(3)).isZero()).toBe(true)
    expect(unwrap(zero.pow(-2)).isZero()).toBe(true)
  })

  it('maps any nonzero element to 1 at power 0', () => {
    expect(unwrap(element(gf16, 9).pow(0)).isOne()).toBe(true)
  })

  it('rejects a non-integer power', () => {
    const [error] = element(gf16, 2).pow(0.5)
    expect(error).toBeInstanceOf(InvalidExponentTypeError)
    expect(error?.message).toBe('Exponent must be an integer, got 0.5')
  })
})

describe('FieldElement field mismatch', () => {
  const a16 = element(gf16, 1)
  const a8 = element(gf8, 1)

  it.each<[string, () => Safe<FieldElement>]>([
    ['add', () => a16.add(a8)],
    ['subtract', () => a16.subtract(a8)],
    ['multiply', () => a16.multiply(a8)],
    ['divide', () => a16.divide(a8)],
  ])('%s fails across field orders', (_, operation) => {
    const [error, value] = operation()
    expect(value).toBeUndefined()
    expect(error).toBeInstanceOf(FieldMismatchError)
    expect(error?.message).toBe('Cannot combine elements of GF(16) and GF(8)')
  })

  it('compares unequal across field orders', () => {
    expect(a16.equals(a8)).toBe(false)
  })

  it('combines elements of separately built tables of the same order', () => {
    const other = tables(16)
    const sum = unwrap(element(gf16, 1).add(element(other, 4)))
    expect(sum.exponent).toBe(0)
    expect(element(gf16, 7).equals(element(other, 7))).toBe(true)
  })
})

describe('FieldElement representation', () => {
  it('returns the MSB-first vector form', () => {
    expect(element(gf16, 4).vec()).toEqual([0, 0, 1, 1])
    expect(element(gf16, 7).vec()).toEqual([1, 0, 1, 1])
    expect(element(gf16, null).vec()).toEqual([0, 0, 0, 0])
    expect(element(gf8, 6).vec()).toEqual([1, 0, 1])
  })

  it('returns the integer vector form', () => {
    expect(element(gf16, 7).polynomial()).toBe(11)
  })

  it('displays elements as 0, 1 and a^n', () => {
    expect(element(gf16, null).toString()).toBe('0')
    expect(element(gf16, 0).toString()).toBe('1')
    expect(element(gf16, 3).toString()).toBe('a^3')
  })

  it('appends the field order on request', () => {
    expect(element(gf16, 3).toString({ withField: true })).toBe('a^3 GF(16)')
    expect(element(gf16, null).toString({ withField: true })).toBe('0 GF(16)')
    expect(element(gf8, 0).toString({ withField: true })).toBe('1 GF(8)')
  })

  it('compares with the literals 0 and 1', () => {
    expect(element(gf16, null).equals(0)).toBe(true)
    expect(element(gf16, null).equals(1)).toBe(false)
    expect(element(gf16, 0).equals(1)).toBe(true)
    expect(element(gf16, 0).equals(0)).toBe(false)
    expect(element(gf16, 2).equals(1)).toBe(false)
  })
})
