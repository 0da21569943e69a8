import { describe, expect, it } from 'vitest'
import { FieldElement } from '../field-element'
import { element, tables } from './helpers'

describe('FieldElement conjugates', () => {
  const gf16 = tables(16)

  it('doubles the exponent until the orbit closes', () => {
    const orbit = element(gf16, 3).conjugates()
    expect(orbit.map((e) => e.toString())).toEqual(['a^3', 'a^6', 'a^12', 'a^9'])
  })

  it('returns shorter orbits for elements of subfields', () => {
    expect(element(gf16, 5).conjugates().map((e) => e.exponent)).toEqual([
      5, 10,
    ])
    expect(element(gf16, 0).conjugates().map((e) => e.exponent)).toEqual([0])
  })

  it('treats zero as its own orbit', () => {
    const orbit = element(gf16, null).conjugates()
    expect(orbit).toHaveLength(1)
    expect(orbit[0].isZero()).toBe(true)
  })

  it.each([4, 8, 16, 32, 64, 128, 256])(
    'closes every orbit of GF(%i) with a length dividing m',
    (q) => {
      const field = tables(q)
      for (const e of FieldElement.elements(field)) {
        const orbit = e.conjugates()
        const last = orbit[orbit.length - 1]
        expect(((last.exponent ?? 0) * 2) % field.order).toBe(e.exponent)
        expect(field.m % orbit.length).toBe(0)
        expect(new Set(orbit.map((c) => c.exponent)).size).toBe(orbit.length)
      }
    },
  )
})
