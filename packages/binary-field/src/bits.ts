import type { Bit } from '@gf2m/types'

/** Modulo that stays in [0, n) for negative dividends */
export function mod(value: number, n: number): number {
  return ((value % n) + n) % n
}

/** Convert a non-negative integer into a `width`-bit MSB-first bit vector */
export function toBits(value: number, width: number): Bit[] {
  const bits: Bit[] = new Array(width)
  for (let i = 0; i < width; i++) {
    bits[i] = (value >>> (width - 1 - i)) & 1 ? 1 : 0
  }
  return bits
}

/** Binary string of `value`, zero-padded to `width` digits */
export function formatBinary(value: number, width: number): string {
  return value.toString(2).padStart(width, '0')
}
