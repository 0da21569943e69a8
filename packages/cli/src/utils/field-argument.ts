/**
 * Parsing of field and element arguments
 */

import { FieldTables } from '@gf2m/binary-field'
import { z } from '@gf2m/core'
import type { FieldSpecifier, Safe } from '@gf2m/types'
import { safeError, safeResult } from '@gf2m/types'

export const FIELD_ARGUMENT_HELP =
  'field order (e.g. 16) or primitive polynomial exponents (e.g. 0,1,4)'

export const fieldArgumentSchema = z
  .string()
  .trim()
  .regex(
    /^\d+(\s*,\s*\d+)*$/,
    'Expected a field order or a comma-separated list of exponents',
  )
  .transform((value): FieldSpecifier => {
    if (!value.includes(',')) {
      return Number.parseInt(value, 10)
    }
    return value.split(',').map((part) => Number.parseInt(part.trim(), 10))
  })

export const exponentArgumentSchema = z.union([
  z.literal('zero').transform(() => null),
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, 'Expected an integer exponent or "zero"')
    .transform((value) => Number.parseInt(value, 10)),
])

function issueMessage(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ')
}

/**
 * Build the field tables named by a command-line argument
 */
export function parseFieldArgument(value: string): Safe<FieldTables> {
  const parsed = fieldArgumentSchema.safeParse(value)
  if (!parsed.success) {
    return safeError(
      new Error(`Invalid field "${value}": ${issueMessage(parsed.error)}`),
    )
  }
  return FieldTables.create(parsed.data)
}

/**
 * Parse an exponent argument; `zero` selects the zero element
 */
export function parseExponentArgument(value: string): Safe<number | null> {
  const parsed = exponentArgumentSchema.safeParse(value)
  if (!parsed.success) {
    return safeError(
      new Error(`Invalid exponent "${value}": ${issueMessage(parsed.error)}`),
    )
  }
  return safeResult(parsed.data)
}
