import type { Safe } from '@gf2m/types'
import { safeError, safeResult } from '@gf2m/types'
import { Command } from 'commander'
import { FIELD_ARGUMENT_HELP, parseFieldArgument } from '../utils/field-argument'
import {
  buildMinimalPolynomialTable,
  renderMinimalPolynomialTable,
} from '../utils/minpoly-table'
import { printOrExit } from '../utils/output'

export function runMinpolysCommand(fieldArgument: string): Safe<string> {
  const [fieldError, field] = parseFieldArgument(fieldArgument)
  if (fieldError) {
    return safeError(fieldError)
  }
  const [error, rows] = buildMinimalPolynomialTable(field)
  if (error) {
    return safeError(error)
  }
  return safeResult(renderMinimalPolynomialTable(rows))
}

export function createMinpolysCommand(defaultField: string): Command {
  return new Command('minpolys')
    .description(
      'Print the minimal polynomials of a field with the smallest power of α that is a root',
    )
    .argument('[field]', FIELD_ARGUMENT_HELP, defaultField)
    .action((field: string) => {
      printOrExit(runMinpolysCommand(field))
    })
}
