import type { FieldTables } from '@gf2m/binary-field'
import type { Safe } from '@gf2m/types'
import { safeError, safeResult } from '@gf2m/types'
import { Command } from 'commander'
import {
  buildAdditionTable,
  buildMultiplicationTable,
  type CayleyTable,
  renderCayleyTable,
} from '../utils/cayley'
import { FIELD_ARGUMENT_HELP, parseFieldArgument } from '../utils/field-argument'
import { printOrExit } from '../utils/output'

type TableKind = 'addition' | 'multiplication'

const builders: Record<
  TableKind,
  (field: FieldTables) => Safe<CayleyTable>
> = {
  addition: buildAdditionTable,
  multiplication: buildMultiplicationTable,
}

export function runTableCommand(
  kind: TableKind,
  fieldArgument: string,
): Safe<string> {
  const [fieldError, field] = parseFieldArgument(fieldArgument)
  if (fieldError) {
    return safeError(fieldError)
  }
  const [error, table] = builders[kind](field)
  if (error) {
    return safeError(error)
  }
  const title = `${kind === 'addition' ? 'Addition' : 'Multiplication'} table of ${field.toString()}, ${field.describePolynomial()}`
  return safeResult(`${title}\n\n${renderCayleyTable(table)}`)
}

export function createAddTableCommand(defaultField: string): Command {
  return new Command('add-table')
    .description('Print the addition table of a field')
    .argument('[field]', FIELD_ARGUMENT_HELP, defaultField)
    .action((field: string) => {
      printOrExit(runTableCommand('addition', field))
    })
}

export function createMulTableCommand(defaultField: string): Command {
  return new Command('mul-table')
    .description('Print the multiplication table of a field')
    .argument('[field]', FIELD_ARGUMENT_HELP, defaultField)
    .action((field: string) => {
      printOrExit(runTableCommand('multiplication', field))
    })
}
