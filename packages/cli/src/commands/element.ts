import { FieldElement } from '@gf2m/binary-field'
import type { Safe } from '@gf2m/types'
import { safeError, safeResult } from '@gf2m/types'
import { Command } from 'commander'
import {
  renderElementSummary,
  summarizeElement,
} from '../utils/element-summary'
import {
  FIELD_ARGUMENT_HELP,
  parseExponentArgument,
  parseFieldArgument,
} from '../utils/field-argument'
import { printOrExit } from '../utils/output'

export function runElementCommand(
  exponentArgument: string,
  fieldArgument: string,
): Safe<string> {
  const [exponentError, exponent] = parseExponentArgument(exponentArgument)
  if (exponentError) {
    return safeError(exponentError)
  }
  const [fieldError, field] = parseFieldArgument(fieldArgument)
  if (fieldError) {
    return safeError(fieldError)
  }
  const [elementError, element] = FieldElement.create(field, exponent)
  if (elementError) {
    return safeError(elementError)
  }
  const [error, summary] = summarizeElement(element)
  if (error) {
    return safeError(error)
  }
  return safeResult(renderElementSummary(summary))
}

export function createElementCommand(defaultField: string): Command {
  return new Command('element')
    .description(
      'Describe α^exponent: vector form, conjugates and minimal polynomial',
    )
    .argument('<exponent>', 'power of α, or "zero" for the zero element')
    .argument('[field]', FIELD_ARGUMENT_HELP, defaultField)
    .action((exponent: string, field: string) => {
      printOrExit(runElementCommand(exponent, field))
    })
}
