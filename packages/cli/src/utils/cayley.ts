/**
 * Addition and multiplication tables
 *
 * Rows and columns run over the nonzero elements α^0 … α^(q-2) in exponent
 * order; every cell holds the display form of row ∘ column.
 */

import { FieldElement, type FieldTables } from '@gf2m/binary-field'
import type { Safe } from '@gf2m/types'
import { safeError, safeResult } from '@gf2m/types'

export interface CayleyTable {
  labels: string[]
  cells: string[][]
}

type BinaryOperation = (a: FieldElement, b: FieldElement) => Safe<FieldElement>

function buildCayleyTable(
  field: FieldTables,
  operation: BinaryOperation,
): Safe<CayleyTable> {
  const elements = FieldElement.elements(field)
  const cells: string[][] = []
  for (const row of elements) {
    const line: string[] = []
    for (const column of elements) {
      const [error, result] = operation(row, column)
      if (error) {
        return safeError(error)
      }
      line.push(result.toString())
    }
    cells.push(line)
  }
  return safeResult({
    labels: elements.map((element) => element.toString()),
    cells,
  })
}

export function buildAdditionTable(field: FieldTables): Safe<CayleyTable> {
  return buildCayleyTable(field, (a, b) => a.add(b))
}

export function buildMultiplicationTable(
  field: FieldTables,
): Safe<CayleyTable> {
  return buildCayleyTable(field, (a, b) => a.multiply(b))
}

/**
 * Fixed-width text grid, right-aligned, labels in the header row and first
 * column
 */
export function renderCayleyTable(table: CayleyTable): string {
  const labelWidth = Math.max(...table.labels.map((label) => label.length))
  const columnWidths = table.labels.map((label, column) =>
    Math.max(label.length, ...table.cells.map((row) => row[column].length)),
  )

  const header = [
    ''.padStart(labelWidth),
    ...table.labels.map((label, column) =>
      label.padStart(columnWidths[column]),
    ),
  ]
  const rows = table.cells.map((row, index) => [
    table.labels[index].padStart(labelWidth),
    ...row.map((cell, column) => cell.padStart(columnWidths[column])),
  ])
  return [header, ...rows].map((line) => line.join('  ')).join('\n')
}
