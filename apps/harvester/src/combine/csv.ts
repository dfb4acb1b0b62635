import { parse } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'
import { z } from 'zod'
import type { FieldValue } from '../ingestion/scrape/types.js'

export type CsvRow = Record<string, FieldValue | undefined>

const csvRowsSchema = z.array(z.record(z.string()))

/**
 * Serialize rows with a fixed header. Empty values (null, undefined) are
 * empty cells; booleans are written as true/false.
 */
export function toCsv(columns: readonly string[], rows: readonly CsvRow[]): string {
  return stringify(
    rows.map(row => Object.fromEntries(columns.map(column => [column, row[column] ?? null]))),
    {
      header: true,
      columns: [...columns],
      cast: {
        boolean: value => (value ? 'true' : 'false'),
      },
    }
  )
}

/** Parse a CSV with a header row into string-valued rows */
export function fromCsv(text: string): Array<Record<string, string>> {
  const rows: unknown = parse(text, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
  })
  return csvRowsSchema.parse(rows)
}
