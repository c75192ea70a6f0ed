import { parse } from 'csv-parse/sync'

export type CellValue = string | number | boolean | null

export type ColumnType = 'string' | 'integer' | 'number'

/**
 * A header row plus data rows, before any customer-specific meaning is
 * attached. Every data row has exactly `headers.length` cells.
 */
export interface ParsedTable {
  headers: string[]
  rows: CellValue[][]
  rowCount: number
}

export type Delimiter = ',' | '\t'

const INT_PATTERN = /^-?\d+$/
const FLOAT_PATTERN = /^-?\d*\.?\d+$/

// Only convert text that prints back identically, so '007' or '1.50' survive as text
const isCanonicalNumber = (value: string, pattern: RegExp): boolean =>
  pattern.test(value) && String(Number(value)) === value

const isEmpty = (value: CellValue): boolean =>
  value === null || value === ''

export function inferType(values: CellValue[]): ColumnType {
  const nonEmptyValues = values.filter(v => !isEmpty(v))

  if (nonEmptyValues.length === 0) return 'string'

  const matchesAll = (pattern: RegExp) =>
    nonEmptyValues.every(v => {
      if (typeof v === 'number') return pattern === FLOAT_PATTERN || Number.isInteger(v)
      return typeof v === 'string' && isCanonicalNumber(v, pattern)
    })

  if (matchesAll(INT_PATTERN)) return 'integer'
  if (matchesAll(FLOAT_PATTERN)) return 'number'

  return 'string'
}

/**
 * Picks tab when the first line has more tabs than commas, comma otherwise.
 */
export function detectDelimiter(text: string): Delimiter {
  const firstLine = text.split(/\r?\n/, 1)[0] ?? ''
  const tabs = firstLine.split('\t').length - 1
  const commas = firstLine.split(',').length - 1
  return tabs > commas ? '\t' : ','
}

export function parseDelimitedBuffer(buffer: Buffer, delimiter?: Delimiter): ParsedTable {
  const text = buffer.toString('utf-8')
  const records: string[][] = parse(buffer, {
    delimiter: delimiter ?? detectDelimiter(text),
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true
  })

  if (records.length === 0) {
    return { headers: [], rows: [], rowCount: 0 }
  }

  const headers = records[0].map(h => h.trim())
  const dataRows = records.slice(1)

  const rows: CellValue[][] = dataRows.map(record =>
    headers.map((_, index) => {
      const value = record[index]
      return value === undefined || value === '' ? null : value
    })
  )

  // Restore numbers for columns that are numeric all the way down
  headers.forEach((_, index) => {
    const type = inferType(rows.map(row => row[index]))
    if (type === 'string') return
    rows.forEach(row => {
      const value = row[index]
      if (typeof value === 'string') {
        row[index] = Number(value)
      }
    })
  })

  return {
    headers,
    rows,
    rowCount: rows.length
  }
}
