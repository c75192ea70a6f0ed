import type { CellValue, ColumnType, ParsedTable } from './fileParser.js'
import { inferType, parseDelimitedBuffer } from './fileParser.js'
import { hasSpreadsheetSignature, parseSpreadsheetBuffer } from './spreadsheetParser.js'
import { generateColumnIdentifier, normalizeIdentifier } from '../utils/columnNames.js'
import {
  EmptyInputError,
  FormatError,
  InvalidRequestError,
  errorMessage,
  isPipelineError
} from '../utils/errors.js'
import { DEFAULT_COLUMN_ALIASES, type ColumnAliases } from '../config/settings.js'

export type ColumnRole = 'customer_name' | 'salesperson' | 'region' | 'passthrough'

export interface DatasetColumn {
  key: string
  header: string
  role: ColumnRole
  index: number
  type: ColumnType
}

export interface CustomerRecord {
  // 1-based position among the source data rows
  rowNumber: number
  customerName: string | null
  salesperson: string | null
  region: string | null
  passthrough: ReadonlyMap<string, CellValue>
}

export interface Dataset {
  sourceName: string
  sheetName: string | null
  columns: readonly DatasetColumn[]
  records: readonly CustomerRecord[]
}

export interface IngestOptions {
  filename?: string
  // Workbooks only; delimited text has no sheets
  sheetName?: string
  aliases?: ColumnAliases
}

const SPREADSHEET_EXTENSIONS = ['.xlsx', '.xls', '.ods']
const DELIMITED_EXTENSIONS = ['.csv', '.tsv', '.txt']

export const hasText = (value: string | null | undefined): value is string =>
  typeof value === 'string' && value.trim() !== ''

const toText = (value: CellValue): string | null =>
  value === null ? null : typeof value === 'string' ? value : String(value)

const extensionOf = (filename: string): string => {
  const dot = filename.lastIndexOf('.')
  return dot === -1 ? '' : filename.slice(dot).toLowerCase()
}

function resolveRoles(headers: string[], aliases: ColumnAliases): Map<number, ColumnRole> {
  const wanted: Array<[Exclude<ColumnRole, 'passthrough'>, Set<string>]> = [
    ['customer_name', new Set(aliases.customerName.map(normalizeIdentifier))],
    ['salesperson', new Set(aliases.salesperson.map(normalizeIdentifier))],
    ['region', new Set(aliases.region.map(normalizeIdentifier))]
  ]

  const roles = new Map<number, ColumnRole>()
  for (const [role, names] of wanted) {
    const index = headers.findIndex((header, i) => !roles.has(i) && names.has(normalizeIdentifier(header)))
    if (index !== -1) {
      roles.set(index, role)
    }
  }
  return roles
}

/**
 * Attaches customer meaning to a parsed table: finds the name, salesperson and
 * region columns and keeps every other column, in order, as passthrough.
 */
export function buildDataset(
  table: ParsedTable,
  sourceName: string,
  sheetName: string | null = null,
  aliases: ColumnAliases = DEFAULT_COLUMN_ALIASES
): Dataset {
  if (table.headers.length === 0) {
    throw new EmptyInputError(`'${sourceName}' contains no rows`)
  }

  const roles = resolveRoles(table.headers, aliases)
  const assigned = new Set(roles.values())
  const missing: string[] = []
  if (!assigned.has('customer_name')) missing.push('Customer_Name')
  if (!assigned.has('salesperson')) missing.push('Sales_person')
  if (missing.length > 0) {
    throw new FormatError(`Missing required column(s): ${missing.join(', ')}`)
  }

  if (table.rows.length === 0) {
    throw new EmptyInputError(`'${sourceName}' has a header row but no data rows`)
  }

  const usedNames = new Set<string>()
  const nameCounts = new Map<string, number>()
  const sampleSize = Math.min(100, table.rows.length)
  const columns: DatasetColumn[] = table.headers.map((header, index) => ({
    key: generateColumnIdentifier(header, index, usedNames, nameCounts),
    header,
    role: roles.get(index) ?? 'passthrough',
    index,
    type: inferType(table.rows.slice(0, sampleSize).map(row => row[index]))
  }))

  const indexOf = (role: ColumnRole): number => columns.find(c => c.role === role)?.index ?? -1
  const nameIndex = indexOf('customer_name')
  const salespersonIndex = indexOf('salesperson')
  const regionIndex = indexOf('region')
  const passthroughColumns = columns.filter(c => c.role === 'passthrough')

  const records = table.rows.map((row, i): CustomerRecord =>
    Object.freeze({
      rowNumber: i + 1,
      customerName: toText(row[nameIndex]),
      salesperson: toText(row[salespersonIndex]),
      region: regionIndex === -1 ? null : toText(row[regionIndex]),
      passthrough: new Map(passthroughColumns.map((c): [string, CellValue] => [c.key, row[c.index]]))
    })
  )

  return Object.freeze({
    sourceName,
    sheetName,
    columns: Object.freeze(columns),
    records: Object.freeze(records)
  })
}

/**
 * Parses an uploaded file into a Dataset. Spreadsheets (.xlsx, .xls, .ods)
 * are the primary input; delimited text is accepted so exported CSV files can
 * be loaded again.
 */
export function ingestCustomerFile(buffer: Buffer, options: IngestOptions = {}): Dataset {
  const sourceName = options.filename ?? 'upload'
  const extension = extensionOf(sourceName)
  const aliases = options.aliases ?? DEFAULT_COLUMN_ALIASES

  try {
    if (DELIMITED_EXTENSIONS.includes(extension)) {
      if (options.sheetName !== undefined) {
        throw new InvalidRequestError(`sheetName applies only to workbooks, not '${extension}' files`)
      }
      return buildDataset(parseDelimitedBuffer(buffer), sourceName, null, aliases)
    }

    if (SPREADSHEET_EXTENSIONS.includes(extension) || (!extension && hasSpreadsheetSignature(buffer))) {
      const sheet = parseSpreadsheetBuffer(buffer, options.sheetName)
      return buildDataset(sheet, sourceName, sheet.sheetName, aliases)
    }
  } catch (error) {
    if (isPipelineError(error)) {
      throw error
    }
    throw new FormatError(`Could not parse '${sourceName}': ${errorMessage(error)}`)
  }

  throw new FormatError(`Unsupported file type '${extension || 'unknown'}'`)
}

export function columnValue(record: CustomerRecord, column: DatasetColumn): CellValue {
  switch (column.role) {
    case 'customer_name':
      return record.customerName
    case 'salesperson':
      return record.salesperson
    case 'region':
      return record.region
    case 'passthrough':
      return record.passthrough.get(column.key) ?? null
  }
}

export function recordValues(record: CustomerRecord, columns: readonly DatasetColumn[]): CellValue[] {
  return columns.map(column => columnValue(record, column))
}

/**
 * JSON-friendly row keyed by column key, in column order.
 */
export function serializeRecord(
  record: CustomerRecord,
  columns: readonly DatasetColumn[]
): Record<string, CellValue> {
  const row: Record<string, CellValue> = { _row: record.rowNumber }
  for (const column of columns) {
    row[column.key] = columnValue(record, column)
  }
  return row
}
