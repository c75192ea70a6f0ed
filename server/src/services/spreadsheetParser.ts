import * as XLSX from 'xlsx'
import type { CellValue, ParsedTable } from './fileParser.js'
import { FormatError } from '../utils/errors.js'

export interface ParsedSheet extends ParsedTable {
  sheetName: string
}

export interface SheetInfo {
  name: string
  rowCount: number
  columns: string[]
}

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04]
const CFB_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]

const startsWith = (buffer: Buffer, signature: number[]): boolean =>
  buffer.length >= signature.length && signature.every((byte, i) => buffer[i] === byte)

/**
 * xlsx and ods are zip containers, legacy xls is a compound document. The
 * reader itself falls back to plain-text parsing for anything else, so the
 * container is checked up front.
 */
export function hasSpreadsheetSignature(buffer: Buffer): boolean {
  return startsWith(buffer, ZIP_SIGNATURE) || startsWith(buffer, CFB_SIGNATURE)
}

export function toCellValue(value: unknown): CellValue {
  if (value instanceof Date) {
    return value.toISOString()
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  return null
}

function readWorkbook(buffer: Buffer): XLSX.WorkBook {
  if (!hasSpreadsheetSignature(buffer)) {
    throw new FormatError('File is not a well-formed spreadsheet')
  }

  let workbook: XLSX.WorkBook
  try {
    workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true })
  } catch (error) {
    console.warn('Spreadsheet could not be read:', error)
    throw new FormatError('File is not a well-formed spreadsheet')
  }

  if (workbook.SheetNames.length === 0) {
    throw new FormatError('Spreadsheet contains no sheets')
  }
  return workbook
}

function readSheetRows(sheet: XLSX.WorkSheet, sheetName: string): unknown[][] {
  try {
    return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, blankrows: false, raw: true })
  } catch (error) {
    console.warn(`Sheet '${sheetName}' could not be read:`, error)
    throw new FormatError(`Sheet '${sheetName}' could not be read`)
  }
}

export function describeWorkbook(buffer: Buffer): SheetInfo[] {
  const workbook = readWorkbook(buffer)

  return workbook.SheetNames.map(name => {
    const rows = readSheetRows(workbook.Sheets[name], name)
    const headerRow = rows[0] ?? []
    return {
      name,
      rowCount: Math.max(rows.length - 1, 0),
      columns: Array.from(headerRow, cell => (cell === undefined || cell === null ? '' : String(cell)))
    }
  })
}

/**
 * Reads one sheet (the first unless `sheetName` is given). The first non-blank
 * row is the header; data rows are padded or cut to the header's width.
 */
export function parseSpreadsheetBuffer(buffer: Buffer, sheetName?: string): ParsedSheet {
  const workbook = readWorkbook(buffer)
  const selectedName = sheetName ?? workbook.SheetNames[0]
  const sheet = workbook.Sheets[selectedName]

  if (!workbook.SheetNames.includes(selectedName) || !sheet) {
    throw new FormatError(`Sheet '${selectedName}' not found`)
  }

  const rows = readSheetRows(sheet, selectedName)

  if (rows.length === 0) {
    return { sheetName: selectedName, headers: [], rows: [], rowCount: 0 }
  }

  // Blank cells come back as holes, hence Array.from rather than map
  const headers = Array.from(rows[0], cell => (cell === undefined || cell === null ? '' : String(cell).trim()))
  const processedRows = rows.slice(1).map(row => headers.map((_, index) => toCellValue(row[index])))

  return {
    sheetName: selectedName,
    headers,
    rows: processedRows,
    rowCount: processedRows.length
  }
}
