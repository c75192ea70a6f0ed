import * as XLSX from 'xlsx'
import type { CellValue, ParsedTable } from '../services/fileParser.js'
import type { CustomerRecord } from '../services/customerDataset.js'

export const SCENARIO_ROWS: CellValue[][] = [
  ['Customer_Name', 'Sales_person', 'State'],
  ['Alice', 'Bob', 'Texas'],
  ['Carol', null, 'Texas'],
  ['Dave', 'Bob', null]
]

export const toTable = (aoa: CellValue[][]): ParsedTable => {
  const [headers, ...rows] = aoa
  return {
    headers: headers.map(h => String(h ?? '')),
    rows: rows.map(row => headers.map((_, i) => row[i] ?? null)),
    rowCount: rows.length
  }
}

export const buildWorkbook = (
  sheets: Record<string, CellValue[][]>,
  bookType: XLSX.BookType = 'xlsx'
): Buffer => {
  const workbook = XLSX.utils.book_new()
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name)
  }
  const output: Buffer = XLSX.write(workbook, { type: 'buffer', bookType })
  return output
}

export const makeRecord = (
  rowNumber: number,
  customerName: string | null,
  salesperson: string | null,
  region: string | null = null
): CustomerRecord => ({
  rowNumber,
  customerName,
  salesperson,
  region,
  passthrough: new Map()
})
