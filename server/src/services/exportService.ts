import * as XLSX from 'xlsx'
import Papa from 'papaparse'
import type { Dataset } from './customerDataset.js'
import { recordValues } from './customerDataset.js'
import { cleanDataset } from './customerPipeline.js'

export const EXPORT_SHEET_NAME = 'Customers'
export const EXPORT_BASENAME = 'cleaned_customer_data'

export const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'
export const CSV_MIME_TYPE = 'text/csv; charset=utf-8'

/**
 * Header row plus one row per clean record, columns in source order.
 */
export function cleanedRows(dataset: Dataset): Array<Array<string | number | boolean | null>> {
  const header = dataset.columns.map(column => column.header)
  const rows = cleanDataset(dataset).map(record => recordValues(record, dataset.columns))
  return [header, ...rows]
}

// No document properties are set, so the workbook carries no creation time
export function exportCustomersXlsx(dataset: Dataset): Buffer {
  const workbook = XLSX.utils.book_new()
  const sheet = XLSX.utils.aoa_to_sheet(cleanedRows(dataset))
  XLSX.utils.book_append_sheet(workbook, sheet, EXPORT_SHEET_NAME)

  const output: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' })
  return output
}

export function exportCustomersCsv(dataset: Dataset): Buffer {
  const [header, ...rows] = cleanedRows(dataset)
  const text = Papa.unparse(
    { fields: header.map(cell => (cell === null ? '' : String(cell))), data: rows },
    { delimiter: ',', newline: '\r\n', header: true }
  )
  return Buffer.from(text, 'utf-8')
}
