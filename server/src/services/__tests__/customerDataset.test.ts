import { describe, test, expect } from 'vitest'
import {
  buildDataset,
  ingestCustomerFile,
  recordValues,
  serializeRecord
} from '../customerDataset.js'
import { EmptyInputError, FormatError, InvalidRequestError } from '../../utils/errors.js'
import { SCENARIO_ROWS, buildWorkbook, toTable } from '../../__tests__/fixtures.js'

describe('buildDataset', () => {
  test('assigns roles to the recognized columns and keeps the rest as passthrough', () => {
    const dataset = buildDataset(
      toTable([
        ['Account', 'Customer Name', 'Region', 'Sales Rep', 'Revenue'],
        ['A-1', 'Alice', 'Delhi', 'Bob', 1200],
        ['A-2', 'Carol', 'Goa', null, 50]
      ]),
      'accounts.xlsx',
      'Sheet1'
    )

    expect(dataset.columns.map(c => [c.key, c.role, c.type])).toEqual([
      ['account', 'passthrough', 'string'],
      ['customer_name', 'customer_name', 'string'],
      ['region', 'region', 'string'],
      ['sales_rep', 'salesperson', 'string'],
      ['revenue', 'passthrough', 'integer']
    ])
    expect(dataset.records[0]).toEqual({
      rowNumber: 1,
      customerName: 'Alice',
      salesperson: 'Bob',
      region: 'Delhi',
      passthrough: new Map<string, string | number>([['account', 'A-1'], ['revenue', 1200]])
    })
    expect(dataset.records[1].salesperson).toBeNull()
  })

  test('the first matching header wins and later duplicates pass through', () => {
    const dataset = buildDataset(
      toTable([
        ['Customer_Name', 'Sales_person', 'State', 'state'],
        ['Alice', 'Bob', 'Texas', 'TX']
      ]),
      'dupes.csv'
    )

    expect(dataset.columns.map(c => c.key)).toEqual(['customer_name', 'sales_person', 'state', 'state_2'])
    expect(dataset.records[0].region).toBe('Texas')
    expect(dataset.records[0].passthrough.get('state_2')).toBe('TX')
  })

  test('converts non-text name and salesperson cells to text', () => {
    const dataset = buildDataset(
      toTable([['Customer_Name', 'Sales_person'], [1001, 42]]),
      'numbers.xlsx'
    )

    expect(dataset.records[0].customerName).toBe('1001')
    expect(dataset.records[0].salesperson).toBe('42')
    expect(dataset.records[0].region).toBeNull()
  })

  test('fails with FormatError when a required column is missing', () => {
    const table = toTable([['Customer_Name', 'State'], ['Alice', 'Texas']])

    expect(() => buildDataset(table, 'partial.xlsx')).toThrow(FormatError)
    expect(() => buildDataset(table, 'partial.xlsx')).toThrow('Missing required column(s): Sales_person')
  })

  test('fails with EmptyInputError when there are no data rows', () => {
    const table = toTable([['Customer_Name', 'Sales_person']])

    expect(() => buildDataset(table, 'header-only.xlsx')).toThrow(EmptyInputError)
  })

  test('returns a frozen dataset', () => {
    const dataset = buildDataset(toTable(SCENARIO_ROWS), 'scenario.xlsx')

    expect(Object.isFrozen(dataset)).toBe(true)
    expect(Object.isFrozen(dataset.records)).toBe(true)
    expect(Object.isFrozen(dataset.records[0])).toBe(true)
  })
})

describe('ingestCustomerFile', () => {
  test('loads the scenario workbook', () => {
    const dataset = ingestCustomerFile(buildWorkbook({ Customers: SCENARIO_ROWS }), { filename: 'customers.xlsx' })

    expect(dataset.sourceName).toBe('customers.xlsx')
    expect(dataset.sheetName).toBe('Customers')
    expect(dataset.records.map(r => [r.customerName, r.salesperson, r.region])).toEqual([
      ['Alice', 'Bob', 'Texas'],
      ['Carol', null, 'Texas'],
      ['Dave', 'Bob', null]
    ])
  })

  test('sniffs spreadsheets uploaded without a file name', () => {
    const dataset = ingestCustomerFile(buildWorkbook({ Customers: SCENARIO_ROWS }))

    expect(dataset.sourceName).toBe('upload')
    expect(dataset.records).toHaveLength(3)
  })

  test('loads delimited text', () => {
    const csv = 'Customer_Name,Sales_person,State\nAlice,Bob,Texas\nCarol,,Texas\n'

    const dataset = ingestCustomerFile(Buffer.from(csv), { filename: 'customers.csv' })

    expect(dataset.sheetName).toBeNull()
    expect(dataset.records.map(r => r.salesperson)).toEqual(['Bob', null])
  })

  test('rejects a sheet name for delimited text', () => {
    const csv = 'Customer_Name,Sales_person\nAlice,Bob\n'

    expect(() => ingestCustomerFile(Buffer.from(csv), { filename: 'customers.csv', sheetName: 'Q2' }))
      .toThrow(InvalidRequestError)
    expect(() => ingestCustomerFile(Buffer.from(csv), { filename: 'customers.csv', sheetName: 'Q2' }))
      .toThrow("sheetName applies only to workbooks, not '.csv' files")
  })

  test('wraps parser failures in FormatError', () => {
    const csv = 'Customer_Name,Sales_person\n"Alice,Bob\n'

    expect(() => ingestCustomerFile(Buffer.from(csv), { filename: 'broken.csv' })).toThrow(FormatError)
  })

  test('rejects bytes that are not a spreadsheet', () => {
    expect(() => ingestCustomerFile(Buffer.from('plain text'), { filename: 'customers.xlsx' }))
      .toThrow('File is not a well-formed spreadsheet')
    expect(() => ingestCustomerFile(Buffer.from('plain text')))
      .toThrow("Unsupported file type 'unknown'")
  })

  test('rejects unsupported extensions', () => {
    expect(() => ingestCustomerFile(Buffer.from('%PDF'), { filename: 'customers.pdf' }))
      .toThrow("Unsupported file type '.pdf'")
  })

  test('fails with EmptyInputError for a header-only sheet', () => {
    const buffer = buildWorkbook({ Customers: [['Customer_Name', 'Sales_person']] })

    expect(() => ingestCustomerFile(buffer, { filename: 'empty.xlsx' })).toThrow(EmptyInputError)
  })

  test('honors custom column aliases', () => {
    const buffer = buildWorkbook({ Sheet1: [['Client', 'Owner', 'Territory'], ['Alice', 'Bob', 'North']] })

    const dataset = ingestCustomerFile(buffer, {
      filename: 'clients.xlsx',
      aliases: { customerName: ['Client'], salesperson: ['Owner'], region: ['Territory'] }
    })

    expect(dataset.records[0]).toMatchObject({ customerName: 'Alice', salesperson: 'Bob', region: 'North' })
  })
})

describe('record helpers', () => {
  const dataset = buildDataset(
    toTable([
      ['Customer_Name', 'Revenue', 'Sales_person', 'State'],
      ['Alice', 1200, 'Bob', 'Texas']
    ]),
    'customers.xlsx'
  )

  test('recordValues follows the source column order', () => {
    expect(recordValues(dataset.records[0], dataset.columns)).toEqual(['Alice', 1200, 'Bob', 'Texas'])
  })

  test('serializeRecord keys values by column key', () => {
    expect(serializeRecord(dataset.records[0], dataset.columns)).toEqual({
      _row: 1,
      customer_name: 'Alice',
      revenue: 1200,
      sales_person: 'Bob',
      state: 'Texas'
    })
  })
})
