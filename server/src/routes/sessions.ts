import express from 'express'
import type { NextFunction, Request, Response } from 'express'
import multer from 'multer'
import type { DashboardSettings } from '../config/settings.js'
import type { RegionCoordinateTable } from '../config/regions.js'
import {
  ingestCustomerFile,
  serializeRecord,
  type CustomerRecord,
  type Dataset
} from '../services/customerDataset.js'
import { describeWorkbook } from '../services/spreadsheetParser.js'
import {
  buildDashboardView,
  cleanDataset,
  defaultFilterCriteria,
  type FilterCriteriaInput
} from '../services/customerPipeline.js'
import {
  DEFAULT_RANK,
  RANK_OPTIONS,
  findUnassignedCustomers,
  parseRankSelection,
  summarizeDataset
} from '../services/aggregationService.js'
import {
  CSV_MIME_TYPE,
  EXPORT_BASENAME,
  XLSX_MIME_TYPE,
  exportCustomersCsv,
  exportCustomersXlsx
} from '../services/exportService.js'
import type { SessionService, CustomerSession } from '../services/sessionService.js'
import { InvalidRequestError, errorMessage, isPipelineError } from '../utils/errors.js'

export interface SessionsRouterOptions {
  sessions: SessionService
  settings: DashboardSettings
  regionTable: RegionCoordinateTable
}

const ALLOWED_EXTENSIONS = ['.csv', '.txt', '.tsv', '.xlsx', '.xls', '.ods']
const PREVIEW_ROWS = 5

const serializeRecords = (records: readonly CustomerRecord[], dataset: Dataset) =>
  records.map(record => serializeRecord(record, dataset.columns))

function describeSession(session: CustomerSession) {
  const { dataset } = session
  const clean = cleanDataset(dataset)

  return {
    session: {
      id: session.id,
      sourceName: dataset.sourceName,
      sheetName: dataset.sheetName,
      createdAt: session.createdAt,
      updatedAt: session.updatedAt
    },
    dataset: {
      columns: dataset.columns.map(({ key, header, role, type }) => ({ key, header, role, type })),
      rowCount: dataset.records.length,
      cleanCount: clean.length,
      summary: summarizeDataset(dataset, clean),
      defaultCriteria: defaultFilterCriteria(clean),
      rankOptions: RANK_OPTIONS
    },
    preview: serializeRecords(dataset.records.slice(0, PREVIEW_ROWS), dataset)
  }
}

/**
 * `?salespersons=a&salespersons=b` selects a and b, a bare `?salespersons=`
 * selects nothing, and leaving the parameter out keeps the default.
 */
export function readListParam(value: unknown): string[] | undefined {
  if (value === undefined) return undefined
  const values = Array.isArray(value) ? value : [value]
  return values.filter((v): v is string => typeof v === 'string' && v.trim() !== '')
}

function readBooleanParam(value: unknown, name: string): boolean | undefined {
  if (value === undefined) return undefined
  if (value === 'true') return true
  if (value === 'false') return false
  throw new InvalidRequestError(`${name} must be 'true' or 'false'`)
}

export function readCriteria(query: Request['query']): FilterCriteriaInput {
  const q = query.q
  if (q !== undefined && typeof q !== 'string') {
    throw new InvalidRequestError('q must be a single string')
  }

  return {
    selectedSalespersons: readListParam(query.salespersons),
    selectedRegions: readListParam(query.regions),
    nameQuery: q,
    includeMissingRegion: readBooleanParam(query.includeMissingRegion, 'includeMissingRegion')
  }
}

function sendError(res: Response, error: unknown, context: string) {
  if (isPipelineError(error)) {
    console.warn(`${context} [${error.code}]:`, error.message)
    return res.status(error.status).json({
      success: false,
      error: error.message,
      code: error.code,
      level: error.level
    })
  }

  console.error(`${context}:`, error)
  return res.status(500).json({ success: false, error: context, message: errorMessage(error) })
}

export function createSessionsRouter({ sessions, settings, regionTable }: SessionsRouterOptions) {
  const router = express.Router()

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: settings.uploadMaxBytes
    },
    fileFilter: (_req, file, cb) => {
      const dot = file.originalname.lastIndexOf('.')
      const ext = dot === -1 ? '' : file.originalname.toLowerCase().substring(dot)
      if (ALLOWED_EXTENSIONS.includes(ext)) {
        cb(null, true)
      } else {
        cb(new InvalidRequestError('Only XLSX, XLS, ODS, CSV, TSV and TXT files are allowed'))
      }
    }
  })

  const readUpload = (req: Request): Dataset => {
    if (!req.file) {
      throw new InvalidRequestError('A file upload is required')
    }
    const rawSheetName: unknown = req.body?.sheetName
    const sheetName = typeof rawSheetName === 'string' && rawSheetName !== '' ? rawSheetName : undefined

    return ingestCustomerFile(req.file.buffer, {
      filename: req.file.originalname,
      sheetName,
      aliases: settings.columnAliases
    })
  }

  // List the sheets of a workbook so the user can pick one before uploading
  router.post('/sheets', upload.single('file'), (req, res) => {
    try {
      if (!req.file) {
        throw new InvalidRequestError('A file upload is required')
      }
      return res.json({ success: true, filename: req.file.originalname, sheets: describeWorkbook(req.file.buffer) })
    } catch (error) {
      return sendError(res, error, 'Failed to read workbook')
    }
  })

  // Upload a file and open a new session on it
  router.post('/', upload.single('file'), (req, res) => {
    try {
      const session = sessions.create(readUpload(req))
      return res.status(201).json({ success: true, ...describeSession(session) })
    } catch (error) {
      return sendError(res, error, 'Failed to load customer file')
    }
  })

  // Re-upload: the previous dataset stays in place unless the new one loads
  router.put('/:id/dataset', upload.single('file'), (req, res) => {
    try {
      sessions.get(req.params.id)
      const session = sessions.replaceDataset(req.params.id, readUpload(req))
      return res.json({ success: true, ...describeSession(session) })
    } catch (error) {
      return sendError(res, error, 'Failed to replace customer file')
    }
  })

  router.get('/:id', (req, res) => {
    try {
      return res.json({ success: true, ...describeSession(sessions.get(req.params.id)) })
    } catch (error) {
      return sendError(res, error, 'Failed to get session')
    }
  })

  router.get('/:id/view', (req, res) => {
    try {
      const { dataset } = sessions.get(req.params.id)
      const rankParam = req.query.rank
      if (rankParam !== undefined && typeof rankParam !== 'string') {
        throw new InvalidRequestError('rank must be a single value')
      }

      const view = buildDashboardView(dataset, readCriteria(req.query), {
        regionTable,
        rank: rankParam ? parseRankSelection(rankParam) : DEFAULT_RANK,
        regionLimit: settings.regionCountLimit,
        topSalespersonCount: settings.topSalespersonCount
      })

      return res.json({
        success: true,
        view: {
          ...view,
          filtered: serializeRecords(view.filtered, dataset),
          unassignedCustomers: serializeRecords(view.unassignedCustomers, dataset)
        }
      })
    } catch (error) {
      return sendError(res, error, 'Failed to build dashboard view')
    }
  })

  router.get('/:id/unassigned', (req, res) => {
    try {
      const { dataset } = sessions.get(req.params.id)
      const unassigned = findUnassignedCustomers(dataset)
      return res.json({
        success: true,
        total: unassigned.length,
        customers: serializeRecords(unassigned, dataset)
      })
    } catch (error) {
      return sendError(res, error, 'Failed to list unassigned customers')
    }
  })

  router.get('/:id/export.xlsx', (req, res) => {
    try {
      const body = exportCustomersXlsx(sessions.get(req.params.id).dataset)
      res.setHeader('Content-Type', XLSX_MIME_TYPE)
      res.setHeader('Content-Disposition', `attachment; filename="${EXPORT_BASENAME}.xlsx"`)
      return res.send(body)
    } catch (error) {
      return sendError(res, error, 'Failed to export Excel file')
    }
  })

  router.get('/:id/export.csv', (req, res) => {
    try {
      const body = exportCustomersCsv(sessions.get(req.params.id).dataset)
      res.setHeader('Content-Type', CSV_MIME_TYPE)
      res.setHeader('Content-Disposition', `attachment; filename="${EXPORT_BASENAME}.csv"`)
      return res.send(body)
    } catch (error) {
      return sendError(res, error, 'Failed to export CSV file')
    }
  })

  router.delete('/:id', (req, res) => {
    try {
      sessions.delete(req.params.id)
      return res.json({ success: true })
    } catch (error) {
      return sendError(res, error, 'Failed to delete session')
    }
  })

  // Upload rejections from multer (size limit, file type) land here
  router.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      return sendError(res, new InvalidRequestError(error.message), 'Upload rejected')
    }
    if (isPipelineError(error)) {
      return sendError(res, error, 'Upload rejected')
    }
    return next(error)
  })

  return router
}
