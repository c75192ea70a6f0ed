import dotenv from 'dotenv'
import { DEFAULT_REGION_COORDINATES_FILE } from './regions.js'

dotenv.config()

export interface ColumnAliases {
  customerName: string[]
  salesperson: string[]
  region: string[]
}

export interface DashboardSettings {
  port: number
  uploadMaxBytes: number
  regionCoordinatesFile: string
  regionCountLimit: number
  topSalespersonCount: number
  sessionIdleMinutes: number
  columnAliases: ColumnAliases
}

export const DEFAULT_COLUMN_ALIASES: ColumnAliases = {
  customerName: ['customer_name', 'customer', 'customername'],
  salesperson: ['sales_person', 'salesperson', 'sales_rep', 'salesrep'],
  region: ['state', 'region', 'province']
}

export const DEFAULT_SETTINGS: DashboardSettings = {
  port: 5001,
  uploadMaxBytes: 50 * 1024 * 1024,
  regionCoordinatesFile: DEFAULT_REGION_COORDINATES_FILE,
  regionCountLimit: 10,
  topSalespersonCount: 5,
  sessionIdleMinutes: 30,
  columnAliases: DEFAULT_COLUMN_ALIASES
}

const readPositiveInt = (raw: string | undefined, name: string, fallback: number): number => {
  if (raw === undefined || raw.trim() === '') {
    return fallback
  }
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    console.warn(`Ignoring invalid ${name}=${raw}, using ${fallback}`)
    return fallback
  }
  return value
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): DashboardSettings {
  const regionFile = env.REGION_COORDINATES_FILE?.trim()

  return {
    port: readPositiveInt(env.PORT, 'PORT', DEFAULT_SETTINGS.port),
    uploadMaxBytes: readPositiveInt(env.UPLOAD_MAX_BYTES, 'UPLOAD_MAX_BYTES', DEFAULT_SETTINGS.uploadMaxBytes),
    regionCoordinatesFile: regionFile || DEFAULT_SETTINGS.regionCoordinatesFile,
    regionCountLimit: readPositiveInt(env.REGION_COUNT_LIMIT, 'REGION_COUNT_LIMIT', DEFAULT_SETTINGS.regionCountLimit),
    topSalespersonCount: readPositiveInt(
      env.TOP_SALESPERSON_COUNT,
      'TOP_SALESPERSON_COUNT',
      DEFAULT_SETTINGS.topSalespersonCount
    ),
    sessionIdleMinutes: readPositiveInt(
      env.SESSION_IDLE_MINUTES,
      'SESSION_IDLE_MINUTES',
      DEFAULT_SETTINGS.sessionIdleMinutes
    ),
    columnAliases: DEFAULT_COLUMN_ALIASES
  }
}
