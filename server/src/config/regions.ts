import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'

export interface RegionCoordinate {
  latitude: number
  longitude: number
}

export type RegionCoordinateTable = ReadonlyMap<string, RegionCoordinate>

// Regions missing from the table are plotted here
export const UNKNOWN_REGION_COORDINATE: RegionCoordinate = Object.freeze({ latitude: 0, longitude: 0 })

export const DEFAULT_REGION_COORDINATES_FILE = fileURLToPath(
  new URL('../../config/region-coordinates.json', import.meta.url)
)

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const isCoordinate = (value: unknown, min: number, max: number): value is number =>
  typeof value === 'number' && Number.isFinite(value) && value >= min && value <= max

/**
 * Validates the `{ "regions": [{ name, latitude, longitude }] }` document and
 * turns it into a lookup table keyed by the exact region name.
 */
export function parseRegionTable(raw: unknown): RegionCoordinateTable {
  if (!isRecord(raw) || !Array.isArray(raw.regions)) {
    throw new Error('Region table must be an object with a "regions" array')
  }

  const table = new Map<string, RegionCoordinate>()
  raw.regions.forEach((entry: unknown, index: number) => {
    if (!isRecord(entry)) {
      throw new Error(`Region entry ${index} must be an object`)
    }
    const { name, latitude, longitude } = entry
    if (typeof name !== 'string' || name.trim() === '') {
      throw new Error(`Region entry ${index} must have a non-empty name`)
    }
    if (!isCoordinate(latitude, -90, 90) || !isCoordinate(longitude, -180, 180)) {
      throw new Error(`Region '${name}' has invalid coordinates`)
    }
    if (table.has(name)) {
      throw new Error(`Region '${name}' is listed more than once`)
    }
    table.set(name, { latitude, longitude })
  })

  return table
}

export function loadRegionTable(filePath: string = DEFAULT_REGION_COORDINATES_FILE): RegionCoordinateTable {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'))
  } catch (error) {
    console.error(`Failed to read region table from ${filePath}:`, error)
    throw error
  }
  return parseRegionTable(raw)
}

export function lookupRegion(table: RegionCoordinateTable, region: string): RegionCoordinate {
  return table.get(region) ?? UNKNOWN_REGION_COORDINATE
}
