import type { CustomerRecord, Dataset } from './customerDataset.js'
import { hasText } from './customerDataset.js'
import { lookupRegion, type RegionCoordinateTable } from '../config/regions.js'
import { InvalidRequestError } from '../utils/errors.js'

export interface CategoryCount {
  value: string
  count: number
  percentage: number
}

export type RankDirection = 'top' | 'least'

export interface RankSelection {
  direction: RankDirection
  n: number
}

export interface RegionGeoEntry {
  region: string
  count: number
  latitude: number
  longitude: number
}

export interface DatasetSummary {
  distinctCustomers: number
  distinctSalespersons: number
  unassignedCount: number
  topRegion: string
}

export interface DashboardInsights {
  topSalesperson: CategoryCount | null
  topRegion: CategoryCount | null
}

export const DEFAULT_REGION_LIMIT = 10
export const DEFAULT_TOP_SALESPERSON_COUNT = 5
export const NO_REGION_LABEL = 'N/A'

export const RANK_OPTIONS = ['Top 10', 'Top 5', 'Top 20', 'Least 5', 'Least 10'] as const
export const DEFAULT_RANK: RankSelection = { direction: 'top', n: 10 }

const roundPercentage = (count: number, total: number): number =>
  total === 0 ? 0 : Math.round((count / total) * 10000) / 100

/**
 * Counts each non-blank value and orders the groups by count, highest first.
 * Equal counts keep the order in which their value was first seen.
 */
export function countValues(values: Iterable<string | null>): CategoryCount[] {
  const counts = new Map<string, number>()
  let total = 0
  for (const value of values) {
    if (!hasText(value)) continue
    counts.set(value, (counts.get(value) ?? 0) + 1)
    total += 1
  }

  // Array.prototype.sort is stable, which gives the first-seen tie-break
  return Array.from(counts, ([value, count]) => ({
    value,
    count,
    percentage: roundPercentage(count, total)
  })).sort((a, b) => b.count - a.count)
}

export function countBySalesperson(view: readonly CustomerRecord[]): CategoryCount[] {
  return countValues(view.map(record => record.salesperson))
}

export function countByRegion(view: readonly CustomerRecord[], limit: number = DEFAULT_REGION_LIMIT): CategoryCount[] {
  return countValues(view.map(record => record.region)).slice(0, limit)
}

export function topN(counts: readonly CategoryCount[], n: number): CategoryCount[] {
  return counts.slice(0, Math.max(n, 0))
}

/**
 * Smallest groups first. Groups with equal counts stay in first-seen order, the
 * same order they have in `counts`.
 */
export function leastN(counts: readonly CategoryCount[], n: number): CategoryCount[] {
  return [...counts].sort((a, b) => a.count - b.count).slice(0, Math.max(n, 0))
}

export function parseRankSelection(label: string): RankSelection {
  const match = /^\s*(top|least)\s+(\d+)\s*$/i.exec(label)
  if (!match) {
    throw new InvalidRequestError(`Invalid rank '${label}', expected e.g. 'Top 10' or 'Least 5'`)
  }
  const n = Number(match[2])
  if (n <= 0) {
    throw new InvalidRequestError(`Rank size must be positive, got ${n}`)
  }
  return { direction: match[1].toLowerCase() === 'least' ? 'least' : 'top', n }
}

export function applyRank(counts: readonly CategoryCount[], selection: RankSelection): CategoryCount[] {
  return selection.direction === 'least' ? leastN(counts, selection.n) : topN(counts, selection.n)
}

/**
 * Rows from the full upload with no salesperson, whether or not they have a
 * customer name.
 */
export function findUnassignedCustomers(dataset: Dataset): CustomerRecord[] {
  return dataset.records.filter(record => !hasText(record.salesperson))
}

export function summarizeRegionGeography(
  clean: readonly CustomerRecord[],
  table: RegionCoordinateTable
): RegionGeoEntry[] {
  const counts = new Map<string, number>()
  for (const record of clean) {
    if (!hasText(record.region)) continue
    counts.set(record.region, (counts.get(record.region) ?? 0) + 1)
  }

  return Array.from(counts.keys())
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map(region => {
      const { latitude, longitude } = lookupRegion(table, region)
      return { region, count: counts.get(region) ?? 0, latitude, longitude }
    })
}

export function summarizeDataset(dataset: Dataset, clean: readonly CustomerRecord[]): DatasetSummary {
  const topRegion = countValues(dataset.records.map(record => record.region))[0]

  return {
    distinctCustomers: new Set(clean.map(record => record.customerName)).size,
    distinctSalespersons: new Set(clean.map(record => record.salesperson)).size,
    unassignedCount: findUnassignedCustomers(dataset).length,
    topRegion: topRegion?.value ?? NO_REGION_LABEL
  }
}

export function buildInsights(
  salespersonCounts: readonly CategoryCount[],
  regionCounts: readonly CategoryCount[]
): DashboardInsights {
  return {
    topSalesperson: salespersonCounts[0] ?? null,
    topRegion: regionCounts[0] ?? null
  }
}
