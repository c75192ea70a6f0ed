import type { CustomerRecord, Dataset } from './customerDataset.js'
import { hasText } from './customerDataset.js'
import {
  DEFAULT_RANK,
  DEFAULT_REGION_LIMIT,
  DEFAULT_TOP_SALESPERSON_COUNT,
  applyRank,
  buildInsights,
  countByRegion,
  countBySalesperson,
  findUnassignedCustomers,
  summarizeDataset,
  summarizeRegionGeography,
  topN,
  type CategoryCount,
  type DashboardInsights,
  type DatasetSummary,
  type RankSelection,
  type RegionGeoEntry
} from './aggregationService.js'
import type { RegionCoordinateTable } from '../config/regions.js'
import { EmptyInputError, NoMatchError, type PipelineNotice } from '../utils/errors.js'

export interface AssignedCustomerRecord extends CustomerRecord {
  customerName: string
  salesperson: string
}

export interface FilterCriteria {
  selectedSalespersons: readonly string[]
  selectedRegions: readonly string[]
  nameQuery?: string
  // Whether rows without a region pass a non-empty region selection
  includeMissingRegion: boolean
}

export type FilterCriteriaInput = Partial<FilterCriteria>

export interface PipelineOptions {
  regionTable: RegionCoordinateTable
  rank?: RankSelection
  regionLimit?: number
  topSalespersonCount?: number
}

export interface DashboardView {
  criteria: FilterCriteria
  cleanCount: number
  filtered: AssignedCustomerRecord[]
  salespersonCounts: CategoryCount[]
  rank: RankSelection
  rankedSalespersons: CategoryCount[]
  topSalespersons: CategoryCount[]
  regionCounts: CategoryCount[]
  unassignedCustomers: CustomerRecord[]
  regionGeoSummary: RegionGeoEntry[]
  summary: DatasetSummary
  insights: DashboardInsights
  notices: PipelineNotice[]
}

export const isAssigned = (record: CustomerRecord): record is AssignedCustomerRecord =>
  hasText(record.customerName) && hasText(record.salesperson)

export function cleanDataset(dataset: Dataset): AssignedCustomerRecord[] {
  return dataset.records.filter(isAssigned)
}

const distinct = (values: Iterable<string | null>): string[] => {
  const seen = new Set<string>()
  for (const value of values) {
    if (hasText(value)) seen.add(value)
  }
  return Array.from(seen)
}

export function distinctSalespersons(clean: readonly AssignedCustomerRecord[]): string[] {
  return distinct(clean.map(record => record.salesperson))
}

export function distinctRegions(clean: readonly CustomerRecord[]): string[] {
  return distinct(clean.map(record => record.region))
}

/**
 * Selects every salesperson and region present, so filtering with the result
 * returns the clean dataset unchanged.
 */
export function defaultFilterCriteria(clean: readonly AssignedCustomerRecord[]): FilterCriteria {
  return {
    selectedSalespersons: distinctSalespersons(clean),
    selectedRegions: distinctRegions(clean),
    nameQuery: '',
    includeMissingRegion: true
  }
}

export function resolveFilterCriteria(
  clean: readonly AssignedCustomerRecord[],
  input: FilterCriteriaInput = {}
): FilterCriteria {
  const defaults = defaultFilterCriteria(clean)
  return {
    selectedSalespersons: input.selectedSalespersons ?? defaults.selectedSalespersons,
    selectedRegions: input.selectedRegions ?? defaults.selectedRegions,
    nameQuery: input.nameQuery ?? defaults.nameQuery,
    includeMissingRegion: input.includeMissingRegion ?? defaults.includeMissingRegion
  }
}

/**
 * Narrows the clean dataset. An empty salesperson selection matches nothing;
 * an empty region selection does not filter by region at all. The name query
 * is a plain case-insensitive substring, whitespace included.
 */
export function filterRecords(
  clean: readonly AssignedCustomerRecord[],
  criteria: FilterCriteria
): AssignedCustomerRecord[] {
  const salespersons = new Set(criteria.selectedSalespersons)
  const regions = new Set(criteria.selectedRegions)
  const query = (criteria.nameQuery ?? '').toLowerCase()

  return clean.filter(record => {
    if (!salespersons.has(record.salesperson)) return false

    if (regions.size > 0) {
      const inRegion = hasText(record.region) ? regions.has(record.region) : criteria.includeMissingRegion
      if (!inRegion) return false
    }

    return query === '' || record.customerName.toLowerCase().includes(query)
  })
}

/**
 * Runs clean, filter and every aggregate for one interaction. Pure: the same
 * dataset and criteria always give the same view.
 */
export function buildDashboardView(
  dataset: Dataset,
  input: FilterCriteriaInput,
  options: PipelineOptions
): DashboardView {
  const clean = cleanDataset(dataset)
  if (clean.length === 0) {
    throw new EmptyInputError('No rows have both a customer name and a salesperson')
  }

  const criteria = resolveFilterCriteria(clean, input)
  const filtered = filterRecords(clean, criteria)
  const rank = options.rank ?? DEFAULT_RANK

  const salespersonCounts = countBySalesperson(filtered)
  const regionCounts = countByRegion(filtered, options.regionLimit ?? DEFAULT_REGION_LIMIT)

  const notices: PipelineNotice[] = []
  if (filtered.length === 0) {
    notices.push(new NoMatchError().toNotice())
  }

  return {
    criteria,
    cleanCount: clean.length,
    filtered,
    salespersonCounts,
    rank,
    rankedSalespersons: applyRank(salespersonCounts, rank),
    topSalespersons: topN(salespersonCounts, options.topSalespersonCount ?? DEFAULT_TOP_SALESPERSON_COUNT),
    regionCounts,
    unassignedCustomers: findUnassignedCustomers(dataset),
    regionGeoSummary: summarizeRegionGeography(clean, options.regionTable),
    summary: summarizeDataset(dataset, clean),
    insights: buildInsights(salespersonCounts, regionCounts),
    notices
  }
}
