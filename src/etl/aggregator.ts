import type { EtlStore } from '../db/etl-store.js'
import { QueryError } from '../errors.js'

export type PopulationSummary = Record<string, number>

/**
 * Counts people per country of birth. Countries without anyone born there
 * are left out rather than reported as zero.
 */
export async function computePopulationByCountry(
  store: EtlStore,
): Promise<PopulationSummary> {
  try {
    const rows = await store.countPeopleByCountry()
    return Object.fromEntries(rows.map((row) => [row.country, row.population]))
  } catch (error) {
    throw new QueryError('Failed to compute population statistics', error)
  }
}
