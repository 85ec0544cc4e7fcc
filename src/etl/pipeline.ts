import {
  ConnectionManager,
  type ConnectionManagerOptions,
  withConnection,
} from '../db/connection-manager.js'
import { type EtlStore, PgEtlStore } from '../db/etl-store.js'
import { reflectEtlTables } from '../db/schema-reflector.js'
import type { EtlConfig } from '../schema/etl-config.schema.js'
import type { EtlTables } from '../schema/table.schema.js'
import { computePopulationByCountry, type PopulationSummary } from './aggregator.js'
import { loadPeople, loadPlaces } from './csv-loader.js'
import { writeJson } from './json-writer.js'
import { dumpTables, type TableDumpResult } from './table-dump.js'

export interface EtlSession {
  store: EtlStore
  tables: EtlTables
}

export type SessionRunner = <T>(work: (session: EtlSession) => Promise<T>) => Promise<T>

export interface LoadResult {
  places: number
  people: number
}

export interface ExportResult extends LoadResult {
  summary: PopulationSummary
  dumps: TableDumpResult[]
}

// One connection per run, released on every exit path
export function pgSession(
  config: EtlConfig,
  options: ConnectionManagerOptions = {},
): SessionRunner {
  const manager = new ConnectionManager(config.databaseUrl, config.retry, options)

  return (work) =>
    withConnection(manager, async (client) => {
      const tables = await reflectEtlTables(client)
      return work({ store: new PgEtlStore(client, tables), tables })
    })
}

async function loadAll(config: EtlConfig, { store }: EtlSession): Promise<LoadResult> {
  const options = { transactionMode: config.transactionMode }

  const placeIds = await loadPlaces(store, config.placesCsvPath, options)
  const people = await loadPeople(store, config.peopleCsvPath, placeIds, options)

  return { places: placeIds.size, people }
}

async function summarize(config: EtlConfig, { store }: EtlSession): Promise<PopulationSummary> {
  const summary = await computePopulationByCountry(store)
  await writeJson(summary, config.summaryOutputPath)

  console.log(
    `Population summary for ${Object.keys(summary).length} countries written to ${config.summaryOutputPath}`,
  )
  return summary
}

export async function runLoad(
  config: EtlConfig,
  openSession: SessionRunner = pgSession(config),
): Promise<LoadResult> {
  return openSession((session) => loadAll(config, session))
}

export async function runCompute(
  config: EtlConfig,
  openSession: SessionRunner = pgSession(config),
): Promise<PopulationSummary> {
  return openSession((session) => summarize(config, session))
}

/**
 * Loads both files, dumps the raw tables and writes the population summary,
 * all over the same connection.
 */
export async function runExport(
  config: EtlConfig,
  openSession: SessionRunner = pgSession(config),
): Promise<ExportResult> {
  return openSession(async (session) => {
    const loaded = await loadAll(config, session)
    const dumps = await dumpTables(
      session.store,
      [session.tables.places, session.tables.people],
      config.dumpDir,
    )
    const summary = await summarize(config, session)

    return { ...loaded, summary, dumps }
  })
}
