import path from 'path'

import type { EtlStore, StoreRow } from '../db/etl-store.js'
import { StoreError } from '../errors.js'
import type { TableDefinition } from '../schema/table.schema.js'
import { writeJson } from './json-writer.js'

export interface TableDumpResult {
  table: string
  rows: number
  outputPath: string
}

export async function dumpTables(
  store: EtlStore,
  tables: readonly TableDefinition[],
  outputDir: string,
): Promise<TableDumpResult[]> {
  const results: TableDumpResult[] = []

  for (const table of tables) {
    let rows: StoreRow[]
    try {
      rows = await store.selectAll(table)
    } catch (error) {
      throw new StoreError('dump', `Failed to read rows from ${table.name}`, error)
    }

    // Keys follow the declared column order whatever order the store returned
    const ordered = rows.map((row) =>
      Object.fromEntries(table.columns.map((column) => [column, row[column] ?? null])),
    )

    const outputPath = path.join(outputDir, `${table.name}.json`)
    await writeJson(ordered, outputPath)

    console.log(`Wrote ${ordered.length} ${table.name} rows to ${outputPath}`)
    results.push({ table: table.name, rows: ordered.length, outputPath })
  }

  return results
}
