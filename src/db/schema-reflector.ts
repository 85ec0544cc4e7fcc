import type { Client } from 'pg'
import { z } from 'zod'

import { SchemaError } from '../errors.js'
import { ETL_TABLES, type TableDefinition } from '../schema/table.schema.js'

const CatalogColumnSchema = z.object({
  table_name: z.string(),
  column_name: z.string(),
})

/**
 * Confirms that every declared table exists in the current schema with at
 * least the declared columns, then hands the declarations back for use as
 * table handles.
 */
export async function reflectTables<
  Tables extends Record<string, TableDefinition>,
>(client: Client, tables: Tables): Promise<Tables> {
  const definitions = Object.values(tables)
  const names = definitions.map((table) => table.name)

  let catalog: Map<string, Set<string>>

  try {
    const result = await client.query(
      `SELECT table_name, column_name
       FROM information_schema.columns
       WHERE table_schema = current_schema() AND table_name = ANY($1)`,
      [names],
    )

    catalog = new Map()
    for (const row of z.array(CatalogColumnSchema).parse(result.rows)) {
      const columns = catalog.get(row.table_name) ?? new Set<string>()
      columns.add(row.column_name)
      catalog.set(row.table_name, columns)
    }
  } catch (error) {
    throw new SchemaError(
      names.join(', '),
      `Failed to read table definitions for ${names.join(', ')}`,
      error,
    )
  }

  for (const table of definitions) {
    const columns = catalog.get(table.name)
    if (!columns) {
      throw new SchemaError(
        table.name,
        `Table "${table.name}" does not exist. Run the migrations first.`,
      )
    }

    const missing = table.columns.filter((column) => !columns.has(column))
    if (missing.length > 0) {
      throw new SchemaError(
        table.name,
        `Table "${table.name}" is missing columns: ${missing.join(', ')}`,
      )
    }
  }

  console.log(`Verified tables: ${names.join(', ')}`)

  return tables
}

export async function reflectEtlTables(client: Client): Promise<typeof ETL_TABLES> {
  return reflectTables(client, ETL_TABLES)
}
