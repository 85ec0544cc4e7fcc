import type { Client } from 'pg'
import { z } from 'zod'

import { describeError } from '../errors.js'
import type { PersonRecord } from '../schema/person.schema.js'
import type { PlaceRecord } from '../schema/place.schema.js'
import {
  ETL_TABLES,
  type EtlTables,
  insertColumns,
  type TableDefinition,
} from '../schema/table.schema.js'

export interface CountryPopulationRow {
  country: string
  population: number
}

export type StoreRow = Record<string, unknown>

type ColumnValue = string | number | null

/**
 * Persistence used by the loaders, the aggregator and the table dump.
 * Each call is its own unit of work unless wrapped in `transaction`.
 */
export interface EtlStore {
  insertPlace(place: PlaceRecord): Promise<number>
  insertPerson(person: PersonRecord): Promise<number>
  countPeopleByCountry(): Promise<CountryPopulationRow[]>
  selectAll(table: TableDefinition): Promise<StoreRow[]>
  transaction<T>(work: () => Promise<T>): Promise<T>
}

const InsertedIdSchema = z.object({ id: z.coerce.number().int() })

// COUNT() comes back from pg as a bigint string
const PopulationRowSchema = z.object({
  country: z.string(),
  population: z.coerce.number().int().min(0),
})

export class PgEtlStore implements EtlStore {
  private client: Client
  private tables: EtlTables

  constructor(client: Client, tables: EtlTables = ETL_TABLES) {
    this.client = client
    this.tables = tables
  }

  async insertPlace(place: PlaceRecord): Promise<number> {
    return this.insertReturningId(this.tables.places, place)
  }

  async insertPerson(person: PersonRecord): Promise<number> {
    return this.insertReturningId(this.tables.people, person)
  }

  async countPeopleByCountry(): Promise<CountryPopulationRow[]> {
    const { places, people } = this.tables

    const result = await this.client.query(`
      SELECT ${places.name}.country AS country, COUNT(${people.name}.id) AS population
      FROM ${people.name}
      INNER JOIN ${places.name} ON ${people.name}.place_of_birth_id = ${places.name}.${places.primaryKey}
      GROUP BY ${places.name}.country
      ORDER BY ${places.name}.country
    `)

    return z.array(PopulationRowSchema).parse(result.rows)
  }

  async selectAll(table: TableDefinition): Promise<StoreRow[]> {
    const result = await this.client.query(
      `SELECT ${table.columns.join(', ')} FROM ${table.name} ORDER BY ${table.primaryKey}`,
    )

    return result.rows
  }

  async transaction<T>(work: () => Promise<T>): Promise<T> {
    await this.client.query('BEGIN')

    try {
      const result = await work()
      await this.client.query('COMMIT')
      return result
    } catch (error) {
      try {
        await this.client.query('ROLLBACK')
      } catch (rollbackError) {
        console.error('Rollback failed:', describeError(rollbackError))
      }
      throw error
    }
  }

  private async insertReturningId(
    table: TableDefinition,
    record: Record<string, ColumnValue>,
  ): Promise<number> {
    const columns = insertColumns(table)

    const missing = columns.filter((column) => !(column in record))
    if (missing.length > 0) {
      throw new Error(
        `Missing values for ${table.name} columns: ${missing.join(', ')}`,
      )
    }

    const placeholders = columns.map((_, i) => `$${i + 1}`).join(', ')
    const result = await this.client.query(
      `INSERT INTO ${table.name} (${columns.join(', ')}) VALUES (${placeholders}) RETURNING ${table.primaryKey}`,
      columns.map((column) => record[column]),
    )

    const [row] = result.rows
    if (!row) {
      throw new Error(`Insert into ${table.name} returned no ${table.primaryKey}`)
    }

    return InsertedIdSchema.parse({ id: row[table.primaryKey] }).id
  }
}
