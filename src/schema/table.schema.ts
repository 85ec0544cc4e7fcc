export interface TableDefinition<Column extends string = string> {
  name: string
  primaryKey: Column
  columns: readonly Column[]
}

export const PLACES_TABLE = {
  name: 'places',
  primaryKey: 'id',
  columns: ['id', 'city', 'county', 'country'],
} as const satisfies TableDefinition

export const PEOPLE_TABLE = {
  name: 'people',
  primaryKey: 'id',
  columns: [
    'id',
    'given_name',
    'family_name',
    'date_of_birth',
    'place_of_birth_id',
  ],
} as const satisfies TableDefinition

export type PlacesTable = typeof PLACES_TABLE
export type PeopleTable = typeof PEOPLE_TABLE

export type EtlTables = {
  places: PlacesTable
  people: PeopleTable
}

export const ETL_TABLES: EtlTables = {
  places: PLACES_TABLE,
  people: PEOPLE_TABLE,
}

// Columns written on insert; the primary key is generated by the store
export function insertColumns<Column extends string>(
  table: TableDefinition<Column>,
): Column[] {
  return table.columns.filter((column) => column !== table.primaryKey)
}
