import { z } from 'zod'

import type { EtlStore } from '../db/etl-store.js'
import {
  EtlError,
  type EtlStep,
  IngestError,
  PlaceReferenceError,
  StoreError,
} from '../errors.js'
import { formatZodIssues } from '../helpers/zod-error.helper.js'
import type { TransactionMode } from '../schema/etl-config.schema.js'
import {
  PERSON_CSV_COLUMNS,
  type PersonRecord,
  RawPersonSchema,
} from '../schema/person.schema.js'
import {
  PLACE_CSV_COLUMNS,
  type PlaceIdsByCity,
  PlaceRecordSchema,
} from '../schema/place.schema.js'
import { readCsvRecords } from './csv-reader.js'

export interface LoadOptions {
  // 'none' leaves rows inserted before a failure in the store
  transactionMode?: TransactionMode
}

export async function loadPlaces(
  store: EtlStore,
  filePath: string,
  options: LoadOptions = {},
): Promise<PlaceIdsByCity> {
  console.log(`Inserting places data from ${filePath}...`)

  return inTransactionMode(store, 'load-places', options, async () => {
    const ids: PlaceIdsByCity = new Map()
    let inserted = 0

    for await (const { line, record } of readCsvRecords(
      filePath,
      PLACE_CSV_COLUMNS,
      'load-places',
    )) {
      const place = validateRow(
        () => PlaceRecordSchema.parse(record),
        'load-places',
        filePath,
        line,
      )

      let id: number
      try {
        id = await store.insertPlace(place)
      } catch (error) {
        throw new StoreError(
          'load-places',
          `Failed to insert place "${place.city}" from ${filePath}:${line}`,
          error,
        )
      }

      if (ids.has(place.city)) {
        console.warn(
          `City "${place.city}" appears again at line ${line}; people born there will reference id ${id}`,
        )
      }

      ids.set(place.city, id)
      inserted++
    }

    console.log(`Inserted ${inserted} places (${ids.size} distinct cities)`)
    return ids
  })
}

/**
 * Inserts every person row, resolving the birthplace through `placeIds` only.
 * Stops at the first city that is not in the map. The city is matched exactly
 * as written, surrounding spaces included.
 */
export async function loadPeople(
  store: EtlStore,
  filePath: string,
  placeIds: PlaceIdsByCity,
  options: LoadOptions = {},
): Promise<number> {
  console.log(`Inserting people data from ${filePath}...`)

  return inTransactionMode(store, 'load-people', options, async () => {
    let inserted = 0

    for await (const { line, record } of readCsvRecords(
      filePath,
      PERSON_CSV_COLUMNS,
      'load-people',
    )) {
      const raw = validateRow(
        () => RawPersonSchema.parse(record),
        'load-people',
        filePath,
        line,
      )

      const placeOfBirthId = placeIds.get(raw.place_of_birth)
      if (placeOfBirthId === undefined) {
        throw new PlaceReferenceError(raw.place_of_birth, line)
      }

      const person: PersonRecord = {
        given_name: raw.given_name,
        family_name: raw.family_name,
        date_of_birth: raw.date_of_birth,
        place_of_birth_id: placeOfBirthId,
      }

      try {
        await store.insertPerson(person)
      } catch (error) {
        throw new StoreError(
          'load-people',
          `Failed to insert person "${raw.given_name} ${raw.family_name}" from ${filePath}:${line}`,
          error,
        )
      }

      inserted++
    }

    console.log(`Inserted ${inserted} people`)
    return inserted
  })
}

function validateRow<T>(
  parse: () => T,
  step: EtlStep,
  filePath: string,
  line: number,
): T {
  try {
    return parse()
  } catch (error) {
    const detail =
      error instanceof z.ZodError ? formatZodIssues(error).join('; ') : String(error)
    throw new IngestError(
      step,
      filePath,
      `Invalid row at ${filePath}:${line}: ${detail}`,
      { cause: error, line },
    )
  }
}

async function inTransactionMode<T>(
  store: EtlStore,
  step: EtlStep,
  options: LoadOptions,
  work: () => Promise<T>,
): Promise<T> {
  if (options.transactionMode !== 'per-file') {
    return work()
  }

  try {
    return await store.transaction(work)
  } catch (error) {
    if (error instanceof EtlError) {
      throw error
    }
    throw new StoreError(step, `Transaction failed during ${step}`, error)
  }
}
