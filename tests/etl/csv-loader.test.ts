import path from 'path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'

import {
  IngestError,
  PlaceReferenceError,
  StoreError,
} from '../../src/errors.js'
import { loadPeople, loadPlaces } from '../../src/etl/csv-loader.js'
import { InMemoryEtlStore } from '../helpers/in-memory-store.js'
import { createTempDir, removeTempDir, writeFixture } from '../helpers/temp-dir.js'
import { captureError } from '../helpers/test-utils.js'

const PLACES_CSV = [
  'city,county,country',
  'London,Greater London,UK',
  'Cardiff,,UK',
  'Lyon,Rhône,France',
].join('\n')

const PEOPLE_CSV = [
  'given_name,family_name,date_of_birth,place_of_birth',
  'Ada,Lovelace,1815-12-10,London',
  'Marie,Curie,1867-11-07,Lyon',
  'Alan,Turing,,London',
].join('\n')

describe('CSV loader', () => {
  let dir: string
  let store: InMemoryEtlStore

  beforeEach(async () => {
    dir = await createTempDir()
    store = new InMemoryEtlStore()
  })

  afterEach(async () => {
    await removeTempDir(dir)
  })

  describe('loadPlaces', () => {
    it('inserts one place per row and maps each city to its id', async () => {
      const file = await writeFixture(dir, 'places.csv', PLACES_CSV)

      const placeIds = await loadPlaces(store, file)

      expect([...placeIds.entries()]).toEqual([
        ['London', 1],
        ['Cardiff', 2],
        ['Lyon', 3],
      ])
      expect(store.places).toEqual([
        { id: 1, city: 'London', county: 'Greater London', country: 'UK' },
        { id: 2, city: 'Cardiff', county: '', country: 'UK' },
        { id: 3, city: 'Lyon', county: 'Rhône', country: 'France' },
      ])
    })

    it('keeps the id of the last row for a repeated city', async () => {
      const file = await writeFixture(
        dir,
        'places.csv',
        'city,county,country\nYork,North Yorkshire,UK\nYork,,USA\n',
      )

      const placeIds = await loadPlaces(store, file)

      expect(placeIds.get('York')).toBe(2)
      expect(store.places).toHaveLength(2)
      expect(console.warn).toHaveBeenCalledWith(
        'City "York" appears again at line 3; people born there will reference id 2',
      )
    })

    it('fails with IngestError when the file is missing', async () => {
      const missing = path.join(dir, 'nope.csv')

      const failure = await captureError(loadPlaces(store, missing), IngestError)

      expect(failure.step).toBe('load-places')
      expect(failure.message).toBe(`Failed to open CSV file ${missing}`)
    })

    it('stores fields exactly as written', async () => {
      const file = await writeFixture(
        dir,
        'places.csv',
        'city,county,country\n London ,,UK\n,Somewhere,UK\n',
      )

      const placeIds = await loadPlaces(store, file)

      expect(store.places).toEqual([
        { id: 1, city: ' London ', county: '', country: 'UK' },
        { id: 2, city: '', county: 'Somewhere', country: 'UK' },
      ])
      expect([...placeIds.keys()]).toEqual([' London ', ''])
    })

    it('leaves earlier rows in the store when an insert fails', async () => {
      const file = await writeFixture(dir, 'places.csv', PLACES_CSV)
      const cause = new Error('duplicate key value violates unique constraint')
      store.failInsert('places', 2, cause)

      const failure = await captureError(loadPlaces(store, file), StoreError)

      expect(failure.message).toBe(`Failed to insert place "Cardiff" from ${file}:3`)
      expect(failure.cause).toBe(cause)
      expect(store.places.map((place) => place.city)).toEqual(['London'])
    })

    it('rolls the whole file back in per-file transaction mode', async () => {
      const file = await writeFixture(dir, 'places.csv', PLACES_CSV)
      store.failInsert('places', 3, new Error('disk full'))

      await expect(
        loadPlaces(store, file, { transactionMode: 'per-file' }),
      ).rejects.toThrow(StoreError)

      expect(store.places).toEqual([])
      expect(store.transactions).toEqual({ begun: 1, committed: 0, rolledBack: 1 })
    })

    it('commits the file in per-file transaction mode', async () => {
      const file = await writeFixture(dir, 'places.csv', PLACES_CSV)

      await loadPlaces(store, file, { transactionMode: 'per-file' })

      expect(store.places).toHaveLength(3)
      expect(store.transactions).toEqual({ begun: 1, committed: 1, rolledBack: 0 })
    })
  })

  describe('loadPeople', () => {
    it('links every person to the place whose city matches', async () => {
      const placesFile = await writeFixture(dir, 'places.csv', PLACES_CSV)
      const peopleFile = await writeFixture(dir, 'people.csv', PEOPLE_CSV)

      const placeIds = await loadPlaces(store, placesFile)
      const inserted = await loadPeople(store, peopleFile, placeIds)

      expect(inserted).toBe(3)
      expect(store.people).toEqual([
        {
          id: 1,
          given_name: 'Ada',
          family_name: 'Lovelace',
          date_of_birth: '1815-12-10',
          place_of_birth_id: 1,
        },
        {
          id: 2,
          given_name: 'Marie',
          family_name: 'Curie',
          date_of_birth: '1867-11-07',
          place_of_birth_id: 3,
        },
        {
          id: 3,
          given_name: 'Alan',
          family_name: 'Turing',
          date_of_birth: '',
          place_of_birth_id: 1,
        },
      ])
    })

    it('resolves cities through the supplied map only', async () => {
      const peopleFile = await writeFixture(
        dir,
        'people.csv',
        'given_name,family_name,date_of_birth,place_of_birth\nAda,Lovelace,1815-12-10,London\n',
      )
      await store.insertPlace({ city: 'London', county: '', country: 'UK' })

      const failure = await captureError(
        loadPeople(store, peopleFile, new Map()),
        PlaceReferenceError,
      )

      expect(failure.city).toBe('London')
      expect(store.people).toEqual([])
    })

    it('stops at the first unknown city', async () => {
      const peopleFile = await writeFixture(
        dir,
        'people.csv',
        [
          'given_name,family_name,date_of_birth,place_of_birth',
          'Ada,Lovelace,1815-12-10,London',
          'Nikola,Tesla,1856-07-10,Smiljan',
          'Alan,Turing,1912-06-23,London',
        ].join('\n'),
      )
      const londonId = await store.insertPlace({
        city: 'London',
        county: '',
        country: 'UK',
      })

      const failure = await captureError(
        loadPeople(store, peopleFile, new Map([['London', londonId]])),
        PlaceReferenceError,
      )

      expect(failure.message).toBe(
        'Place not found: "Smiljan" (line 3). Load places before people.',
      )
      expect(failure.line).toBe(3)
      expect(failure.step).toBe('load-people')
      expect(store.people.map((person) => person.given_name)).toEqual(['Ada'])
    })

    it('wraps insert failures in StoreError', async () => {
      const placesFile = await writeFixture(dir, 'places.csv', PLACES_CSV)
      const peopleFile = await writeFixture(dir, 'people.csv', PEOPLE_CSV)
      const placeIds = await loadPlaces(store, placesFile)
      store.failInsert('people', 2, new Error('connection reset'))

      const failure = await captureError(
        loadPeople(store, peopleFile, placeIds),
        StoreError,
      )

      expect(failure.step).toBe('load-people')
      expect(failure.message).toBe(
        `Failed to insert person "Marie Curie" from ${peopleFile}:3`,
      )
      expect(store.people).toHaveLength(1)
    })

    it('matches birthplaces against the city exactly as written', async () => {
      const placesFile = await writeFixture(
        dir,
        'places.csv',
        'city,county,country\n London ,,UK\n',
      )
      const peopleFile = await writeFixture(
        dir,
        'people.csv',
        [
          'given_name,family_name,date_of_birth,place_of_birth',
          'Ada,Lovelace,, London ',
          'Alan,Turing,1912-06-23,London',
        ].join('\n'),
      )
      const placeIds = await loadPlaces(store, placesFile)

      const failure = await captureError(
        loadPeople(store, peopleFile, placeIds),
        PlaceReferenceError,
      )

      expect(failure.city).toBe('London')
      expect(failure.line).toBe(3)
      expect(store.people).toEqual([
        {
          id: 1,
          given_name: 'Ada',
          family_name: 'Lovelace',
          date_of_birth: '',
          place_of_birth_id: 1,
        },
      ])
    })

    it('fails with IngestError when the people file is missing', async () => {
      const missing = path.join(dir, 'people.csv')

      const failure = await captureError(
        loadPeople(store, missing, new Map()),
        IngestError,
      )

      expect(failure.step).toBe('load-people')
    })

    it('rolls back every person in per-file mode when a city is unknown', async () => {
      const placesFile = await writeFixture(dir, 'places.csv', PLACES_CSV)
      const peopleFile = await writeFixture(
        dir,
        'people.csv',
        `${PEOPLE_CSV}\nGrace,Hopper,1906-12-09,New York`,
      )
      const placeIds = await loadPlaces(store, placesFile)

      await expect(
        loadPeople(store, peopleFile, placeIds, { transactionMode: 'per-file' }),
      ).rejects.toThrow(PlaceReferenceError)

      expect(store.people).toEqual([])
      expect(store.places).toHaveLength(3)
    })
  })
})
