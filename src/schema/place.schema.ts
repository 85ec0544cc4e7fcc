import { z } from 'zod'

export const PLACE_CSV_COLUMNS = ['city', 'county', 'country'] as const

// Fields are plain text and stored exactly as written, blanks included
export const PlaceRecordSchema = z.object({
  city: z.string(),
  county: z.string(),
  country: z.string(),
})

export type PlaceRecord = z.infer<typeof PlaceRecordSchema>

export type PlaceRow = PlaceRecord & { id: number }

export type PlaceIdsByCity = Map<string, number>
