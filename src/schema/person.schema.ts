import { z } from 'zod'

export const PERSON_CSV_COLUMNS = [
  'given_name',
  'family_name',
  'date_of_birth',
  'place_of_birth',
] as const

export const RawPersonSchema = z.object({
  given_name: z.string(),
  family_name: z.string(),
  date_of_birth: z.string(),
  place_of_birth: z.string(),
})

export const PersonRecordSchema = z.object({
  given_name: z.string(),
  family_name: z.string(),
  date_of_birth: z.string(),
  place_of_birth_id: z.number().int(),
})

export type PersonRecord = z.infer<typeof PersonRecordSchema>

export type PersonRow = PersonRecord & { id: number }
