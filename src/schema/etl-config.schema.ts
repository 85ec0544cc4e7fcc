import path from 'path'
import { z } from 'zod'

import { buildDatabaseUrl } from '../helpers/database.helper.js'
import type { RetryPolicy } from '../helpers/retry.helper.js'
import { zodErrorHandling } from '../helpers/zod-error.helper.js'

export const TransactionModeSchema = z.enum(['none', 'per-file'])
export type TransactionMode = z.infer<typeof TransactionModeSchema>

export const EtlEnvSchema = z.object({
  ETL_MAX_RETRIES: z.coerce.number().int().min(1).default(10),
  ETL_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(5000),
  ETL_RETRY_BACKOFF: z.enum(['fixed', 'linear']).default('fixed'),
  ETL_DATA_DIR: z.string().min(1).default('data'),
  ETL_PLACES_FILE: z.string().min(1).default('places.csv'),
  ETL_PEOPLE_FILE: z.string().min(1).default('people.csv'),
  ETL_SUMMARY_OUTPUT: z.string().min(1).default('data/summary_output.json'),
  ETL_DUMP_DIR: z.string().min(1).default('data/dumps'),
  ETL_TRANSACTION_MODE: TransactionModeSchema.default('none'),
})

export interface EtlConfig {
  databaseUrl: string
  retry: RetryPolicy
  placesCsvPath: string
  peopleCsvPath: string
  summaryOutputPath: string
  dumpDir: string
  transactionMode: TransactionMode
}

export function loadEtlConfig(
  env: Record<string, string | undefined> = process.env,
): EtlConfig {
  let parsed: z.infer<typeof EtlEnvSchema>

  try {
    // Empty strings count as unset so `.env` placeholders fall back to defaults
    const defined = Object.fromEntries(
      Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
    )
    parsed = EtlEnvSchema.parse(defined)
  } catch (error) {
    zodErrorHandling(error, 'ETL configuration validation failed')
  }

  return {
    databaseUrl: buildDatabaseUrl(env),
    retry: {
      maxAttempts: parsed.ETL_MAX_RETRIES,
      delayMs: parsed.ETL_RETRY_DELAY_MS,
      backoff: parsed.ETL_RETRY_BACKOFF,
    },
    placesCsvPath: path.resolve(parsed.ETL_DATA_DIR, parsed.ETL_PLACES_FILE),
    peopleCsvPath: path.resolve(parsed.ETL_DATA_DIR, parsed.ETL_PEOPLE_FILE),
    summaryOutputPath: path.resolve(parsed.ETL_SUMMARY_OUTPUT),
    dumpDir: path.resolve(parsed.ETL_DUMP_DIR),
    transactionMode: parsed.ETL_TRANSACTION_MODE,
  }
}
