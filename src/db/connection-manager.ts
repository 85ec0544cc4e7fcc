import { Client } from 'pg'

import { ConnectionError, describeError } from '../errors.js'
import { maskDatabaseUrl } from '../helpers/database.helper.js'
import {
  NonRetryableError,
  RetryExhaustedError,
  type RetryPolicy,
  type Sleep,
  withRetry,
} from '../helpers/retry.helper.js'

export type ClientFactory = (connectionString: string) => Client

export interface ConnectionManagerOptions {
  createClient?: ClientFactory
  sleep?: Sleep
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 10,
  delayMs: 5000,
  backoff: 'fixed',
}

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  '57P03', // cannot_connect_now: server is starting up
])

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined
  }
  return undefined
}

export function isTransientConnectionError(error: unknown): boolean {
  const code = errorCode(error)
  if (code && TRANSIENT_ERROR_CODES.has(code)) {
    return true
  }

  if (error instanceof AggregateError) {
    return error.errors.some(isTransientConnectionError)
  }

  return (
    error instanceof Error &&
    /connection terminated|timeout expired/i.test(error.message)
  )
}

export class ConnectionManager {
  private connectionString: string
  private policy: RetryPolicy
  private createClient: ClientFactory
  private sleep?: Sleep

  constructor(
    connectionString: string,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    options: ConnectionManagerOptions = {},
  ) {
    this.connectionString = connectionString
    this.policy = policy
    this.createClient =
      options.createClient ??
      ((url: string) => new Client({ connectionString: url }))
    this.sleep = options.sleep
  }

  async connect(): Promise<Client> {
    const { maxAttempts } = this.policy
    console.log(
      `Connecting to ${maskDatabaseUrl(this.connectionString)} (up to ${maxAttempts} attempts)`,
    )

    try {
      return await withRetry(
        async (attempt) => {
          const client = this.createClient(this.connectionString)
          // 'error' from an idle client would otherwise be an uncaught exception
          client.on('error', (error) => {
            console.error(`PostgreSQL connection error: ${describeError(error)}`)
          })
          try {
            await client.connect()
          } catch (error) {
            await this.discard(client)
            throw error
          }
          console.log(`Connected to PostgreSQL on attempt ${attempt}/${maxAttempts}`)
          return client
        },
        this.policy,
        {
          sleep: this.sleep,
          isRetryable: isTransientConnectionError,
          onRetry: (attempt, error, delayMs) => {
            console.warn(
              `PostgreSQL not ready yet (attempt ${attempt}/${maxAttempts}): ${describeError(error)}. Retrying in ${delayMs}ms`,
            )
          },
        },
      )
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new ConnectionError(
          `Could not connect to PostgreSQL after ${error.attempts} attempts`,
          error.attempts,
          error.cause,
        )
      }
      if (error instanceof NonRetryableError) {
        throw new ConnectionError(
          `Could not connect to PostgreSQL: ${describeError(error.cause)}`,
          error.attempts,
          error.cause,
        )
      }
      throw error
    }
  }

  async release(client: Client): Promise<void> {
    await client.end()
    console.log('Connection released.')
  }

  private async discard(client: Client): Promise<void> {
    try {
      await client.end()
    } catch (error) {
      console.warn(`Ignoring error while closing failed connection: ${describeError(error)}`)
    }
  }
}

/**
 * Runs `work` with a live client and always releases it afterwards,
 * whether `work` resolves or throws.
 */
export async function withConnection<T>(
  manager: ConnectionManager,
  work: (client: Client) => Promise<T>,
): Promise<T> {
  const client = await manager.connect()

  let result: T
  try {
    result = await work(client)
  } catch (error) {
    // The failure of `work` is what the caller needs to see
    try {
      await manager.release(client)
    } catch (releaseError) {
      console.warn(`Ignoring error while releasing connection: ${describeError(releaseError)}`)
    }
    throw error
  }

  await manager.release(client)
  return result
}
