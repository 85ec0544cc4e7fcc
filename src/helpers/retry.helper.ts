export type BackoffStrategy = 'fixed' | 'linear'

export interface RetryPolicy {
  maxAttempts: number
  delayMs: number
  backoff: BackoffStrategy
}

export type Sleep = (ms: number) => Promise<void>

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms))

export interface RetryOptions {
  sleep?: Sleep
  isRetryable?: (error: unknown) => boolean
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void
}

export class RetryExhaustedError extends Error {
  readonly attempts: number

  constructor(attempts: number, cause: unknown) {
    super(`Gave up after ${attempts} attempts`, { cause })
    this.name = 'RetryExhaustedError'
    this.attempts = attempts
  }
}

export class NonRetryableError extends Error {
  readonly attempts: number

  constructor(attempts: number, cause: unknown) {
    super(`Failed with a non-retryable error on attempt ${attempts}`, {
      cause,
    })
    this.name = 'NonRetryableError'
    this.attempts = attempts
  }
}

// Wait applied after the given (1-based) failed attempt
export function delayFor(policy: RetryPolicy, attempt: number): number {
  return policy.backoff === 'linear' ? policy.delayMs * attempt : policy.delayMs
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new Error(
      `maxAttempts must be a positive integer, got ${policy.maxAttempts}`,
    )
  }

  const sleep = options.sleep ?? defaultSleep
  const isRetryable = options.isRetryable ?? (() => true)

  let lastError: unknown

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await operation(attempt)
    } catch (error) {
      lastError = error

      if (!isRetryable(error)) {
        throw new NonRetryableError(attempt, error)
      }

      if (attempt < policy.maxAttempts) {
        const delay = delayFor(policy, attempt)
        options.onRetry?.(attempt, error, delay)
        await sleep(delay)
      }
    }
  }

  throw new RetryExhaustedError(policy.maxAttempts, lastError)
}
