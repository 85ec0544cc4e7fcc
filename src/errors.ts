export type EtlStep =
  | 'connect'
  | 'schema'
  | 'load-places'
  | 'load-people'
  | 'aggregate'
  | 'dump'
  | 'write'

export class EtlError extends Error {
  readonly step: EtlStep

  constructor(step: EtlStep, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'EtlError'
    this.step = step
  }
}

// Store unreachable after every retry was spent
export class ConnectionError extends EtlError {
  readonly attempts: number

  constructor(message: string, attempts: number, cause?: unknown) {
    super('connect', message, { cause })
    this.name = 'ConnectionError'
    this.attempts = attempts
  }
}

export class SchemaError extends EtlError {
  readonly table: string

  constructor(table: string, message: string, cause?: unknown) {
    super('schema', message, { cause })
    this.name = 'SchemaError'
    this.table = table
  }
}

export class IngestError extends EtlError {
  readonly filePath: string
  readonly line?: number

  constructor(
    step: EtlStep,
    filePath: string,
    message: string,
    options?: { cause?: unknown; line?: number },
  ) {
    super(step, message, { cause: options?.cause })
    this.name = 'IngestError'
    this.filePath = filePath
    this.line = options?.line
  }
}

/**
 * A person row names a birthplace city that was never loaded as a place.
 * Loading stops at the first such row.
 */
export class PlaceReferenceError extends EtlError {
  readonly city: string
  readonly line: number

  constructor(city: string, line: number) {
    super(
      'load-people',
      `Place not found: "${city}" (line ${line}). Load places before people.`,
    )
    this.name = 'PlaceReferenceError'
    this.city = city
    this.line = line
  }
}

export class StoreError extends EtlError {
  constructor(step: EtlStep, message: string, cause?: unknown) {
    super(step, message, { cause })
    this.name = 'StoreError'
  }
}

export class QueryError extends StoreError {
  constructor(message: string, cause?: unknown) {
    super('aggregate', message, cause)
    this.name = 'QueryError'
  }
}

export class WriteError extends EtlError {
  readonly outputPath: string

  constructor(outputPath: string, message: string, cause?: unknown) {
    super('write', message, { cause })
    this.name = 'WriteError'
    this.outputPath = outputPath
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : ''
    return `${error.message}${cause}`
  }

  return String(error)
}
