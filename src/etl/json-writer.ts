import { promises as fs } from 'fs'
import path from 'path'

import { WriteError } from '../errors.js'

class UnserializableValueError extends Error {
  constructor(key: string, kind: string) {
    super(
      key === ''
        ? `Cannot serialize ${kind} as JSON`
        : `Cannot serialize ${kind} at key "${key}" as JSON`,
    )
    this.name = 'UnserializableValueError'
  }
}

// JSON.stringify would drop or null these silently
export function toCompactJson(data: unknown): string {
  return JSON.stringify(data, (key: string, value: unknown) => {
    switch (typeof value) {
      case 'bigint':
      case 'function':
      case 'symbol':
      case 'undefined':
        throw new UnserializableValueError(key, typeof value)
      case 'number':
        if (!Number.isFinite(value)) {
          throw new UnserializableValueError(key, String(value))
        }
        return value
      default:
        return value
    }
  })
}

/**
 * Writes `data` as compact JSON, creating missing parent directories and
 * replacing any existing file.
 */
export async function writeJson(data: unknown, outputPath: string): Promise<void> {
  let json: string

  try {
    json = toCompactJson(data)
  } catch (error) {
    throw new WriteError(
      outputPath,
      `Failed to serialize JSON for ${outputPath}`,
      error,
    )
  }

  try {
    await fs.mkdir(path.dirname(outputPath), { recursive: true })
    await fs.writeFile(outputPath, json, 'utf-8')
  } catch (error) {
    throw new WriteError(outputPath, `Failed to write JSON to ${outputPath}`, error)
  }
}
