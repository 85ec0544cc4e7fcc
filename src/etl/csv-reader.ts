import { open, type FileHandle } from 'fs/promises'
import readline from 'readline'

import { type EtlStep, IngestError } from '../errors.js'
import { hasOpenQuote, parseCSVLine } from '../helpers/parse-csv-line.helper.js'

export interface CsvRecord {
  line: number
  record: Record<string, string>
}

/**
 * Streams a CSV file with a header row, yielding one header-keyed record per
 * non-blank data record, numbered by the line it starts on. The file handle
 * is closed when iteration ends, even if the consumer stops early.
 */
export async function* readCsvRecords(
  filePath: string,
  requiredColumns: readonly string[],
  step: EtlStep,
): AsyncGenerator<CsvRecord> {
  let handle: FileHandle

  try {
    handle = await open(filePath, 'r')
  } catch (error) {
    throw new IngestError(step, filePath, `Failed to open CSV file ${filePath}`, {
      cause: error,
    })
  }

  // The stream owns the handle from here and closes it when destroyed
  const input = handle.createReadStream({ encoding: 'utf8' })
  const lines = readline.createInterface({ input, crlfDelay: Infinity })

  try {
    let header: string[] | null = null
    let lineNumber = 0
    // A quoted field can run over several lines; `pending` holds the record so far
    let pending: string | null = null
    let recordLine = 0

    for await (const rawLine of lines) {
      lineNumber++
      const text = lineNumber === 1 ? rawLine.replace(/^\uFEFF/, '') : rawLine

      if (pending === null) {
        if (text.trim() === '') {
          continue
        }
        pending = text
        recordLine = lineNumber
      } else {
        pending = `${pending}\n${text}`
      }

      if (hasOpenQuote(pending)) {
        continue
      }

      // Quotes are balanced here, so the parser cannot reject the record
      const fields = parseCSVLine(pending)
      pending = null

      if (header === null) {
        header = fields.map((name) => name.trim())
        assertColumns(header, requiredColumns, filePath, step)
        continue
      }

      if (fields.length !== header.length) {
        throw new IngestError(
          step,
          filePath,
          `Expected ${header.length} fields at ${filePath}:${recordLine}, found ${fields.length}`,
          { line: recordLine },
        )
      }

      const columns = header
      const record = Object.fromEntries(
        fields.map((value, i) => [columns[i], value]),
      )

      yield { line: recordLine, record }
    }

    if (pending !== null) {
      throw new IngestError(
        step,
        filePath,
        `Malformed CSV at ${filePath}:${recordLine}: Unterminated quoted field`,
        { line: recordLine },
      )
    }

    if (header === null) {
      throw new IngestError(step, filePath, `CSV file ${filePath} has no header row`)
    }
  } catch (error) {
    if (error instanceof IngestError) {
      throw error
    }
    throw new IngestError(step, filePath, `Failed to read CSV file ${filePath}`, {
      cause: error,
    })
  } finally {
    lines.close()
    input.destroy()
  }
}

function assertColumns(
  header: string[],
  requiredColumns: readonly string[],
  filePath: string,
  step: EtlStep,
): void {
  const missing = requiredColumns.filter((column) => !header.includes(column))

  if (missing.length > 0) {
    throw new IngestError(
      step,
      filePath,
      `CSV file ${filePath} is missing columns: ${missing.join(', ')} (found: ${header.join(', ')})`,
      { line: 1 },
    )
  }
}
