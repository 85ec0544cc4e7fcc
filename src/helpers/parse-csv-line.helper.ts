export class CsvLineError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CsvLineError'
  }
}

/**
 * Splits one CSV record into fields. Quoted fields may contain commas,
 * doubled quotes ("") and line breaks, per RFC 4180. A record ending in \r
 * has it removed.
 */
export function parseCSVLine(line: string): string[] {
  const text = line.endsWith('\r') ? line.slice(0, -1) : line
  const fields: string[] = []
  let current = ''
  let inQuotes = false

  for (let i = 0; i < text.length; i++) {
    const char = text[i]

    if (inQuotes) {
      if (char === '"' && text[i + 1] === '"') {
        current += '"'
        i++
      } else if (char === '"') {
        inQuotes = false
      } else {
        current += char
      }
    } else if (char === '"') {
      inQuotes = true
    } else if (char === ',') {
      fields.push(current)
      current = ''
    } else {
      current += char
    }
  }

  if (inQuotes) {
    throw new CsvLineError('Unterminated quoted field')
  }

  fields.push(current)

  return fields
}

// Doubled quotes count twice, so an odd count means a quoted field is still open
export function hasOpenQuote(text: string): boolean {
  let quotes = 0
  for (const char of text) {
    if (char === '"') {
      quotes++
    }
  }
  return quotes % 2 === 1
}
