import { z } from 'zod'

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue, i) => {
    const path = issue.path.length > 0 ? issue.path.map(String).join('.') : 'root'
    return `${i + 1}. ${path}: ${issue.message}`
  })
}

export function zodErrorHandling(error: unknown, error_message: string): never {
  if (error instanceof z.ZodError) {
    const lines = formatZodIssues(error)
    console.error(`${error_message}:`)
    lines.forEach((line) => console.error(line))
    throw new Error(`${error_message}: ${lines.join('; ')}`, { cause: error })
  }

  const errorMessage = error instanceof Error ? error.message : String(error)
  throw new Error(`${error_message}: ${errorMessage}`, { cause: error })
}
