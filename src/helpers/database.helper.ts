import 'dotenv/config'

type Env = Record<string, string | undefined>

export function buildDatabaseUrl(env: Env = process.env): string {
  if (env.DATABASE_URL) {
    return env.DATABASE_URL
  }

  const host = env.POSTGRES_HOST || 'localhost'
  const port = env.POSTGRES_PORT || '5432'
  const database = env.POSTGRES_DB || 'population_db'
  const user = encodeURIComponent(env.POSTGRES_USER || 'etl_user')
  const password = encodeURIComponent(env.POSTGRES_PASSWORD || 'etl_pass')

  return `postgresql://${user}:${password}@${host}:${port}/${database}`
}

// Hide credentials before a connection string reaches the logs
export function maskDatabaseUrl(url: string): string {
  return url.replace(/:[^:@/]*@/, ':***@')
}
