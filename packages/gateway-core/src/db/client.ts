import pg from 'pg'
import type { Logger } from '@agentbridge/observability'

export type QueryRow = Record<string, unknown>
export type QueryFn = (sql: string, params?: unknown[]) => Promise<{ rows: QueryRow[] }>

export type DbClient = {
  query: QueryFn
  close: () => Promise<void>
}

export function createDbClient(databaseUrl: string | undefined, logger?: Logger): DbClient | undefined {
  if (!databaseUrl) {
    logger?.warn('[db] DATABASE_URL not set - using in-memory stores')
    return undefined
  }
  const pool = new pg.Pool({ connectionString: databaseUrl, max: 5 })
  pool.on('error', (err) => logger?.error({ err }, '[db] idle client error'))
  return {
    query: async (text, values) => {
      const result = await pool.query(text, values)
      return { rows: result.rows }
    },
    close: () => pool.end(),
  }
}
