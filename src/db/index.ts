import pg from 'pg'
import { createSchema } from './schema.js'
import { withTransaction } from './repositories/queryable.js'

const { Pool } = pg

export const pool = new Pool({
  connectionString: process.env.DATABASE_URL,
})

pool.on('error', (err) => {
  console.error('[Database] Unexpected error on idle client', err)
  process.exit(-1)
})

/** Creates the lifecycle tables in one transaction, so a failed statement leaves none behind. */
export async function initDb(): Promise<void> {
  await withTransaction(pool, createSchema)
  console.log('[Database] Lifecycle tables initialized successfully.')
}
