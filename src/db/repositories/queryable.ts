import type { QueryResult, QueryResultRow } from 'pg'

export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: readonly unknown[]
  ): Promise<QueryResult<R>>
}

export interface TransactionClient extends Queryable {
  release(): void
}

/** Anything that lends out a dedicated client, such as a pg Pool. */
export interface ClientSource {
  connect(): Promise<TransactionClient>
}

/**
 * Runs `work` between BEGIN and COMMIT on one pooled client.
 * Rolls back and rethrows when `work` fails; the client is always released.
 */
export async function withTransaction<T>(
  source: ClientSource,
  work: (client: Queryable) => Promise<T>
): Promise<T> {
  const client = await source.connect()
  try {
    await client.query('BEGIN')
    const result = await work(client)
    await client.query('COMMIT')
    return result
  } catch (err) {
    await client.query('ROLLBACK')
    throw err
  } finally {
    client.release()
  }
}
