import type { QueryResult, QueryResultRow } from 'pg';

/**
 * The slice of the pg API the repositories use. pg's Pool and PoolClient
 * satisfy these, and tests can hand in fakes.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>;
}

export interface TransactionClient extends Queryable {
  release(err?: Error | boolean): void;
}

export interface ConnectionPool extends Queryable {
  connect(): Promise<TransactionClient>;
}

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated client. Rolls back on any
 * error and always releases the client.
 */
export async function withTransaction<T>(
  pool: ConnectionPool,
  fn: (client: Queryable) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}
