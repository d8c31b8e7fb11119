import { Pool, type PoolClient, type QueryConfig, type QueryResult, type QueryResultRow, types } from 'pg';

// Ensure DATE columns round-trip as date-only strings ("YYYY-MM-DD") to avoid timezone shifts
// when JSON serializing JavaScript Date objects.
types.setTypeParser(1082, (value) => value);

let pool: Pool | null = null;

/** The pool is created on first use so the planner runs without a database. */
export function getPool(): Pool {
  if (pool) return pool;
  if (!process.env.DATABASE_URL) {
    throw new Error('DATABASE_URL must be set before using the plan run store');
  }
  pool = new Pool({ connectionString: process.env.DATABASE_URL });
  pool.on('error', (err) => {
    console.error('Unexpected DB pool error', err);
  });
  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  config: string | QueryConfig<unknown[]>,
  params?: unknown[]
): Promise<QueryResult<T>> {
  if (typeof config === 'string') {
    return getPool().query<T>(config, params);
  }
  return getPool().query<T>(config);
}

export async function withTransaction<T>(handler: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await handler(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}
