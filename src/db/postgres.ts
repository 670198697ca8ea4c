import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import type { PipelineConfig } from '../config/pipelineConfig';
import { ConfigurationError, StorageBusyError } from '../types/errors';

export type SqlRunner = <R extends QueryResultRow>(text: string, params?: unknown[]) => Promise<QueryResult<R>>;

// lock_not_available, deadlock_detected, serialization_failure
const BUSY_SQLSTATES = new Set(['55P03', '40P01', '40001']);

export const createPostgresPool = (config: PipelineConfig): Pool => {
  if (!config.databaseUrl) {
    throw new ConfigurationError(['POSTGRES_URL/DATABASE_URL is not set']);
  }
  return new Pool({
    connectionString: config.databaseUrl,
    connectionTimeoutMillis: config.lockTimeoutMs,
  });
};

export const closePostgresPool = async (pool: Pool) => {
  await pool.end();
};

export const poolRunner = (pool: Pool): SqlRunner => (text, params) => pool.query(text, params);

export const clientRunner = (client: PoolClient): SqlRunner => (text, params) => client.query(text, params);

const sqlStateOf = (error: unknown): string | null =>
  typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
    ? error.code
    : null;

export const isBusyError = (error: unknown): boolean => {
  const sqlState = sqlStateOf(error);
  if (sqlState && BUSY_SQLSTATES.has(sqlState)) return true;
  // pg-pool rejects checkouts that outlive connectionTimeoutMillis with this message.
  return error instanceof Error && error.message.includes('timeout exceeded when trying to connect');
};

export const toStorageError = (error: unknown): unknown =>
  isBusyError(error)
    ? new StorageBusyError(`Entity store busy: ${error instanceof Error ? error.message : String(error)}`, error)
    : error;

/**
 * Runs `work` inside BEGIN/COMMIT on a dedicated client. Lock waits are
 * bounded by `lock_timeout`; a busy database surfaces as StorageBusyError and
 * every failure rolls the whole unit back.
 */
export const withTransaction = async <T>(
  pool: Pool,
  lockTimeoutMs: number,
  work: (client: PoolClient) => Promise<T>
): Promise<T> => {
  const client = await pool.connect().catch((error: unknown) => {
    throw toStorageError(error);
  });

  // Set when the connection itself is unusable; release(error) destroys it instead of pooling it.
  let brokenConnection: Error | undefined;
  try {
    await client.query('BEGIN');
    await client.query("SELECT set_config('lock_timeout', $1, true)", [`${Math.trunc(lockTimeoutMs)}ms`]);
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      brokenConnection = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
    }
    throw toStorageError(error);
  } finally {
    client.release(brokenConnection);
  }
};
