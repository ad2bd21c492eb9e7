/**
 * PostgreSQL pool for the IPAM database
 *
 * The IPAM schema is owned by the IPAM service; this package only reads it.
 */

import { Pool, PoolClient, PoolConfig } from 'pg';

export interface DatabaseOptions {
  connectionString: string;
  /** Per-statement timeout in ms, 0 disables it */
  statementTimeoutMs?: number;
  max?: number;
  applicationName?: string;
}

/**
 * Query surface shared by Pool and PoolClient
 */
export type Queryable = Pick<PoolClient, 'query'>;

export function createPool(options: DatabaseOptions): Pool {
  const config: PoolConfig = {
    connectionString: options.connectionString,
    max: options.max ?? 2,
    application_name: options.applicationName ?? 'ipam-usage-report',
  };

  if (options.statementTimeoutMs && options.statementTimeoutMs > 0) {
    config.statement_timeout = options.statementTimeoutMs;
  }

  return new Pool(config);
}

/**
 * Runs `fn` inside a read-only transaction on a single pooled client, so
 * every query sees the same snapshot
 */
export async function withReadOnlyTransaction<T>(
  pool: Pool,
  fn: (client: PoolClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  let result: T;
  try {
    await client.query('BEGIN TRANSACTION ISOLATION LEVEL REPEATABLE READ READ ONLY');
    result = await fn(client);
    await client.query('COMMIT');
  } catch (error) {
    let releaseError: Error | boolean = error instanceof Error ? error : true;
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      releaseError = rollbackError instanceof Error ? rollbackError : true;
    }
    // pg destroys a client released with an error instead of pooling it
    client.release(releaseError);
    throw error;
  }

  client.release();
  return result;
}
