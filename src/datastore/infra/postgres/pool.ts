import pg from 'pg';
import type { PoolClient, PoolConfig } from 'pg';
import type { Logger } from '../../../core/logging/index.js';

let int8Configured = false;

// BIGINT columns (file sizes) come back as strings by default.
function configureGlobalParsers(): void {
  if (int8Configured) {
    return;
  }
  pg.types.setTypeParser(pg.types.builtins.INT8, (value: string) => Number.parseInt(value, 10));
  int8Configured = true;
}

export interface PostgresHelpers {
  withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T>;
  withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T>;
  closePool(): Promise<void>;
}

export function createPostgresPool(config: PoolConfig, logger: Logger): PostgresHelpers {
  configureGlobalParsers();
  const pool = new pg.Pool(config);

  pool.on('error', (err: Error) => {
    logger.error({ err }, 'Unexpected error on idle Postgres client');
  });

  async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await pool.connect();
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    return withConnection(async (client) => {
      await client.query('BEGIN');
      try {
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
      } catch (err) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackErr) {
          logger.error({ err: rollbackErr }, 'Failed to roll back transaction');
        }
        throw err;
      }
    });
  }

  async function closePool(): Promise<void> {
    await pool.end();
  }

  return { withConnection, withTransaction, closePool };
}
