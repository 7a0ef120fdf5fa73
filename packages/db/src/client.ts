import { Pool, type PoolConfig, type PoolClient } from 'pg';
import { AppError, ErrorCode, createLogger } from '@cad/shared';

const logger = createLogger({ name: 'db' });

let pool: Pool | null = null;

/** The part of a pg client the repositories rely on. */
export type Queryable = Pick<PoolClient, 'query'>;

export interface PoolOptions {
  connectionString: string;
  max?: number;
  /** Per-statement limit enforced by the server. */
  statementTimeoutMs?: number;
}

export function getPool(): Pool {
  if (!pool) throw new Error('Database pool not initialized. Call initPool first.');
  return pool;
}

export function initPool(options: PoolOptions): Pool {
  const config: PoolConfig = {
    connectionString: options.connectionString,
    max: options.max,
    statement_timeout: options.statementTimeoutMs,
  };
  pool = new Pool(config);
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Unexpected database pool error');
  });
  logger.info({ max: options.max, statementTimeoutMs: options.statementTimeoutMs }, 'Database pool initialized');
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info({}, 'Database pool closed');
  }
}

/** A checked-out connection, as far as a transaction needs one. */
export interface TransactionClient {
  query(text: string): Promise<unknown>;
  release(): void;
}

export interface ConnectionSource {
  connect(): Promise<TransactionClient>;
}

// Statement timeout, server shutdown and the whole connection exception class.
const UNAVAILABLE_SQLSTATES = new Set(['57014', '57P01', '57P02', '57P03']);

function sqlState(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function isStoreUnavailableError(err: unknown): boolean {
  const code = sqlState(err);
  if (code === undefined) return false;
  return UNAVAILABLE_SQLSTATES.has(code) || code.startsWith('08');
}

export async function runInTransaction<T>(
  source: ConnectionSource,
  fn: (client: TransactionClient) => Promise<T>,
): Promise<T> {
  let client: TransactionClient;
  try {
    client = await source.connect();
  } catch (err) {
    logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Could not acquire a database connection');
    throw new AppError(ErrorCode.STORE_UNAVAILABLE, 'Database unavailable');
  }

  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      logger.error(
        { err: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr) },
        'Rollback failed',
      );
    }
    if (isStoreUnavailableError(err)) {
      logger.error({ sqlState: sqlState(err) }, 'Database became unavailable during a transaction');
      throw new AppError(ErrorCode.STORE_UNAVAILABLE, 'Database unavailable');
    }
    throw err;
  } finally {
    client.release();
  }
}

export async function withTransaction<T>(fn: (client: TransactionClient) => Promise<T>): Promise<T> {
  return runInTransaction(getPool(), fn);
}

function isQueryable(tx: unknown): tx is Queryable {
  return typeof tx === 'object' && tx !== null && 'query' in tx && typeof tx.query === 'function';
}

/** Narrows the opaque transaction handle the domain passes around. */
export function asClient(tx: unknown): Queryable {
  if (!isQueryable(tx)) {
    throw new Error('Repository called without a database client');
  }
  return tx;
}
