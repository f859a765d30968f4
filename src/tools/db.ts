import pg from 'pg';
import type { SQLResult, SqlValue } from '../types.js';
import { ExecutionError, errorMessage } from '../errors.js';

const { Pool } = pg;

/**
 * Connection pools, one per connection string, shared across all modules.
 */
const pools = new Map<string, pg.Pool>();

/**
 * Gets or creates the pool for a connection string.
 */
export function getPool(connectionString: string): pg.Pool {
  let pool = pools.get(connectionString);
  if (!pool) {
    pool = new Pool({
      connectionString,
      max: 5,
      idleTimeoutMillis: 30000,
    });
    pools.set(connectionString, pool);
  }
  return pool;
}

/**
 * Closes all connection pools.
 * Should be called during application shutdown to clean up resources.
 *
 * @example
 * ```typescript
 * process.on('SIGINT', async () => {
 *   await closeAllPools();
 *   process.exit(0);
 * });
 * ```
 */
export async function closeAllPools(): Promise<void> {
  const open = [...pools.values()];
  pools.clear();
  await Promise.all(open.map(pool => pool.end()));
}

export interface ExecuteOptions {
  timeoutMs: number;
  /** Rows beyond this are dropped from the result */
  maxRows: number;
  /** Aborted when the caller stops waiting; no work may continue after it */
  signal?: AbortSignal;
}

/**
 * Runs sandbox-approved SQL. Failures reject with ExecutionError.
 */
export interface SqlExecutor {
  execute(sql: string, options: ExecuteOptions): Promise<SQLResult>;
}

/**
 * PostgreSQL executor. Every statement runs inside a READ ONLY transaction
 * with a local statement_timeout.
 *
 * On abort, a connection still being acquired is released as soon as it
 * arrives and never used; a connection with a statement running is destroyed,
 * which ends the statement with it.
 */
export class PgExecutor implements SqlExecutor {
  constructor(private readonly pool: pg.Pool) {}

  async execute(sql: string, options: ExecuteOptions): Promise<SQLResult> {
    const { signal } = options;
    const client = await this.connect(signal);
    const startTime = Date.now();
    const timeoutMs = Math.max(1, Math.floor(options.timeoutMs));

    let released = false;
    const release = (destroy: boolean): void => {
      if (released) return;
      released = true;
      client.release(destroy);
    };
    const onAbort = (): void => {
      console.warn('   ⚠️  Execution aborted, closing the connection');
      release(true);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      await client.query('BEGIN READ ONLY');
      await client.query(`SET LOCAL statement_timeout = ${timeoutMs}`);
      signal?.throwIfAborted();
      const result = await client.query<SqlValue[]>({ text: sql, rowMode: 'array' });
      await client.query('COMMIT');

      const rows = result.rows.slice(0, options.maxRows);
      return {
        columns: result.fields.map(f => f.name),
        rows,
        rowCount: rows.length,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      if (!released) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          console.error('   ❌ Rollback failed:', errorMessage(rollbackError));
        }
      }
      throw new ExecutionError(`SQL execution failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      signal?.removeEventListener('abort', onAbort);
      release(false);
    }
  }

  /**
   * Waits for a pooled connection unless the signal fires first. A
   * connection that arrives after the abort goes straight back to the pool.
   */
  private connect(signal?: AbortSignal): Promise<pg.PoolClient> {
    const pending = this.pool.connect();
    if (!signal) return pending;

    return new Promise<pg.PoolClient>((resolve, reject) => {
      let settled = false;
      const onAbort = (): void => {
        if (settled) return;
        settled = true;
        reject(new ExecutionError('Execution aborted while waiting for a database connection'));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      pending.then(
        client => {
          signal.removeEventListener('abort', onAbort);
          if (settled) {
            client.release();
            return;
          }
          settled = true;
          resolve(client);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          if (settled) {
            console.error('   ❌ Connection failed after abort:', errorMessage(error));
            return;
          }
          settled = true;
          reject(error);
        }
      );

      if (signal.aborted) onAbort();
    });
  }
}
