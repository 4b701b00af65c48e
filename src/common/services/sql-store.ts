/**
 * Warehouse Store Service
 *
 * Read-only PostgreSQL connector behind the StoreClient interface.
 * Every question issues at most a handful of queries, so a small pool is
 * shared for the server lifetime and closed on shutdown.
 */

import { Pool, type PoolConfig } from 'pg';
import type { StoreClient, StoreQueryResult, Row } from '../types.js';
import { STORE_CONFIG } from '../constants.js';
import { logDebug, logError } from './logger.js';
import { errorMessage } from '../utils/timeout.js';
import { StoreQueryError } from '../../console/orchestrator/errors.js';

/**
 * Build pg pool settings from STORE_CONFIG
 */
export function buildPoolConfig(): PoolConfig {
  return {
    host: STORE_CONFIG.HOST,
    port: STORE_CONFIG.PORT,
    database: STORE_CONFIG.DATABASE,
    user: STORE_CONFIG.USER,
    password: STORE_CONFIG.PASSWORD,
    max: STORE_CONFIG.POOL_MAX,
    connectionTimeoutMillis: STORE_CONFIG.CONNECTION_TIMEOUT_MS,
    query_timeout: STORE_CONFIG.QUERY_TIMEOUT_MS,
    statement_timeout: STORE_CONFIG.QUERY_TIMEOUT_MS,
    ssl: STORE_CONFIG.SSL ? { rejectUnauthorized: false } : false,
  };
}

export class PostgresStore implements StoreClient {
  private pool: Pool;

  constructor(config: PoolConfig = buildPoolConfig()) {
    this.pool = new Pool(config);

    // Idle client errors surface here instead of crashing the process
    this.pool.on('error', (err) => {
      logError('Idle warehouse client error', { error: err.message });
    });
  }

  async query(sql: string, params: readonly unknown[] = []): Promise<StoreQueryResult> {
    const startTime = Date.now();
    try {
      const result = await this.pool.query<Row>(sql, [...params]);
      logDebug('Store query completed', {
        row_count: result.rows.length,
        duration_ms: Date.now() - startTime,
      });
      return {
        rows: result.rows,
        rowCount: result.rows.length,
        executedQuery: sql,
      };
    } catch (error) {
      throw new StoreQueryError(`Warehouse query failed: ${errorMessage(error)}`, undefined, sql, {
        cause: error,
      });
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

// =============================================================================
// SINGLETON ACCESS
// =============================================================================

let storeInstance: PostgresStore | null = null;

/**
 * Get or create the shared warehouse store
 */
export function getStore(): PostgresStore {
  if (!storeInstance) {
    storeInstance = new PostgresStore();
  }
  return storeInstance;
}

/**
 * Close the shared store, if one was created
 */
export async function closeStore(): Promise<void> {
  if (storeInstance) {
    const store = storeInstance;
    storeInstance = null;
    await store.close();
  }
}
