import type pg from 'pg';
import { createPool, loadDatabaseConfig, maskConnectionString } from './config.js';
import type { DatabaseConfig } from './config.js';
import { PostgresGateway } from './gateway/postgres-gateway.js';
import type { GatewayHooks } from './types.js';

export interface DataContextOptions {
  /** Falls back to loadDatabaseConfig() when neither config nor pool is given. */
  config?: DatabaseConfig;
  /** An existing pool; the context will not end it on close(). */
  pool?: pg.Pool;
  hooks?: GatewayHooks;
}

export interface DataContext {
  readonly pool: pg.Pool;
  readonly hooks: GatewayHooks;
  /** A new session for one unit of work. The caller must close() it. */
  openSession(): PostgresGateway;
  /** Runs fn with a fresh session and always closes it, rolling back open frames. */
  withSession<T>(fn: (session: PostgresGateway) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

/**
 * Composition root: built once at startup and passed by reference to whatever
 * needs sessions. Holds no per-request state.
 */
export function createDataContext(options: DataContextOptions = {}): DataContext {
  const ownsPool = options.pool === undefined;
  const config = options.config ?? (ownsPool ? loadDatabaseConfig() : undefined);
  const pool = options.pool ?? createPool(config ?? loadDatabaseConfig());

  const hooks: GatewayHooks = {
    ...(config?.echo
      ? { onQuery: (sql: string, params: readonly unknown[]) => console.debug('[derived-repo]', sql, params) }
      : {}),
    ...options.hooks,
  };
  if (config?.echo) {
    console.debug(`[derived-repo] using ${maskConnectionString(config.connectionString)}`);
  }

  const openSession = (): PostgresGateway => new PostgresGateway({ pool, hooks });

  return {
    pool,
    hooks,
    openSession,
    async withSession<T>(fn: (session: PostgresGateway) => Promise<T>): Promise<T> {
      const session = openSession();
      try {
        return await fn(session);
      } finally {
        await session.close();
      }
    },
    async close(): Promise<void> {
      if (ownsPool) await pool.end();
    },
  };
}
