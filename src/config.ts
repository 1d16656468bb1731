import pg from 'pg';
import { ConfigurationError } from './errors.js';

export interface DatabaseConfig {
  connectionString: string;
  /** Upper bound on pooled connections, i.e. concurrent sessions. */
  poolSize: number;
  idleTimeoutMs: number;
  /** Log every statement through console.debug. */
  echo: boolean;
}

type Env = Readonly<Record<string, string | undefined>>;

function readInteger(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === '') return fallback;
  if (!/^\d+$/.test(raw) || Number.parseInt(raw, 10) < min) {
    throw new ConfigurationError(key, `${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  throw new ConfigurationError(key, `${key} must be a boolean, got "${raw}"`);
}

export function loadDatabaseConfig(env: Env = process.env): DatabaseConfig {
  const connectionString = env['DATABASE_URL']?.trim();
  if (!connectionString) {
    throw new ConfigurationError('DATABASE_URL');
  }
  return {
    connectionString,
    poolSize: readInteger(env, 'DATABASE_POOL_SIZE', 10, 1),
    idleTimeoutMs: readInteger(env, 'DATABASE_IDLE_TIMEOUT_MS', 10_000, 0),
    echo: readBoolean(env, 'DATABASE_ECHO', false),
  };
}

export function createPool(config: DatabaseConfig): pg.Pool {
  return new pg.Pool({
    connectionString: config.connectionString,
    max: config.poolSize,
    idleTimeoutMillis: config.idleTimeoutMs,
  });
}

/** Replaces the password of a connection URL with `***` for logging. */
export function maskConnectionString(url: string): string {
  return url.replace(/^([a-z][a-z0-9+.-]*:\/\/[^:/@]+):[^@]*@/i, '$1:***@');
}
