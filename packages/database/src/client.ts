import pg from "pg";
import { readFile } from "node:fs/promises";
import { optionalEnv, intEnv } from "@mailsync/shared";

const { Pool } = pg;

let pool: pg.Pool | null = null;

// A sync run issues one statement at a time; a small pool is plenty
const DEFAULT_POOL_MAX = 2;
const DEFAULT_IDLE_TIMEOUT_MS = 30000;
const DEFAULT_CONN_TIMEOUT_MS = 10000;

function getPoolConfig(): pg.PoolConfig {
  const max = intEnv("PG_POOL_MAX", DEFAULT_POOL_MAX);
  const idleTimeoutMillis = intEnv("PG_IDLE_TIMEOUT_MS", DEFAULT_IDLE_TIMEOUT_MS);
  const connectionTimeoutMillis = intEnv("PG_CONN_TIMEOUT_MS", DEFAULT_CONN_TIMEOUT_MS);

  return {
    max,
    idleTimeoutMillis,
    connectionTimeoutMillis,
    keepAlive: true,
  };
}

export function getPool(): pg.Pool {
  if (!pool) {
    const poolConfig = getPoolConfig();
    const url = optionalEnv("DATABASE_URL", "");

    if (url) {
      pool = new Pool({
        connectionString: url,
        ...poolConfig,
      });
      return pool;
    }

    pool = new Pool({
      host: optionalEnv("DATABASE_HOST", "localhost"),
      port: intEnv("DATABASE_PORT", 5432),
      database: optionalEnv("DATABASE_NAME", "postgres"),
      user: optionalEnv("DATABASE_USERNAME", "postgres"),
      password: optionalEnv("DATABASE_PASSWORD", ""),
      ...poolConfig,
    });
  }
  return pool;
}

export async function query<T extends pg.QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<pg.QueryResult<T>> {
  const client = getPool();
  return client.query<T>(text, params);
}

const SCHEMA_FILES = ["001_sync_state.sql"];

/**
 * Create the sync tables if they do not exist. Statements are idempotent,
 * so this is safe to run on every start.
 */
export async function ensureSchema(): Promise<void> {
  for (const file of SCHEMA_FILES) {
    const sql = await readFile(new URL(`../sql/${file}`, import.meta.url), "utf8");
    await query(sql);
  }
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
