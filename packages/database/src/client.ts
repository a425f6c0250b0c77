import pg from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import * as schema from './schema.js';

export type DatabaseSchema = typeof schema;
/** Any drizzle Postgres driver over the ledger schema: node-postgres in production, PGlite in tests */
export type Database = PgDatabase<PgQueryResultHKT, DatabaseSchema>;
export type DatabaseTransaction = Parameters<Parameters<Database['transaction']>[0]>[0];
export type DatabaseOrTransaction = Database | DatabaseTransaction;

export type DatabaseOptions = {
  connectionString: string;
  maxConnections?: number;
  /** Upper bound on waiting for a pooled connection before the pool gives up. */
  connectionTimeoutMillis?: number;
};

export type DatabaseHandle = {
  db: NodePgDatabase<DatabaseSchema>;
  pool: pg.Pool;
  close: () => Promise<void>;
};

const DEFAULT_MAX_CONNECTIONS = 10;
const DEFAULT_CONNECTION_TIMEOUT_MS = 5_000;

export function createDatabase(options: DatabaseOptions): DatabaseHandle {
  if (!options.connectionString.startsWith('postgres')) {
    throw new Error('Database connection string must start with "postgres://" or "postgresql://"');
  }

  const pool = new pg.Pool({
    connectionString: options.connectionString,
    max: options.maxConnections ?? DEFAULT_MAX_CONNECTIONS,
    connectionTimeoutMillis: options.connectionTimeoutMillis ?? DEFAULT_CONNECTION_TIMEOUT_MS,
  });

  return {
    db: drizzle(pool, { schema }),
    pool,
    close: () => pool.end(),
  };
}

// Global singleton so hot-reloading dev servers and scripts share one pool
const globalForDatabase = globalThis as unknown as {
  ledgerDatabase: DatabaseHandle | undefined;
};

export function getDatabase(env: NodeJS.ProcessEnv = process.env): DatabaseHandle {
  if (globalForDatabase.ledgerDatabase) {
    return globalForDatabase.ledgerDatabase;
  }

  const connectionString = env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL must be set to connect to the ledger database');
  }

  const handle = createDatabase({
    connectionString,
    connectionTimeoutMillis:
      Number.parseInt(env.DATABASE_CONNECTION_TIMEOUT_MS ?? '', 10) || DEFAULT_CONNECTION_TIMEOUT_MS,
  });
  globalForDatabase.ledgerDatabase = handle;
  return handle;
}
