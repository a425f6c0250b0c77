import { fileURLToPath } from 'node:url';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { migrate } from 'drizzle-orm/node-postgres/migrator';
import type { DatabaseSchema } from './client.js';

/** drizzle-kit output: numbered SQL files and `meta/_journal.json` */
export const MIGRATIONS_FOLDER = fileURLToPath(new URL('../migrations', import.meta.url));

/**
 * Apply pending migrations from the journal. drizzle records applied ones in
 * `drizzle.__drizzle_migrations` and runs the pending batch in one transaction.
 */
export async function applyMigrations(db: NodePgDatabase<DatabaseSchema>): Promise<void> {
  await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
}
