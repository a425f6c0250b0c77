export * from './schema.js';
export * as schema from './schema.js';
export * from './client.js';
export * from './context.js';
export * from './errors.js';
export { applyMigrations, MIGRATIONS_FOLDER } from './migrate.js';
