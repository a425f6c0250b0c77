/**
 * @repo/core - Domain logic for the community ledger
 *
 * Business rules live here; storage and logging come from @repo/database and
 * @repo/observability.
 */

export * from './billing/index.js';
