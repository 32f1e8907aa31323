/**
 * Database module exports
 */

export { executeQuery, closeDatabasePool, testDatabaseConnection } from './client.js';

// Card persistence
export { PostgresCardRepository } from './card-repository.js';
export type { QueryFn } from './card-repository.js';
