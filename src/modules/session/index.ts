// Session module exports
export { SessionStore } from './store.js';
export type { SessionBackendMode } from './store.js';
export { RateLimiter, checkRateLimit } from './rate-limiter.js';
export { BatchCoordinator, successRate } from './batch.js';
export { RedisKeyValueBackend } from './backend.js';
export { SerializationFault, serializeStatus, deserializeStatus } from './serialization.js';
export { getSessionConfig } from './config.js';
export { getRedisClient, closeRedisClient } from './redis-client.js';
export type { RedisClient } from './redis-client.js';

// Re-export types for convenience
export type {
  ProcessingStatus,
  BatchResult,
  SessionConfig,
  KeyValueBackend
} from '../../types.js';
