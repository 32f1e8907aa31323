import { createClient } from 'redis';
import { RedisOptions } from '../../types.js';

export type RedisClient = ReturnType<typeof createClient>;

let redisClient: RedisClient | null = null;

/**
 * Create and connect to Redis client
 */
export async function getRedisClient(options?: RedisOptions): Promise<RedisClient | null> {
  if (redisClient && redisClient.isOpen) {
    return redisClient;
  }

  // Use Redis if configured, otherwise return null for in-memory storage
  if (!options?.url && !options?.socket?.host) {
    console.log('Redis not configured (missing REDIS_URL or REDIS_HOST), using in-memory storage');
    return null;
  }

  const client = createClient(options);

  client.on('error', (err: Error) => {
    console.error('Redis Client Error:', err);
  });

  client.on('ready', () => {
    console.log('Redis client ready');
  });

  try {
    await client.connect();
    await client.ping();
    redisClient = client;
    return redisClient;
  } catch (error) {
    console.error('Failed to connect to Redis:', error);
    console.log('Falling back to in-memory storage');
    if (client.isOpen) {
      await client.quit();
    }
    return null;
  }
}

/**
 * Close Redis connection
 */
export async function closeRedisClient(): Promise<void> {
  if (redisClient && redisClient.isOpen) {
    await redisClient.quit();
    redisClient = null;
    console.log('Redis connection closed');
  }
}
