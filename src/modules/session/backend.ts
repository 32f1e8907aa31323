import { KeyValueBackend } from '../../types.js';
import type { RedisClient } from './redis-client.js';

/**
 * Redis-backed key-value storage for session records
 */
export class RedisKeyValueBackend implements KeyValueBackend {
  constructor(private readonly redisClient: RedisClient) {}

  async get(key: string): Promise<string | null> {
    return this.redisClient.get(key);
  }

  async setEx(key: string, ttlSeconds: number, value: string): Promise<void> {
    await this.redisClient.setEx(key, ttlSeconds, value);
  }

  async *scan(prefix: string): AsyncIterable<string> {
    for await (const key of this.redisClient.scanIterator({ MATCH: `${prefix}*`, COUNT: 100 })) {
      yield key;
    }
  }

  async del(key: string): Promise<void> {
    await this.redisClient.del(key);
  }
}
