import { SessionConfig } from '../../types.js';
import { config } from '../../config.js';

/**
 * Get session configuration (reads environment variables dynamically)
 */
export function getSessionConfig(): SessionConfig {
  return {
    // Images a user may process per calendar day
    dailyLimit: config.DAILY_CARD_LIMIT,

    // Sessions idle for longer than this are swept by maintenance
    inactivityHorizonMs: config.SESSION_INACTIVITY_HOURS * 60 * 60 * 1000,

    keyPrefix: process.env.SESSION_KEY_PREFIX || 'cardbot:',

    // Redis configuration
    redisOptions: {
      url: process.env.REDIS_URL,
      username: process.env.REDIS_USERNAME || 'default',
      password: process.env.REDIS_PASSWORD,
      socket: {
        host: process.env.REDIS_HOST,
        port: parseInt(process.env.REDIS_PORT || '6379', 10),
        connectTimeout: 5000,
        // Give up after a few attempts so startup falls back to memory
        reconnectStrategy: (retries: number) =>
          retries > 3 ? new Error('Redis unreachable') : Math.min(retries * 200, 1000)
      }
    }
  };
}
