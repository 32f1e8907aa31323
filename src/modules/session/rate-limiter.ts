import { ProcessingStatus } from '../../types.js';
import { SessionStore } from './store.js';

/**
 * True while the user is still under the daily limit
 */
export const checkRateLimit = (status: ProcessingStatus, limit: number): boolean =>
  status.dailyUsage < limit;

export class RateLimiter {
  constructor(
    private readonly store: SessionStore,
    readonly dailyLimit: number
  ) {}

  async check(userId: string): Promise<boolean> {
    const status = await this.store.getOrCreate(userId);
    return checkRateLimit(status, this.dailyLimit);
  }

  async remaining(userId: string): Promise<number> {
    const status = await this.store.getOrCreate(userId);
    return Math.max(0, this.dailyLimit - status.dailyUsage);
  }

  /**
   * Count one processed image. Call after extraction returned at least one
   * card, never per inbound message.
   */
  async increment(userId: string): Promise<ProcessingStatus> {
    const status = await this.store.getOrCreate(userId);
    status.dailyUsage += 1;
    status.lastActivity = new Date();
    await this.store.save(status);

    console.log(`📈 Usage for ${userId}: ${status.dailyUsage}/${this.dailyLimit}`);
    return status;
  }
}
