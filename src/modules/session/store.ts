import { KeyValueBackend, ProcessingStatus, SessionConfig } from '../../types.js';
import { isLaterDay, startOfDay } from './dates.js';
import { SerializationFault, deserializeStatus, serializeStatus } from './serialization.js';

export type SessionBackendMode = 'redis' | 'memory';

type BackendRead =
  | { kind: 'hit'; status: ProcessingStatus }
  | { kind: 'miss' }
  | { kind: 'unavailable' };

/**
 * Per-user ProcessingStatus records.
 *
 * The local Map is always written; when a durable backend is configured it is
 * read first and written best-effort. Any backend failure degrades the call to
 * the cache, so callers never see a backend error.
 *
 * Updates are read-modify-write without a lock: two processes writing the same
 * user concurrently resolve as last-writer-wins.
 */
export class SessionStore {
  private sessions = new Map<string, ProcessingStatus>();
  // Users whose latest backend write failed; only their cached copy outlives a miss
  private unsynced = new Set<string>();
  private readonly backend: KeyValueBackend | null;
  private readonly config: SessionConfig;

  constructor(config: SessionConfig, backend: KeyValueBackend | null = null) {
    this.config = config;
    this.backend = backend;
  }

  get mode(): SessionBackendMode {
    return this.backend ? 'redis' : 'memory';
  }

  private getStatusKey(userId: string): string {
    return `${this.config.keyPrefix}status:${userId}`;
  }

  private get statusKeyPrefix(): string {
    return `${this.config.keyPrefix}status:`;
  }

  private get ttlSeconds(): number {
    return Math.ceil(this.config.inactivityHorizonMs / 1000);
  }

  /**
   * Get the status for a user, creating it on first access. Applies the
   * daily usage reset before returning.
   */
  async getOrCreate(userId: string): Promise<ProcessingStatus> {
    const read = await this.readFromBackend(userId);
    let status: ProcessingStatus | null;

    if (read.kind === 'hit') {
      status = read.status;
      this.sessions.set(userId, status);
      this.unsynced.delete(userId);
    } else {
      status = this.takeCached(userId, read.kind === 'miss');
      if (!status) {
        status = this.createStatus(userId);
        console.log(`🆕 Created new session for ${userId}`);
      }
      // Covers a fresh status and a cached one the backend no longer holds
      await this.save(status);
    }

    if (isLaterDay(new Date(), status.usageResetDate)) {
      status.dailyUsage = 0;
      status.usageResetDate = startOfDay(new Date());
      console.log(`🌅 Reset daily usage for ${userId}`);
      await this.save(status);
    }

    return status;
  }

  /**
   * Upsert a status. The cached copy stays authoritative for this process
   * when the backend write fails.
   */
  async save(status: ProcessingStatus): Promise<void> {
    this.sessions.set(status.userId, status);

    if (!this.backend) {
      return;
    }

    try {
      await this.backend.setEx(this.getStatusKey(status.userId), this.ttlSeconds, serializeStatus(status));
      this.unsynced.delete(status.userId);
    } catch (error) {
      this.unsynced.add(status.userId);
      console.error(`⚠️  Session backend unavailable, keeping ${status.userId} in memory only:`, error);
    }
  }

  /**
   * Delete a session completely
   */
  async delete(userId: string): Promise<void> {
    this.sessions.delete(userId);
    this.unsynced.delete(userId);

    if (!this.backend) {
      return;
    }

    try {
      await this.backend.del(this.getStatusKey(userId));
    } catch (error) {
      console.error(`⚠️  Session backend unavailable, could not delete ${userId}:`, error);
    }
  }

  /**
   * Remove every status idle for longer than the horizon. Returns the number
   * of distinct users removed.
   */
  async cleanupInactive(horizonMs: number = this.config.inactivityHorizonMs): Promise<number> {
    const cutoff = Date.now() - horizonMs;
    const removed = new Set<string>();

    if (this.backend) {
      await this.sweepBackend(this.backend, cutoff, removed);
    }

    for (const [userId, status] of this.sessions.entries()) {
      if (status.lastActivity.getTime() >= cutoff) {
        continue;
      }
      this.sessions.delete(userId);
      this.unsynced.delete(userId);
      // A record another process kept active is not a removal
      if (!removed.has(userId) && !(await this.backendHolds(userId))) {
        removed.add(userId);
      }
    }

    console.log(`🧹 Session cleanup completed. Removed ${removed.size} inactive sessions.`);
    return removed.size;
  }

  private async sweepBackend(backend: KeyValueBackend, cutoff: number, removed: Set<string>): Promise<void> {
    const prefix = this.statusKeyPrefix;

    try {
      for await (const key of backend.scan(prefix)) {
        const userId = key.slice(prefix.length);

        try {
          const raw = await backend.get(key);
          if (!raw) {
            continue;
          }

          const status = deserializeStatus(raw);
          if (status.lastActivity.getTime() < cutoff) {
            await backend.del(key);
            this.sessions.delete(userId);
            this.unsynced.delete(userId);
            removed.add(userId);
            console.log(`🗑️  Removed inactive session ${userId}`);
          }
        } catch (error) {
          console.error(`Error processing session key ${key}, skipping:`, error);
        }
      }
    } catch (error) {
      console.error('⚠️  Session backend scan failed, sweeping local cache only:', error);
    }
  }

  /**
   * Cached status usable in place of a backend read. After a backend miss the
   * cache is trusted only when its last write never reached the backend;
   * otherwise the record expired or was swept and the entry is evicted. Idle
   * entries past the horizon are evicted either way.
   */
  private takeCached(userId: string, backendMissed: boolean): ProcessingStatus | null {
    const cached = this.sessions.get(userId);
    if (!cached) {
      return null;
    }

    const idle = cached.lastActivity.getTime() < Date.now() - this.config.inactivityHorizonMs;
    if (idle || (backendMissed && !this.unsynced.has(userId))) {
      this.sessions.delete(userId);
      this.unsynced.delete(userId);
      return null;
    }

    return cached;
  }

  private async backendHolds(userId: string): Promise<boolean> {
    if (!this.backend) {
      return false;
    }

    try {
      return (await this.backend.get(this.getStatusKey(userId))) !== null;
    } catch (error) {
      console.error(`⚠️  Session backend unavailable, counting ${userId} as removed locally:`, error);
      return false;
    }
  }

  private async readFromBackend(userId: string): Promise<BackendRead> {
    if (!this.backend) {
      return { kind: 'unavailable' };
    }

    let raw: string | null;
    try {
      raw = await this.backend.get(this.getStatusKey(userId));
    } catch (error) {
      console.error(`⚠️  Session backend unavailable, using cached session for ${userId}:`, error);
      return { kind: 'unavailable' };
    }

    if (!raw) {
      return { kind: 'miss' };
    }

    try {
      return { kind: 'hit', status: deserializeStatus(raw) };
    } catch (error) {
      if (error instanceof SerializationFault) {
        console.error(`❌ Discarding unreadable session for ${userId}: ${error.message}`, error.issues);
        return { kind: 'miss' };
      }
      throw error;
    }
  }

  private createStatus(userId: string): ProcessingStatus {
    const now = new Date();

    return {
      userId,
      dailyUsage: 0,
      usageResetDate: startOfDay(now),
      lastActivity: now,
      isBatchMode: false,
      currentBatch: null
    };
  }
}
