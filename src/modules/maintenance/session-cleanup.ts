/**
 * Session Maintenance Module
 *
 * Periodically sweeps sessions that have been inactive for longer than the
 * configured horizon. Runs outside the request path.
 */

import type { SessionStore } from '../session/index.js';

// Largest delay setInterval accepts before it falls back to 1 ms
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export interface MaintenanceReport {
  timestamp: Date;
  sessionsRemoved: number;
  durationMs: number;
  errors: string[];
}

export interface MaintenanceStatus {
  isRunning: boolean;
  lastReport: MaintenanceReport | null;
}

export class SessionMaintenanceManager {
  private intervalId: NodeJS.Timeout | null = null;
  private lastReport: MaintenanceReport | null = null;

  constructor(
    private readonly store: SessionStore,
    private readonly horizonMs: number
  ) {}

  /**
   * Start automatic maintenance with configurable interval
   */
  startMaintenance(intervalHours: number): void {
    if (this.intervalId) {
      console.log('⚠️  Session maintenance already running');
      return;
    }

    if (!Number.isFinite(intervalHours) || intervalHours <= 0) {
      console.error(`❌ Invalid maintenance interval ${intervalHours} hours, session maintenance not started`);
      return;
    }

    const intervalMs = Math.min(intervalHours * 60 * 60 * 1000, MAX_TIMER_DELAY_MS);
    if (intervalMs === MAX_TIMER_DELAY_MS) {
      console.warn(`⚠️  Maintenance interval capped at ${MAX_TIMER_DELAY_MS} ms`);
    }

    this.intervalId = setInterval(() => {
      void this.runMaintenance();
    }, intervalMs);
    this.intervalId.unref();

    console.log(`🧹 Session maintenance started - running every ${intervalHours} hours`);
  }

  /**
   * Stop automatic maintenance
   */
  stopMaintenance(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      console.log('🛑 Session maintenance stopped');
    }
  }

  /**
   * Run maintenance tasks manually
   */
  async runMaintenance(): Promise<MaintenanceReport> {
    console.log('🧹 Starting session maintenance...');
    const startTime = Date.now();

    const report: MaintenanceReport = {
      timestamp: new Date(startTime),
      sessionsRemoved: 0,
      durationMs: 0,
      errors: []
    };

    try {
      report.sessionsRemoved = await this.store.cleanupInactive(this.horizonMs);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      report.errors.push(errorMessage);
      console.error('❌ Session maintenance error:', error);
    }

    report.durationMs = Date.now() - startTime;
    this.lastReport = report;

    console.log('✅ Session maintenance completed:', {
      sessionsRemoved: report.sessionsRemoved,
      duration: `${report.durationMs}ms`
    });

    return report;
  }

  /**
   * Get maintenance status
   */
  getStatus(): MaintenanceStatus {
    return {
      isRunning: this.intervalId !== null,
      lastReport: this.lastReport
    };
  }
}
