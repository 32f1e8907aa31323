/**
 * Maintenance Module - Main Export
 */

export { SessionMaintenanceManager } from './session-cleanup.js';
export type { MaintenanceReport, MaintenanceStatus } from './session-cleanup.js';
