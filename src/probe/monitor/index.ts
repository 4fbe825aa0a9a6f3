/**
 * Telemetry Monitor Component
 */

export * from './telemetry-monitor.js';
