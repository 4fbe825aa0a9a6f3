/**
 * Telemetry Aggregator Component
 *
 * One polling cycle, from probes to an immutable snapshot.
 */

export * from './aggregator.js';
export * from './derived-metrics.js';
export * from './probe-commands.js';
