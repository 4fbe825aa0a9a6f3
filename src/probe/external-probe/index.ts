/**
 * External Probe Component
 *
 * Spawns diagnostic command-line tools with a bounded wait.
 */

export * from './external-probe.js';
