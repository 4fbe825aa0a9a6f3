/**
 * Probe Type Definitions
 *
 * This module exports all TypeScript interfaces and types for the probe.
 */

export * from './probe.js';
export * from './battery.js';
export * from './cpu-power.js';
export * from './thermal.js';
export * from './snapshot.js';
export * from './probe-configuration.js';
