/**
 * Probe Configuration
 *
 * Defaults, merging and validation of the probe configuration.
 */

export * from './configuration.js';
