/**
 * Field Extractors
 *
 * Pure text-to-partial-record rules, one per (source, domain).
 */

export * from './battery-extractors.js';
export * from './cpu-power-extractor.js';
export * from './thermal-extractors.js';
export * from './topology-extractor.js';
