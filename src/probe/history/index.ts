/**
 * Snapshot History Component
 */

export * from './snapshot-history.js';
