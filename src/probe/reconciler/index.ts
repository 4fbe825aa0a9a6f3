/**
 * Source Reconciler Component
 *
 * Priority merge of partial records into complete domain records.
 */

export * from './source-reconciler.js';
export * from './domain-reconcilers.js';
