/**
 * Local Introspection Component
 *
 * Cheap per-cycle host counters.
 */

export * from './local-introspection.js';
