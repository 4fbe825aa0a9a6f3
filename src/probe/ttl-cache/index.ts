/**
 * TTL Cache Component
 *
 * Per-domain probe pipelines behind a time-to-live.
 */

export * from './domain-collector.js';
export * from './ttl-cache.js';
