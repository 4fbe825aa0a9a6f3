/**
 * TTL Cache Implementation
 *
 * Holds the last known good record of one domain and decides, per call,
 * whether to serve it, refresh it, keep serving it after a failed refresh,
 * or synthesize a fallback when nothing good has been seen yet. A fallback
 * is cached like a probed value, so a missing tool is spawned once per
 * window rather than on every call.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { Clock } from '../clock.js';
import { ProbeConfigurationError, ProbeContractError } from '../errors.js';
import type { ReadingStatus } from '../types/index.js';
import { describeSourceReport, type RefreshOutcome } from './domain-collector.js';

const log = createSubsystemLogger('probe/ttl-cache');

export interface CachedEntry<T> {
  value: T;
  /** Clock time of the refresh (or fallback synthesis) that stored the value */
  capturedAt: number;
  origin: 'probe' | 'fallback';
}

export interface CacheReading<T> {
  value: T;
  status: ReadingStatus;
  /** Set only for values that came from a probe */
  capturedAt?: number;
}

export interface TTLCacheOptions<T, C> {
  domain: string;
  ttlMs: number;
  clock: Clock;
  refresh: () => Promise<RefreshOutcome<T>>;
  /** Conservative stand-in used until the first successful refresh */
  fallback: (context: C) => T;
  /** How long a fallback is served before the next attempt; defaults to ttlMs */
  fallbackTtlMs?: number;
}

export class TTLCache<T, C = void> {
  private readonly options: TTLCacheOptions<T, C>;
  private entry?: CachedEntry<T>;
  private refreshCount = 0;

  constructor(options: TTLCacheOptions<T, C>) {
    if (!(options.ttlMs > 0)) {
      throw new ProbeConfigurationError([`${options.domain}: ttl must be greater than zero`]);
    }
    if (options.fallbackTtlMs !== undefined && !(options.fallbackTtlMs > 0)) {
      throw new ProbeConfigurationError([`${options.domain}: fallback ttl must be greater than zero`]);
    }
    this.options = options;
  }

  get ttlMs(): number {
    return this.options.ttlMs;
  }

  /** Number of times the underlying pipeline has been invoked */
  get refreshes(): number {
    return this.refreshCount;
  }

  peek(): CachedEntry<T> | undefined {
    return this.entry;
  }

  async getOrRefresh(context: C): Promise<CacheReading<T>> {
    const now = this.options.clock.now();
    const current = this.entry;

    if (current && now - current.capturedAt < this.lifetimeOf(current)) {
      return current.origin === 'probe'
        ? { value: current.value, status: 'cached', capturedAt: current.capturedAt }
        : { value: current.value, status: 'fallback' };
    }

    this.refreshCount += 1;
    const outcome = await this.runRefresh();

    if (outcome.ok) {
      const capturedAt = this.options.clock.now();
      this.entry = { value: outcome.value, capturedAt, origin: 'probe' };
      log.trace('Domain refreshed', { domain: this.options.domain, capturedAt });
      return { value: outcome.value, status: 'fresh', capturedAt };
    }

    log.warn('Domain refresh failed', {
      domain: this.options.domain,
      sources: outcome.reports.map(describeSourceReport),
      serving: current?.origin === 'probe' ? 'stale' : 'fallback',
    });

    // the timestamp is left alone so the next call retries
    if (current?.origin === 'probe') {
      return { value: current.value, status: 'stale', capturedAt: current.capturedAt };
    }

    const value = this.options.fallback(context);
    this.entry = { value, capturedAt: this.options.clock.now(), origin: 'fallback' };
    return { value, status: 'fallback' };
  }

  private lifetimeOf(entry: CachedEntry<T>): number {
    return entry.origin === 'fallback' ? (this.options.fallbackTtlMs ?? this.options.ttlMs) : this.options.ttlMs;
  }

  private async runRefresh(): Promise<RefreshOutcome<T>> {
    try {
      return await this.options.refresh();
    } catch (error) {
      if (error instanceof ProbeConfigurationError || error instanceof ProbeContractError) {
        throw error;
      }
      log.error('Domain pipeline threw', {
        domain: this.options.domain,
        error: error instanceof Error ? error.message : String(error),
      });
      return { ok: false, reports: [] };
    }
  }
}
