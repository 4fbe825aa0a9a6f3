/**
 * ProbeConfiguration Interface
 *
 * Polling cadence, per-domain cache lifetimes, probe timeouts and alert
 * thresholds for one aggregator instance.
 */

import type { CachedDomain } from './snapshot.js';

export interface DomainCacheSettings {
  /** Maximum age in ms at which a cached record is served without probing */
  ttlMs: number;
}

export interface ProbeTimeouts {
  pmset: number;
  ioreg: number;
  systemProfiler: number;
  powermetrics: number;
  sysctl: number;
}

export interface ThresholdSettings {
  cpuWarning: number;
  cpuCritical: number;
  memoryWarning: number;
  memoryCritical: number;
  temperatureWarning: number;
  temperatureCritical: number;
}

export interface ProbeConfiguration {
  /** Polling interval of the monitor loop in ms */
  refreshIntervalMs: number;

  domains: Record<CachedDomain, DomainCacheSettings>;

  /** Per-tool wait bounds in ms */
  timeouts: ProbeTimeouts;

  clusterTopology: {
    /** Core indices below this count form the efficiency cluster */
    efficiencyCoreCount: number;
    /** Ask the OS for the efficiency core count instead of trusting the setting */
    discover: boolean;
  };

  thresholds: ThresholdSettings;

  notifications: {
    enabled: boolean;
    /** Minimum ms between two alerts of the same category */
    cooldownMs: number;
  };

  history: {
    /** Samples kept per series */
    size: number;
  };
}

export type ProbeConfigurationOverrides = {
  [K in keyof ProbeConfiguration]?: ProbeConfiguration[K] extends object
    ? { [P in keyof ProbeConfiguration[K]]?: ProbeConfiguration[K][P] extends object ? Partial<ProbeConfiguration[K][P]> : ProbeConfiguration[K][P] }
    : ProbeConfiguration[K];
};
