/**
 * Probe Configuration
 *
 * Defaults, override merging and validation for ProbeConfiguration. Loading
 * the overrides from a file or the command line is left to the caller.
 */

import { ProbeConfigurationError } from '../errors.js';
import type {
  CachedDomain,
  ProbeConfiguration,
  ProbeConfigurationOverrides,
} from '../types/index.js';

const CACHED_DOMAINS: readonly CachedDomain[] = ['battery', 'cpuPower', 'thermal'];

/**
 * Creates the default configuration
 */
export function createDefaultProbeConfiguration(): ProbeConfiguration {
  return {
    refreshIntervalMs: 1000,
    domains: {
      battery: { ttlMs: 5000 },
      cpuPower: { ttlMs: 2000 },
      thermal: { ttlMs: 5000 },
    },
    timeouts: {
      pmset: 1000,
      ioreg: 2000,
      systemProfiler: 3000,
      powermetrics: 4000,
      sysctl: 1000,
    },
    clusterTopology: {
      efficiencyCoreCount: 4,
      discover: false,
    },
    thresholds: {
      cpuWarning: 75,
      cpuCritical: 90,
      memoryWarning: 75,
      memoryCritical: 90,
      temperatureWarning: 70,
      temperatureCritical: 85,
    },
    notifications: {
      enabled: true,
      cooldownMs: 30000,
    },
    history: {
      size: 60,
    },
  };
}

/**
 * Applies overrides section by section; anything not overridden keeps the
 * base value.
 */
export function mergeProbeConfiguration(
  base: ProbeConfiguration,
  overrides: ProbeConfigurationOverrides = {},
): ProbeConfiguration {
  return {
    refreshIntervalMs: overrides.refreshIntervalMs ?? base.refreshIntervalMs,
    domains: {
      battery: { ...base.domains.battery, ...overrides.domains?.battery },
      cpuPower: { ...base.domains.cpuPower, ...overrides.domains?.cpuPower },
      thermal: { ...base.domains.thermal, ...overrides.domains?.thermal },
    },
    timeouts: { ...base.timeouts, ...overrides.timeouts },
    clusterTopology: { ...base.clusterTopology, ...overrides.clusterTopology },
    thresholds: { ...base.thresholds, ...overrides.thresholds },
    notifications: { ...base.notifications, ...overrides.notifications },
    history: { ...base.history, ...overrides.history },
  };
}

/**
 * Validates a configuration for consistency and returns every problem found
 */
export function validateProbeConfiguration(config: ProbeConfiguration): string[] {
  const errors: string[] = [];

  if (!(config.refreshIntervalMs > 0)) {
    errors.push('Refresh interval must be greater than zero');
  }

  for (const domain of CACHED_DOMAINS) {
    if (!(config.domains[domain].ttlMs > 0)) {
      errors.push(`TTL for ${domain} must be greater than zero`);
    }
  }

  for (const [tool, timeout] of Object.entries(config.timeouts)) {
    if (!Number.isFinite(timeout) || timeout <= 0) {
      errors.push(`Timeout for ${tool} must be a positive number of milliseconds`);
    }
  }

  const cores = config.clusterTopology.efficiencyCoreCount;
  if (!Number.isInteger(cores) || cores < 0) {
    errors.push('Efficiency core count must be a non-negative integer');
  }

  const { thresholds } = config;
  if (thresholds.cpuWarning >= thresholds.cpuCritical) {
    errors.push('CPU warning threshold must be below the critical threshold');
  }
  if (thresholds.memoryWarning >= thresholds.memoryCritical) {
    errors.push('Memory warning threshold must be below the critical threshold');
  }
  if (thresholds.temperatureWarning >= thresholds.temperatureCritical) {
    errors.push('Temperature warning threshold must be below the critical threshold');
  }

  if (config.notifications.cooldownMs < 0) {
    errors.push('Notification cooldown cannot be negative');
  }

  if (!Number.isInteger(config.history.size) || config.history.size < 1) {
    errors.push('History size must be a positive integer');
  }

  return errors;
}

/**
 * Throws ProbeConfigurationError listing every problem when the
 * configuration is invalid
 */
export function assertValidProbeConfiguration(config: ProbeConfiguration): ProbeConfiguration {
  const errors = validateProbeConfiguration(config);
  if (errors.length > 0) {
    throw new ProbeConfigurationError(errors);
  }
  return config;
}

/**
 * Builds a validated configuration from defaults plus overrides
 */
export function resolveProbeConfiguration(overrides?: ProbeConfigurationOverrides): ProbeConfiguration {
  return assertValidProbeConfiguration(mergeProbeConfiguration(createDefaultProbeConfiguration(), overrides));
}
