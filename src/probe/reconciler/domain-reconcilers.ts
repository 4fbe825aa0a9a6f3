/**
 * Domain Priority Tables
 *
 * Declares, per domain, which source contributes which fields and in what
 * order of precedence.
 */

import {
  createDefaultBatteryRecord,
  createDefaultCpuPowerRecord,
  createDefaultThermalRecord,
  estimateHeatDissipation,
  type BatteryRecord,
  type ClusterTopology,
  type CpuPowerRecord,
  type HealthBasis,
  type HealthReading,
  type ThermalRecord,
} from '../types/index.js';
import { SourceReconciler } from './source-reconciler.js';

const HEALTH_RANK: Record<HealthBasis, number> = {
  unknown: 0,
  'capacity-ratio': 1,
  condition: 2,
  direct: 3,
};

/**
 * A health reading replaces the merged one only if its basis is more
 * trustworthy: direct > condition > capacity-ratio.
 */
export function preferHealth(current: HealthReading, incoming: HealthReading): boolean {
  return HEALTH_RANK[incoming.basis] > HEALTH_RANK[current.basis];
}

/**
 * Battery: pmset owns charge state, ioreg supplies capacities and the
 * capacity-ratio estimate, system_profiler has the final word on health,
 * cycle count and adapter wattage.
 */
export function createBatteryReconciler(): SourceReconciler<BatteryRecord> {
  return new SourceReconciler<BatteryRecord>({
    domain: 'battery',
    defaults: createDefaultBatteryRecord,
    contributions: [
      {
        source: 'pmset-batt',
        priority: 0,
        fields: ['percentage', 'charging', 'plugged', 'timeRemainingSeconds'],
      },
      {
        source: 'ioreg-smart-battery',
        priority: 1,
        fields: ['currentCapacity', 'designCapacity', 'cycleCount', 'health'],
      },
      {
        source: 'system-profiler-power',
        priority: 2,
        fields: ['health', 'cycleCount', 'adapterWattage'],
      },
    ],
    guards: { health: preferHealth },
  });
}

export function createCpuPowerReconciler(): SourceReconciler<CpuPowerRecord> {
  return new SourceReconciler<CpuPowerRecord>({
    domain: 'cpuPower',
    defaults: createDefaultCpuPowerRecord,
    contributions: [
      {
        source: 'powermetrics-cpu',
        priority: 0,
        fields: [
          'eClusterActive',
          'pClusterActive',
          'eClusterFreqMhz',
          'pClusterFreqMhz',
          'aneWatts',
          'cpuWatts',
          'gpuWatts',
          'packageWatts',
        ],
      },
    ],
  });
}

/**
 * Thermal: the xcpm level gives pressure and a derived throttling flag,
 * the SMC sampler gives fans, and a pmset speed limit overrides throttling.
 */
export function createThermalReconciler(): SourceReconciler<ThermalRecord> {
  return new SourceReconciler<ThermalRecord>({
    domain: 'thermal',
    defaults: createDefaultThermalRecord,
    contributions: [
      { source: 'sysctl-thermal-level', priority: 0, fields: ['pressure', 'throttling'] },
      { source: 'powermetrics-smc', priority: 1, fields: ['fanSpeedsRpm'] },
      { source: 'pmset-therm', priority: 2, fields: ['throttling'] },
    ],
    finalize: (record) => ({
      ...record,
      heatDissipationWatts: estimateHeatDissipation(record.pressure),
    }),
  });
}

export function createTopologyReconciler(fallback: ClusterTopology): SourceReconciler<ClusterTopology> {
  return new SourceReconciler<ClusterTopology>({
    domain: 'topology',
    defaults: () => ({ ...fallback }),
    contributions: [{ source: 'sysctl-perflevel', priority: 0, fields: ['efficiencyCoreCount'] }],
    guards: { efficiencyCoreCount: (_current, incoming) => incoming > 0 },
  });
}
