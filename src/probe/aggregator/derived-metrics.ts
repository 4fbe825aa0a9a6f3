/**
 * Derived Metrics
 *
 * Estimates computed from already collected values; none of them probe
 * anything.
 */

import type {
  CpuPowerRecord,
  PerformanceMetrics,
  SystemHealth,
  WorkloadType,
} from '../types/index.js';

/** Package power in watts at 100% utilization, used by the CPU power estimate */
const ESTIMATED_FULL_LOAD_WATTS = 15;

/**
 * Plausible CPU power values from observed utilization, used until
 * powermetrics has produced a real reading.
 */
export function estimateCpuPower(averageUsage: number): CpuPowerRecord {
  const usage = Number.isFinite(averageUsage) ? Math.max(0, Math.min(100, averageUsage)) : 0;
  const estimatedPower = (usage / 100) * ESTIMATED_FULL_LOAD_WATTS;

  return {
    eClusterActive: usage * 0.6,
    pClusterActive: usage * 0.4,
    eClusterFreqMhz: usage > 50 ? 2400 : 1800,
    pClusterFreqMhz: usage > 70 ? 3200 : 2400,
    aneWatts: estimatedPower * 0.05,
    cpuWatts: estimatedPower * 0.6,
    gpuWatts: estimatedPower * 0.2,
    packageWatts: estimatedPower,
  };
}

export function classifyWorkload(averageUsage: number, power: CpuPowerRecord): WorkloadType {
  if (averageUsage < 10) return 'idle';
  if (power.gpuWatts > power.cpuWatts) return 'graphics';
  if (averageUsage > 70) return 'compute';
  return 'mixed';
}

export function computePerformanceMetrics(averageUsage: number, power: CpuPowerRecord): PerformanceMetrics {
  const totalPower = power.packageWatts;
  const averageFrequency = (power.eClusterFreqMhz + power.pClusterFreqMhz) / 2;

  return {
    // simplified: one million instructions per utilization point
    instructionsPerWatt: totalPower > 0 ? (averageUsage * 1_000_000) / totalPower : 0,
    performancePerWatt: totalPower > 0 ? averageUsage / totalPower : 0,
    frequencyEfficiency: averageFrequency > 0 ? (averageUsage / averageFrequency) * 1000 : 0,
    workloadType: classifyWorkload(averageUsage, power),
  };
}

export function computeSystemHealth(
  loadAverages: readonly [number, number, number],
  uptimeSeconds: number,
): SystemHealth {
  const [loadAverage1, loadAverage5, loadAverage15] = loadAverages;
  const meanLoad = (loadAverage1 + loadAverage5 + loadAverage15) / 3;

  let powerQualityScore: number;
  if (meanLoad < 1) {
    powerQualityScore = 95;
  } else if (meanLoad < 2) {
    powerQualityScore = 85;
  } else if (meanLoad < 3) {
    powerQualityScore = 75;
  } else {
    powerQualityScore = 65;
  }

  return {
    uptimeSeconds,
    loadAverage1,
    loadAverage5,
    loadAverage15,
    powerQualityScore,
    sleepWakeEfficiency: meanLoad < 1.5 ? 95 : 85,
  };
}
