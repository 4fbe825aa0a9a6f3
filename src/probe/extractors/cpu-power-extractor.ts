/**
 * CPU Power Field Extractor
 *
 * Reads per-core residency and frequency plus rail power from
 * `powermetrics --samplers cpu_power,gpu_power`.
 */

import type { ClusterTopology, CpuPowerFacts, ExtractionResult } from '../types/index.js';

const ACTIVE_RESIDENCY = /CPU (\d+) active residency:\s+(\d+(?:\.\d+)?)%/;
const FREQUENCY = /^CPU\s+(\d+)\s+frequency:\s+(\d+)\s+MHz$/;
const RAIL_POWER = /^(ANE|CPU|GPU) Power:\s*(\d+(?:\.\d+)?)\s*mW/;
const COMBINED_POWER = /^Combined Power \(CPU \+ GPU \+ ANE\):\s*(\d+(?:\.\d+)?)\s*mW/;
const POWERMETRICS_SHAPE = /\*\*\*\* Processor usage \*\*\*\*|active residency|Combined Power/;

/** Core 0-3 efficiency, the rest performance: the layout of the first Apple Silicon parts */
export const DEFAULT_CLUSTER_TOPOLOGY: ClusterTopology = { efficiencyCoreCount: 4 };

class RunningMean {
  private sum = 0;
  private count = 0;

  add(value: number): void {
    this.sum += value;
    this.count += 1;
  }

  get value(): number | undefined {
    return this.count > 0 ? this.sum / this.count : undefined;
  }
}

export function extractCpuPower(
  text: string,
  topology: ClusterTopology = DEFAULT_CLUSTER_TOPOLOGY,
): ExtractionResult<CpuPowerFacts> {
  if (!POWERMETRICS_SHAPE.test(text)) {
    return { kind: 'mismatch', reason: 'no processor usage section in powermetrics output' };
  }

  const eActive = new RunningMean();
  const pActive = new RunningMean();
  const eFrequency = new RunningMean();
  const pFrequency = new RunningMean();
  const facts: CpuPowerFacts = {};

  const isEfficiencyCore = (core: number): boolean => core < topology.efficiencyCoreCount;

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();

    const residency = ACTIVE_RESIDENCY.exec(line);
    if (residency) {
      const core = Number.parseInt(residency[1], 10);
      const active = Number.parseFloat(residency[2]);
      if (Number.isFinite(core) && Number.isFinite(active)) {
        (isEfficiencyCore(core) ? eActive : pActive).add(active);
      }
      continue;
    }

    const frequency = FREQUENCY.exec(line);
    if (frequency) {
      const core = Number.parseInt(frequency[1], 10);
      const mhz = Number.parseInt(frequency[2], 10);
      if (Number.isFinite(core) && Number.isFinite(mhz)) {
        (isEfficiencyCore(core) ? eFrequency : pFrequency).add(mhz);
      }
      continue;
    }

    const rail = RAIL_POWER.exec(line);
    if (rail) {
      const watts = Number.parseFloat(rail[2]) / 1000;
      if (!Number.isFinite(watts)) continue;
      switch (rail[1]) {
        case 'ANE':
          facts.aneWatts = watts;
          break;
        case 'CPU':
          facts.cpuWatts = watts;
          break;
        case 'GPU':
          facts.gpuWatts = watts;
          break;
      }
      continue;
    }

    const combined = COMBINED_POWER.exec(line);
    if (combined) {
      const watts = Number.parseFloat(combined[1]) / 1000;
      if (Number.isFinite(watts)) facts.packageWatts = watts;
    }
  }

  const means: Array<[keyof CpuPowerFacts, number | undefined]> = [
    ['eClusterActive', eActive.value],
    ['pClusterActive', pActive.value],
    ['eClusterFreqMhz', eFrequency.value],
    ['pClusterFreqMhz', pFrequency.value],
  ];
  for (const [field, value] of means) {
    if (value !== undefined) facts[field] = value;
  }

  return { kind: 'facts', facts };
}
