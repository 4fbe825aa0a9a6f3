/**
 * Unit Tests for the domain priority tables
 */

import { describe, it, expect } from 'vitest';
import {
  createBatteryReconciler,
  createCpuPowerReconciler,
  createThermalReconciler,
  createTopologyReconciler,
  preferHealth,
} from './domain-reconcilers.js';
import {
  extractIoregBattery,
  extractPmsetBattery,
  extractProfilerBattery,
} from '../extractors/index.js';
import { loadSampleCapture } from '../test-setup.js';
import {
  createDefaultCpuPowerRecord,
  type BatteryFacts,
  type ClusterTopology,
  type ExtractionResult,
  type SourceId,
  type ThermalFacts,
} from '../types/index.js';

function factsOf<T>(result: ExtractionResult<T>): Partial<T> {
  if (result.kind !== 'facts') {
    throw new Error(`expected facts, got mismatch: ${result.reason}`);
  }
  return result.facts;
}

describe('createBatteryReconciler', () => {
  it('should produce the default record when no source produced anything', () => {
    const merged = createBatteryReconciler().merge(new Map());

    expect(merged).toEqual({
      percentage: 0,
      charging: false,
      plugged: false,
      timeRemainingSeconds: null,
      health: { percent: 0, basis: 'unknown' },
      cycleCount: 0,
      currentCapacity: 0,
      designCapacity: 0,
      adapterWattage: 0,
    });
  });

  it('should merge all three captures with the direct health reading winning', () => {
    const records = new Map<SourceId, BatteryFacts>([
      ['pmset-batt', factsOf(extractPmsetBattery(loadSampleCapture('pmset-batt-charging')))],
      ['ioreg-smart-battery', factsOf(extractIoregBattery(loadSampleCapture('ioreg-smart-battery')))],
      ['system-profiler-power', factsOf(extractProfilerBattery(loadSampleCapture('system-profiler-power')))],
    ]);

    expect(createBatteryReconciler().merge(records)).toEqual({
      percentage: 98,
      charging: true,
      plugged: true,
      timeRemainingSeconds: 780,
      health: { percent: 87, basis: 'direct' },
      cycleCount: 342,
      currentCapacity: 4230,
      designCapacity: 4700,
      adapterWattage: 96,
    });
  });

  it('should fall back to the capacity ratio when only the registry reports', () => {
    const records = new Map<SourceId, BatteryFacts>([
      ['ioreg-smart-battery', factsOf(extractIoregBattery(loadSampleCapture('ioreg-smart-battery')))],
    ]);

    const merged = createBatteryReconciler().merge(records);

    expect(merged.health.basis).toBe('capacity-ratio');
    expect(merged.health.percent).toBeCloseTo(90, 1);
    expect(merged.cycleCount).toBe(342);
  });

  it('should prefer a condition estimate over the capacity ratio', () => {
    const records = new Map<SourceId, BatteryFacts>([
      ['ioreg-smart-battery', { health: { percent: 62, basis: 'capacity-ratio' } }],
      ['system-profiler-power', { health: { percent: 75, basis: 'condition' } }],
    ]);

    expect(createBatteryReconciler().merge(records).health).toEqual({ percent: 75, basis: 'condition' });
  });

  it('should leave charge state to pmset', () => {
    const records = new Map<SourceId, BatteryFacts>([
      ['system-profiler-power', { percentage: 12, charging: true }],
    ]);

    const merged = createBatteryReconciler().merge(records);

    expect(merged.percentage).toBe(0);
    expect(merged.charging).toBe(false);
  });
});

describe('preferHealth', () => {
  it('should only accept a more trustworthy basis', () => {
    expect(preferHealth({ percent: 0, basis: 'unknown' }, { percent: 80, basis: 'capacity-ratio' })).toBe(true);
    expect(preferHealth({ percent: 80, basis: 'capacity-ratio' }, { percent: 95, basis: 'condition' })).toBe(true);
    expect(preferHealth({ percent: 95, basis: 'condition' }, { percent: 87, basis: 'direct' })).toBe(true);
    expect(preferHealth({ percent: 87, basis: 'direct' }, { percent: 90, basis: 'capacity-ratio' })).toBe(false);
    expect(preferHealth({ percent: 87, basis: 'direct' }, { percent: 88, basis: 'direct' })).toBe(false);
  });
});

describe('createCpuPowerReconciler', () => {
  it('should default every field to zero', () => {
    expect(createCpuPowerReconciler().merge(new Map())).toEqual(createDefaultCpuPowerRecord());
  });
});

describe('createThermalReconciler', () => {
  it('should derive dissipation from the merged pressure', () => {
    const merged = createThermalReconciler().merge(
      new Map<SourceId, ThermalFacts>([
        ['sysctl-thermal-level', { pressure: 70, throttling: true }],
        ['powermetrics-smc', { fanSpeedsRpm: [1838] }],
      ]),
    );

    expect(merged).toEqual({
      fanSpeedsRpm: [1838],
      throttling: true,
      pressure: 70,
      heatDissipationWatts: 20,
    });
  });

  it('should let the pmset speed limit override the derived throttling flag', () => {
    const merged = createThermalReconciler().merge(
      new Map<SourceId, ThermalFacts>([
        ['sysctl-thermal-level', { pressure: 60, throttling: true }],
        ['pmset-therm', { throttling: false }],
      ]),
    );

    expect(merged.throttling).toBe(false);
    expect(merged.heatDissipationWatts).toBe(15);
  });

  it('should produce a cool idle record when no source reported', () => {
    expect(createThermalReconciler().merge(new Map())).toEqual({
      fanSpeedsRpm: [],
      throttling: false,
      pressure: 0,
      heatDissipationWatts: 5,
    });
  });
});

describe('createTopologyReconciler', () => {
  it('should use the discovered efficiency core count', () => {
    const merged = createTopologyReconciler({ efficiencyCoreCount: 4 }).merge(
      new Map<SourceId, Partial<ClusterTopology>>([['sysctl-perflevel', { efficiencyCoreCount: 6 }]]),
    );

    expect(merged).toEqual({ efficiencyCoreCount: 6 });
  });

  it('should keep the configured count when discovery reports zero', () => {
    const merged = createTopologyReconciler({ efficiencyCoreCount: 4 }).merge(
      new Map<SourceId, Partial<ClusterTopology>>([['sysctl-perflevel', { efficiencyCoreCount: 0 }]]),
    );

    expect(merged).toEqual({ efficiencyCoreCount: 4 });
  });
});

