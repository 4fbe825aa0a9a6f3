/**
 * Unit Tests for derived metrics
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  classifyWorkload,
  computePerformanceMetrics,
  computeSystemHealth,
  estimateCpuPower,
} from './derived-metrics.js';
import { createDefaultCpuPowerRecord, type CpuPowerRecord } from '../types/index.js';
import { propertyTestConfig } from '../test-setup.js';

const measured: CpuPowerRecord = {
  eClusterActive: 40,
  pClusterActive: 70,
  eClusterFreqMhz: 1300,
  pClusterFreqMhz: 3100,
  aneWatts: 0,
  cpuWatts: 4.52,
  gpuWatts: 0.31,
  packageWatts: 4.83,
};

describe('estimateCpuPower', () => {
  it('should scale power and activity with utilization', () => {
    const estimate = estimateCpuPower(50);

    expect(estimate.packageWatts).toBeCloseTo(7.5, 10);
    expect(estimate.cpuWatts).toBeCloseTo(4.5, 10);
    expect(estimate.gpuWatts).toBeCloseTo(1.5, 10);
    expect(estimate.aneWatts).toBeCloseTo(0.375, 10);
    expect(estimate.eClusterActive).toBeCloseTo(30, 10);
    expect(estimate.pClusterActive).toBeCloseTo(20, 10);
    expect(estimate.eClusterFreqMhz).toBe(1800);
    expect(estimate.pClusterFreqMhz).toBe(2400);
  });

  it('should raise cluster frequencies under heavy load', () => {
    const estimate = estimateCpuPower(80);

    expect(estimate.eClusterFreqMhz).toBe(2400);
    expect(estimate.pClusterFreqMhz).toBe(3200);
    expect(estimate.packageWatts).toBeCloseTo(12, 10);
  });

  it('should clamp utilization into 0-100', () => {
    expect(estimateCpuPower(150).packageWatts).toBe(15);
    expect(estimateCpuPower(Number.NaN)).toEqual({
      eClusterActive: 0,
      pClusterActive: 0,
      eClusterFreqMhz: 1800,
      pClusterFreqMhz: 2400,
      aneWatts: 0,
      cpuWatts: 0,
      gpuWatts: 0,
      packageWatts: 0,
    });
  });

  it('should never estimate beyond the full load budget', () => {
    fc.assert(
      fc.property(fc.double({ min: -50, max: 200, noNaN: true }), (usage) => {
        const estimate = estimateCpuPower(usage);

        expect(estimate.packageWatts).toBeGreaterThanOrEqual(0);
        expect(estimate.packageWatts).toBeLessThanOrEqual(15);
        expect(estimate.cpuWatts + estimate.gpuWatts + estimate.aneWatts).toBeLessThanOrEqual(
          estimate.packageWatts,
        );
      }),
      propertyTestConfig,
    );
  });
});

describe('classifyWorkload', () => {
  it.each([
    [5, { gpuWatts: 9, cpuWatts: 1 }, 'idle'],
    [50, { gpuWatts: 3, cpuWatts: 2 }, 'graphics'],
    [80, { gpuWatts: 0, cpuWatts: 5 }, 'compute'],
    [50, { gpuWatts: 1, cpuWatts: 2 }, 'mixed'],
  ] as const)('should classify %d%% usage with %o as %s', (usage, rails, expected) => {
    expect(classifyWorkload(usage, { ...createDefaultCpuPowerRecord(), ...rails })).toBe(expected);
  });
});

describe('computePerformanceMetrics', () => {
  it('should relate utilization to package power and frequency', () => {
    const metrics = computePerformanceMetrics(40, measured);

    expect(metrics.instructionsPerWatt).toBeCloseTo(40_000_000 / 4.83, 6);
    expect(metrics.performancePerWatt).toBeCloseTo(40 / 4.83, 10);
    expect(metrics.frequencyEfficiency).toBeCloseTo((40 / 2200) * 1000, 10);
    expect(metrics.workloadType).toBe('mixed');
  });

  it('should report zeros without power or frequency readings', () => {
    expect(computePerformanceMetrics(40, createDefaultCpuPowerRecord())).toEqual({
      instructionsPerWatt: 0,
      performancePerWatt: 0,
      frequencyEfficiency: 0,
      workloadType: 'mixed',
    });
  });
});

describe('computeSystemHealth', () => {
  it.each([
    [[0.5, 0.5, 0.5], 95, 95],
    [[1, 1.5, 2], 85, 85],
    [[2, 2.5, 3], 75, 85],
    [[4, 4, 4], 65, 85],
  ] as const)('should score load %j as %d with sleep efficiency %d', (loads, quality, sleepWake) => {
    const health = computeSystemHealth(loads, 7200);

    expect(health.powerQualityScore).toBe(quality);
    expect(health.sleepWakeEfficiency).toBe(sleepWake);
    expect(health.uptimeSeconds).toBe(7200);
    expect([health.loadAverage1, health.loadAverage5, health.loadAverage15]).toEqual(loads);
  });
});
