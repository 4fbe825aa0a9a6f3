/**
 * Unit Tests for AlertEvaluator
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AlertEvaluator, checkCpuUsage, checkMemoryUsage, checkTemperatures } from './alert-evaluator.js';
import { ManualClock, createTestSnapshot, defaultTestThresholds } from '../test-setup.js';

const START = 1_700_000_000_000;
const COOLDOWN_MS = 30_000;

describe('threshold checks', () => {
  it.each([
    [95, 'critical', 'CPU usage is critically high: 95.0%'],
    [85.04, 'warning', 'CPU usage is high: 85.0%'],
    [80, 'warning', 'CPU usage is high: 80.0%'],
  ] as const)('should flag %d%% CPU as %s', (usage, level, message) => {
    expect(checkCpuUsage(usage, defaultTestThresholds)).toEqual({
      category: 'cpu',
      level,
      title: 'CPU Alert',
      message,
    });
  });

  it('should require usage strictly above a threshold', () => {
    expect(checkCpuUsage(75, defaultTestThresholds)).toBeUndefined();
    expect(checkCpuUsage(90, defaultTestThresholds)?.level).toBe('warning');
    expect(checkMemoryUsage(75, defaultTestThresholds)).toBeUndefined();
  });

  it('should report memory usage as a whole percentage', () => {
    expect(checkMemoryUsage(91, defaultTestThresholds)).toEqual({
      category: 'memory',
      level: 'critical',
      title: 'Memory Alert',
      message: 'Memory usage is critically high: 91%',
    });
    expect(checkMemoryUsage(76, defaultTestThresholds)?.message).toBe('Memory usage is high: 76%');
  });

  it('should report the first sensor over a threshold', () => {
    const alert = checkTemperatures(
      [
        { label: 'battery', temperature: 41, criticalTemperature: 100 },
        { label: 'cpu-die', temperature: 90, criticalTemperature: 100 },
        { label: 'gpu-die', temperature: 72.4, criticalTemperature: 100 },
      ],
      defaultTestThresholds,
    );

    expect(alert).toEqual({
      category: 'temperature',
      level: 'critical',
      title: 'Temperature Alert',
      message: 'cpu-die temperature is critically high: 90.0°C',
    });
  });

  it('should warn for a sensor between the thresholds', () => {
    const alert = checkTemperatures(
      [{ label: 'gpu-die', temperature: 72.4, criticalTemperature: 100 }],
      defaultTestThresholds,
    );

    expect(alert?.message).toBe('gpu-die temperature is high: 72.4°C');
  });
});

describe('AlertEvaluator', () => {
  let clock: ManualClock;
  let evaluator: AlertEvaluator;

  beforeEach(() => {
    clock = new ManualClock(START);
    evaluator = new AlertEvaluator({
      thresholds: defaultTestThresholds,
      enabled: true,
      cooldownMs: COOLDOWN_MS,
      clock,
    });
  });

  it('should raise nothing for a calm snapshot', () => {
    expect(evaluator.evaluate(createTestSnapshot())).toEqual([]);
  });

  it('should raise one alert per category in a fixed order', () => {
    const snapshot = createTestSnapshot({
      averageUsage: 95,
      memoryPercentage: 80,
      temperatures: [{ label: 'cpu-die', temperature: 88, criticalTemperature: 100 }],
    });

    const alerts = evaluator.evaluate(snapshot);

    expect(alerts.map((alert) => [alert.category, alert.level])).toEqual([
      ['cpu', 'critical'],
      ['memory', 'warning'],
      ['temperature', 'critical'],
    ]);
    expect(alerts.every((alert) => alert.timestamp === START)).toBe(true);
  });

  it('should hold back a category until its cooldown has passed', () => {
    const hot = createTestSnapshot({ averageUsage: 95 });
    evaluator.evaluate(hot);

    clock.advance(COOLDOWN_MS - 1);
    expect(evaluator.evaluate(hot)).toEqual([]);

    clock.advance(1);
    expect(evaluator.evaluate(hot)).toEqual([
      {
        category: 'cpu',
        level: 'critical',
        title: 'CPU Alert',
        message: 'CPU usage is critically high: 95.0%',
        timestamp: START + COOLDOWN_MS,
      },
    ]);
  });

  it('should keep cooldowns separate per category', () => {
    evaluator.evaluate(createTestSnapshot({ averageUsage: 95 }));
    clock.advance(1000);

    const alerts = evaluator.evaluate(createTestSnapshot({ averageUsage: 95, memoryPercentage: 95 }));

    expect(alerts.map((alert) => alert.category)).toEqual(['memory']);
  });

  it('should not start a cooldown for a category that did not alert', () => {
    evaluator.evaluate(createTestSnapshot());
    clock.advance(1);

    expect(evaluator.evaluate(createTestSnapshot({ memoryPercentage: 92 }))).toHaveLength(1);
  });

  it('should raise nothing while disabled', () => {
    evaluator.setEnabled(false);

    expect(evaluator.evaluate(createTestSnapshot({ averageUsage: 99 }))).toEqual([]);

    evaluator.setEnabled(true);
    expect(evaluator.evaluate(createTestSnapshot({ averageUsage: 99 }))).toHaveLength(1);
  });

  it('should apply a changed cooldown', () => {
    evaluator.evaluate(createTestSnapshot({ averageUsage: 95 }));
    evaluator.setCooldown(0);

    expect(evaluator.evaluate(createTestSnapshot({ averageUsage: 95 }))).toHaveLength(1);
  });
});
