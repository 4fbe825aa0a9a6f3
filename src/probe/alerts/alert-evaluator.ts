/**
 * Alert Evaluator Implementation
 *
 * Compares each snapshot against the configured warning and critical
 * thresholds. One alert per category at most, rate limited per category by
 * a cooldown. Delivering the alerts is left to whoever listens.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import { systemClock, type Clock } from '../clock.js';
import type { Snapshot, TemperatureReading, ThresholdSettings } from '../types/index.js';

const log = createSubsystemLogger('probe/alerts');

export type AlertCategory = 'cpu' | 'memory' | 'temperature';

export type AlertLevel = 'warning' | 'critical';

export interface Alert {
  category: AlertCategory;
  level: AlertLevel;
  title: string;
  message: string;
  /** Clock time at which the alert was raised */
  timestamp: number;
}

export interface AlertEvaluatorOptions {
  thresholds: ThresholdSettings;
  enabled: boolean;
  cooldownMs: number;
  clock?: Clock;
}

type AlertDraft = Omit<Alert, 'timestamp'>;

export function checkCpuUsage(averageUsage: number, thresholds: ThresholdSettings): AlertDraft | undefined {
  if (averageUsage > thresholds.cpuCritical) {
    return {
      category: 'cpu',
      level: 'critical',
      title: 'CPU Alert',
      message: `CPU usage is critically high: ${averageUsage.toFixed(1)}%`,
    };
  }
  if (averageUsage > thresholds.cpuWarning) {
    return {
      category: 'cpu',
      level: 'warning',
      title: 'CPU Alert',
      message: `CPU usage is high: ${averageUsage.toFixed(1)}%`,
    };
  }
  return undefined;
}

export function checkMemoryUsage(usagePercentage: number, thresholds: ThresholdSettings): AlertDraft | undefined {
  if (usagePercentage > thresholds.memoryCritical) {
    return {
      category: 'memory',
      level: 'critical',
      title: 'Memory Alert',
      message: `Memory usage is critically high: ${usagePercentage}%`,
    };
  }
  if (usagePercentage > thresholds.memoryWarning) {
    return {
      category: 'memory',
      level: 'warning',
      title: 'Memory Alert',
      message: `Memory usage is high: ${usagePercentage}%`,
    };
  }
  return undefined;
}

/**
 * Reports the first sensor, in snapshot order, above either threshold
 */
export function checkTemperatures(
  temperatures: readonly TemperatureReading[],
  thresholds: ThresholdSettings,
): AlertDraft | undefined {
  for (const reading of temperatures) {
    const value = reading.temperature.toFixed(1);
    if (reading.temperature > thresholds.temperatureCritical) {
      return {
        category: 'temperature',
        level: 'critical',
        title: 'Temperature Alert',
        message: `${reading.label} temperature is critically high: ${value}°C`,
      };
    }
    if (reading.temperature > thresholds.temperatureWarning) {
      return {
        category: 'temperature',
        level: 'warning',
        title: 'Temperature Alert',
        message: `${reading.label} temperature is high: ${value}°C`,
      };
    }
  }
  return undefined;
}

export class AlertEvaluator {
  private readonly thresholds: ThresholdSettings;
  private readonly clock: Clock;
  private enabled: boolean;
  private cooldownMs: number;
  private readonly lastRaised = new Map<AlertCategory, number>();

  constructor(options: AlertEvaluatorOptions) {
    this.thresholds = { ...options.thresholds };
    this.enabled = options.enabled;
    this.cooldownMs = options.cooldownMs;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Returns the alerts this snapshot raises, skipping categories still
   * cooling down from a previous alert
   */
  evaluate(snapshot: Snapshot): Alert[] {
    if (!this.enabled) {
      return [];
    }

    const candidates = [
      checkCpuUsage(snapshot.cpu.averageUsage, this.thresholds),
      checkMemoryUsage(snapshot.memory.usagePercentage, this.thresholds),
      checkTemperatures(snapshot.temperatures, this.thresholds),
    ];

    const now = this.clock.now();
    const alerts: Alert[] = [];
    for (const draft of candidates) {
      if (!draft) continue;
      if (!this.isCooledDown(draft.category, now)) {
        log.debug('Alert suppressed by cooldown', { category: draft.category, level: draft.level });
        continue;
      }
      this.lastRaised.set(draft.category, now);
      alerts.push({ ...draft, timestamp: now });
    }
    return alerts;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  setCooldown(cooldownMs: number): void {
    this.cooldownMs = cooldownMs;
  }

  private isCooledDown(category: AlertCategory, now: number): boolean {
    const last = this.lastRaised.get(category);
    return last === undefined || now - last >= this.cooldownMs;
  }
}
