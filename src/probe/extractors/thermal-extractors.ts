/**
 * Thermal Field Extractors
 */

import type { ExtractionResult, ThermalFacts } from '../types/index.js';

const SPEED_LIMIT = /CPU_Speed_Limit\s*=\s*(\d+)/;
const THERM_SHAPE = /CPU_Speed_Limit|thermal warning level|performance warning level|CPU power status/;
const FAN_SPEED = /\bFan\b.*?(\d+(?:\.\d+)?)\s*rpm/i;
const SMC_SHAPE = /SMC sensors|Fan|Thermal level|die temperature/i;

/** Pressure above which the CPU is treated as throttling when no direct reading exists */
export const THROTTLING_PRESSURE = 50;

/**
 * `sysctl -n machdep.xcpm.cpu_thermal_level` prints a bare integer level;
 * each level step is ten points of pressure.
 */
export function extractThermalLevel(text: string): ExtractionResult<ThermalFacts> {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) {
    return { kind: 'mismatch', reason: `unexpected thermal level output: ${trimmed.slice(0, 40)}` };
  }
  const pressure = Math.min(100, Math.max(0, Number.parseInt(trimmed, 10) * 10));
  return {
    kind: 'facts',
    facts: { pressure, throttling: pressure > THROTTLING_PRESSURE },
  };
}

/**
 * `pmset -g therm` reports a CPU speed limit once the OS has started
 * throttling; anything below 100 is an active limit.
 */
export function extractPmsetTherm(text: string): ExtractionResult<ThermalFacts> {
  if (!THERM_SHAPE.test(text)) {
    return { kind: 'mismatch', reason: 'no thermal report in pmset output' };
  }
  const limit = SPEED_LIMIT.exec(text);
  if (!limit) {
    return { kind: 'facts', facts: {} };
  }
  const value = Number.parseInt(limit[1], 10);
  return { kind: 'facts', facts: Number.isFinite(value) ? { throttling: value < 100 } : {} };
}

/**
 * Fan speeds from `powermetrics --samplers smc`, e.g. `Fan: 1838.45 rpm`.
 */
export function extractSmcFans(text: string): ExtractionResult<ThermalFacts> {
  if (!SMC_SHAPE.test(text)) {
    return { kind: 'mismatch', reason: 'no SMC sensor section in powermetrics output' };
  }
  const fanSpeedsRpm: number[] = [];
  for (const line of text.split('\n')) {
    const match = FAN_SPEED.exec(line);
    if (!match) continue;
    const rpm = Number.parseFloat(match[1]);
    if (Number.isFinite(rpm)) fanSpeedsRpm.push(Math.round(rpm));
  }
  return { kind: 'facts', facts: fanSpeedsRpm.length > 0 ? { fanSpeedsRpm } : {} };
}
