/**
 * Battery Field Extractors
 *
 * One pure extractor per battery source. Each scans the tool output line by
 * line, fills the fields it recognizes and ignores everything else, so extra
 * or reordered lines from a newer OS release do not break extraction. A field
 * whose number does not parse is left unset.
 */

import type { BatteryFacts, ExtractionResult, HealthReading } from '../types/index.js';

const PERCENTAGE = /(\d+)%/;
const TIME_REMAINING = /(\d+):(\d+) remaining/;
const CHARGING_WORD = /\bcharging\b/;
const NOT_CHARGING = /\bnot charging\b/;
const POWER_SOURCE = /Now drawing from '([^']+)'/;

const MAXIMUM_CAPACITY = /Maximum Capacity:\s*(\d+)%/;
const CYCLE_COUNT = /Cycle Count:\s*(\d+)/;
const CONDITION = /Condition:\s*(\w+(?:\s+\w+)*)/;
const WATTAGE = /Wattage \(W\):\s*(\d+)/;
const PROFILER_SHAPE = /^\s*(Power|Battery Information|Health Information|Charge Information|AC Charger Information):/m;

const RAW_CURRENT_CAPACITY = /"AppleRawCurrentCapacity"\s*=\s*(\d+)/;
const CURRENT_CAPACITY = /"CurrentCapacity"\s*=\s*(\d+)/;
const DESIGN_CAPACITY = /"DesignCapacity"\s*=\s*(\d+)/;
const MAX_CAPACITY = /"MaxCapacity"\s*=\s*(\d+)/;
const IOREG_CYCLE_COUNT = /"CycleCount"\s*=\s*(\d+)/;
const IOREG_SHAPE = /AppleSmartBattery|"[A-Za-z]+"\s*=/;

/**
 * Health estimates used when the battery reports only a condition string
 */
export const CONDITION_HEALTH: Readonly<Record<string, number>> = {
  Normal: 95,
  'Replace Soon': 75,
  'Replace Now': 50,
  'Service Battery': 30,
};

export const UNKNOWN_CONDITION_HEALTH = 85;

function parseWhole(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function conditionToHealth(condition: string): HealthReading {
  return {
    percent: CONDITION_HEALTH[condition.trim()] ?? UNKNOWN_CONDITION_HEALTH,
    basis: 'condition',
  };
}

/**
 * Extracts charge state from `pmset -g batt`.
 *
 * The battery line counts as charging when it holds the word `charging` on
 * its own; `discharging` and `not charging` (a full battery held on AC) do
 * not count. `plugged` comes from the `Now drawing from` header when there is
 * one, otherwise from the battery line.
 *
 * Sample: `-InternalBattery-0 (id=20775011)	98%; charging; 0:13 remaining present: true`
 */
export function extractPmsetBattery(text: string): ExtractionResult<BatteryFacts> {
  const facts: BatteryFacts = {};
  let shapeSeen = false;
  let powerSourceSeen = false;

  for (const line of text.split('\n')) {
    const source = POWER_SOURCE.exec(line);
    if (source) {
      shapeSeen = true;
      powerSourceSeen = true;
      facts.plugged = source[1] === 'AC Power';
      continue;
    }

    if (!line.includes('InternalBattery')) continue;
    shapeSeen = true;

    const percentage = parseWhole(PERCENTAGE.exec(line)?.[1]);
    if (percentage !== undefined) {
      facts.percentage = percentage;
    }

    facts.charging = CHARGING_WORD.test(line) && !NOT_CHARGING.test(line);
    if (!powerSourceSeen) {
      facts.plugged = !line.includes('Battery Power');
    }

    const time = TIME_REMAINING.exec(line);
    if (time) {
      const hours = parseWhole(time[1]);
      const minutes = parseWhole(time[2]);
      if (hours !== undefined && minutes !== undefined) {
        facts.timeRemainingSeconds = hours * 3600 + minutes * 60;
      }
    }

    if (line.includes('no estimate')) {
      facts.timeRemainingSeconds = null;
    }
  }

  if (!shapeSeen) {
    return { kind: 'mismatch', reason: 'no battery or power source line in pmset output' };
  }
  return { kind: 'facts', facts };
}

/**
 * Extracts health, cycle count and adapter rating from
 * `system_profiler SPPowerDataType`.
 */
export function extractProfilerBattery(text: string): ExtractionResult<BatteryFacts> {
  const facts: BatteryFacts = {};
  let recognized = false;

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();

    const maximum = MAXIMUM_CAPACITY.exec(line);
    if (maximum) {
      recognized = true;
      const health = parseWhole(maximum[1]);
      if (health !== undefined) {
        facts.health = { percent: health, basis: 'direct' };
      }
      continue;
    }

    const cycles = CYCLE_COUNT.exec(line);
    if (cycles) {
      recognized = true;
      const count = parseWhole(cycles[1]);
      if (count !== undefined) facts.cycleCount = count;
      continue;
    }

    const condition = CONDITION.exec(line);
    if (condition) {
      recognized = true;
      // a direct reading always wins, whichever line comes first
      if (facts.health?.basis !== 'direct') {
        facts.health = conditionToHealth(condition[1]);
      }
      continue;
    }

    const wattage = WATTAGE.exec(line);
    if (wattage) {
      recognized = true;
      const watts = parseWhole(wattage[1]);
      if (watts !== undefined) facts.adapterWattage = watts;
    }
  }

  if (!recognized && !PROFILER_SHAPE.test(text)) {
    return { kind: 'mismatch', reason: 'no power report sections in system_profiler output' };
  }
  return { kind: 'facts', facts };
}

/**
 * Extracts raw capacities from `ioreg -rn AppleSmartBattery` and derives a
 * capacity-ratio health estimate from them.
 */
export function extractIoregBattery(text: string): ExtractionResult<BatteryFacts> {
  if (!IOREG_SHAPE.test(text)) {
    return { kind: 'mismatch', reason: 'no registry properties in ioreg output' };
  }

  let rawCurrent: number | undefined;
  let current: number | undefined;
  let design: number | undefined;
  let max: number | undefined;
  let cycles: number | undefined;

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    rawCurrent = parseWhole(RAW_CURRENT_CAPACITY.exec(line)?.[1]) ?? rawCurrent;
    current = parseWhole(CURRENT_CAPACITY.exec(line)?.[1]) ?? current;
    design = parseWhole(DESIGN_CAPACITY.exec(line)?.[1]) ?? design;
    max = parseWhole(MAX_CAPACITY.exec(line)?.[1]) ?? max;
    cycles = parseWhole(IOREG_CYCLE_COUNT.exec(line)?.[1]) ?? cycles;
  }

  const facts: BatteryFacts = {};
  const currentCapacity = rawCurrent ?? current;
  const designCapacity = design ?? max;

  if (currentCapacity !== undefined) facts.currentCapacity = currentCapacity;
  if (designCapacity !== undefined) facts.designCapacity = designCapacity;
  if (cycles !== undefined) facts.cycleCount = cycles;

  if (currentCapacity !== undefined && designCapacity !== undefined && designCapacity > 0) {
    facts.health = {
      percent: (currentCapacity / designCapacity) * 100,
      basis: 'capacity-ratio',
    };
  }

  return { kind: 'facts', facts };
}
