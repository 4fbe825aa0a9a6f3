/**
 * Battery Domain Record
 */

/** Where a health percentage came from, lowest confidence first */
export type HealthBasis = 'unknown' | 'capacity-ratio' | 'condition' | 'direct';

export interface HealthReading {
  percent: number;
  basis: HealthBasis;
}

export interface BatteryRecord {
  /** State of charge (0-100) */
  percentage: number;
  charging: boolean;
  /** External power connected */
  plugged: boolean;
  /** Seconds until empty or full; null when the OS has no estimate */
  timeRemainingSeconds: number | null;
  health: HealthReading;
  cycleCount: number;
  /** mAh */
  currentCapacity: number;
  /** mAh */
  designCapacity: number;
  /** Connected adapter rating in watts */
  adapterWattage: number;
}

export type BatteryFacts = Partial<BatteryRecord>;

export function createDefaultBatteryRecord(): BatteryRecord {
  return {
    percentage: 0,
    charging: false,
    plugged: false,
    timeRemainingSeconds: null,
    health: { percent: 0, basis: 'unknown' },
    cycleCount: 0,
    currentCapacity: 0,
    designCapacity: 0,
    adapterWattage: 0,
  };
}
