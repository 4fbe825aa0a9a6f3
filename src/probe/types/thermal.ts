/**
 * Thermal Domain Record
 */

export interface ThermalRecord {
  fanSpeedsRpm: number[];
  throttling: boolean;
  /** Thermal pressure (0-100) */
  pressure: number;
  /** Estimated heat dissipation in watts */
  heatDissipationWatts: number;
}

export type ThermalFacts = Partial<ThermalRecord>;

export function createDefaultThermalRecord(): ThermalRecord {
  return {
    fanSpeedsRpm: [],
    throttling: false,
    pressure: 0,
    heatDissipationWatts: estimateHeatDissipation(0),
  };
}

/**
 * Maps thermal pressure onto a coarse dissipation estimate
 */
export function estimateHeatDissipation(pressure: number): number {
  if (pressure <= 20) return 5;
  if (pressure <= 40) return 10;
  if (pressure <= 60) return 15;
  if (pressure <= 80) return 20;
  return 25;
}
