/**
 * Snapshot History
 *
 * Bounded series of a few headline numbers per snapshot, oldest first, for
 * sparklines and trend arrows.
 */

import type { Snapshot } from '../types/index.js';

/** Number of samples averaged at each end of a series for a trend */
export const TREND_WINDOW = 5;

export type HistorySeries = 'cpu' | 'memory' | 'networkRx' | 'networkTx' | 'temperature';

class BoundedSeries {
  private readonly values: number[] = [];

  constructor(private readonly capacity: number) {}

  push(value: number): void {
    if (this.values.length >= this.capacity) {
      this.values.shift();
    }
    this.values.push(value);
  }

  toArray(): number[] {
    return [...this.values];
  }

  get length(): number {
    return this.values.length;
  }
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Mean of the newest samples minus mean of the oldest, undefined until
 * there are two samples
 */
export function computeTrend(values: readonly number[], window = TREND_WINDOW): number | undefined {
  if (values.length < 2) {
    return undefined;
  }
  const span = Math.min(window, values.length);
  return mean(values.slice(values.length - span)) - mean(values.slice(0, span));
}

export class SnapshotHistory {
  private readonly series: Record<HistorySeries, BoundedSeries>;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.series = {
      cpu: new BoundedSeries(capacity),
      memory: new BoundedSeries(capacity),
      networkRx: new BoundedSeries(capacity),
      networkTx: new BoundedSeries(capacity),
      temperature: new BoundedSeries(capacity),
    };
  }

  ingest(snapshot: Snapshot): void {
    this.series.cpu.push(snapshot.cpu.averageUsage);
    this.series.memory.push(snapshot.memory.usagePercentage);
    this.series.networkRx.push(snapshot.network.reduce((sum, nic) => sum + nic.bytesReceived, 0));
    this.series.networkTx.push(snapshot.network.reduce((sum, nic) => sum + nic.bytesTransmitted, 0));

    // no sensors, no sample
    if (snapshot.temperatures.length > 0) {
      this.series.temperature.push(mean(snapshot.temperatures.map((reading) => reading.temperature)));
    }
  }

  values(series: HistorySeries): number[] {
    return this.series[series].toArray();
  }

  size(series: HistorySeries): number {
    return this.series[series].length;
  }

  cpuTrend(): number | undefined {
    return computeTrend(this.series.cpu.toArray());
  }

  memoryTrend(): number | undefined {
    return computeTrend(this.series.memory.toArray());
  }
}
