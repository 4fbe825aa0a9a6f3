/**
 * Telemetry Monitor Implementation
 *
 * The polling loop. Each tick collects one snapshot, records it in the
 * history, evaluates alerts and schedules the next tick only after the
 * current one has settled, so collection never overlaps itself.
 *
 * Events:
 * - `snapshot` (Snapshot)
 * - `alert` (Alert)
 * - `monitoringStarted` ({ intervalMs })
 * - `monitoringStopped`
 * - `monitoringError` (unknown)
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { TelemetryAggregator, type TelemetryAggregatorOptions } from '../aggregator/index.js';
import { AlertEvaluator } from '../alerts/index.js';
import { systemClock, type CancelTimer, type Clock } from '../clock.js';
import { SnapshotHistory } from '../history/index.js';
import type { Snapshot } from '../types/index.js';

const log = createSubsystemLogger('probe/monitor');

export interface SnapshotSource {
  collect(): Promise<Snapshot>;
}

export interface TelemetryMonitorOptions {
  source: SnapshotSource;
  intervalMs: number;
  clock?: Clock;
  alerts?: AlertEvaluator;
  history?: SnapshotHistory;
}

export class TelemetryMonitor extends EventEmitter {
  private readonly source: SnapshotSource;
  private readonly intervalMs: number;
  private readonly clock: Clock;
  private readonly alerts?: AlertEvaluator;
  private readonly history?: SnapshotHistory;
  private running = false;
  // bumped on every start and stop; a tick from an older generation is discarded
  private generation = 0;
  private cancelNextTick?: CancelTimer;
  private inFlight?: Promise<Snapshot>;
  private latest?: Snapshot;

  constructor(options: TelemetryMonitorOptions) {
    super();
    if (!(options.intervalMs > 0)) {
      throw new RangeError(`Polling interval must be greater than zero, got ${options.intervalMs}`);
    }
    this.source = options.source;
    this.intervalMs = options.intervalMs;
    this.clock = options.clock ?? systemClock;
    this.alerts = options.alerts;
    this.history = options.history;
  }

  get isRunning(): boolean {
    return this.running;
  }

  getLatestSnapshot(): Snapshot | undefined {
    return this.latest;
  }

  getHistory(): SnapshotHistory | undefined {
    return this.history;
  }

  /**
   * Starts polling. The first tick is scheduled immediately.
   */
  startMonitoring(): void {
    if (this.running) {
      log.debug('Monitoring already running');
      return;
    }

    this.running = true;
    this.generation += 1;
    this.scheduleTick(this.generation, 0);

    this.emit('monitoringStarted', { intervalMs: this.intervalMs });
    log.info('Telemetry monitoring started', { intervalMs: this.intervalMs });
  }

  /**
   * Stops polling. A collection still in flight completes but its snapshot
   * is dropped.
   */
  stopMonitoring(): void {
    if (!this.running) {
      return;
    }

    this.running = false;
    this.generation += 1;
    this.cancelNextTick?.();
    this.cancelNextTick = undefined;

    this.emit('monitoringStopped');
    log.info('Telemetry monitoring stopped');
  }

  private scheduleTick(generation: number, delayMs: number): void {
    this.cancelNextTick = this.clock.schedule(() => {
      void this.tick(generation);
    }, delayMs);
  }

  private async tick(generation: number): Promise<void> {
    this.cancelNextTick = undefined;

    // a restart can land while the previous generation is still collecting
    if (this.inFlight) {
      await Promise.allSettled([this.inFlight]);
    }
    if (generation !== this.generation) {
      return;
    }

    let collecting: Promise<Snapshot> | undefined;
    try {
      collecting = this.source.collect();
      this.inFlight = collecting;
      const snapshot = await collecting;
      if (generation !== this.generation) {
        log.debug('Discarding snapshot collected after stop', { capturedAt: snapshot.capturedAt });
        return;
      }
      this.publish(snapshot);
    } catch (error) {
      if (generation !== this.generation) {
        return;
      }
      log.error('Error during telemetry collection', {
        error: error instanceof Error ? error.message : String(error),
      });
      this.emit('monitoringError', error);
    } finally {
      if (this.inFlight === collecting) {
        this.inFlight = undefined;
      }
    }

    if (generation === this.generation) {
      this.scheduleTick(generation, this.intervalMs);
    }
  }

  private publish(snapshot: Snapshot): void {
    this.latest = snapshot;
    this.history?.ingest(snapshot);
    this.emit('snapshot', snapshot);

    for (const alert of this.alerts?.evaluate(snapshot) ?? []) {
      log.warn(alert.message, { category: alert.category, level: alert.level });
      this.emit('alert', alert);
    }
  }
}

/**
 * Wires an aggregator, alert evaluator and history from one configuration
 */
export function createTelemetryMonitor(options: TelemetryAggregatorOptions = {}): TelemetryMonitor {
  const aggregator = new TelemetryAggregator(options);
  const config = aggregator.getConfiguration();
  const clock = options.clock ?? systemClock;

  return new TelemetryMonitor({
    source: aggregator,
    intervalMs: config.refreshIntervalMs,
    clock,
    alerts: new AlertEvaluator({
      thresholds: config.thresholds,
      enabled: config.notifications.enabled,
      cooldownMs: config.notifications.cooldownMs,
      clock,
    }),
    history: new SnapshotHistory(config.history.size),
  });
}
