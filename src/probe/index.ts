/**
 * powerprobe
 *
 * Live power, battery and CPU-power telemetry for the local host.
 */

import { createSubsystemLogger } from '../logging/subsystem.js';
import { TelemetryAggregator, type TelemetryAggregatorOptions } from './aggregator/index.js';
import type { Snapshot } from './types/index.js';

export * from './types/index.js';
export * from './clock.js';
export * from './errors.js';
export * from './external-probe/index.js';
export * from './extractors/index.js';
export * from './reconciler/index.js';
export * from './ttl-cache/index.js';
export * from './configuration/index.js';
export * from './local-introspection/index.js';
export * from './aggregator/index.js';
export * from './alerts/index.js';
export * from './history/index.js';
export * from './monitor/index.js';

const log = createSubsystemLogger('probe');

/**
 * Collects a single snapshot with a throwaway aggregator. Every cache starts
 * cold, so all probes run.
 */
export async function collectSnapshotOnce(options: TelemetryAggregatorOptions = {}): Promise<Snapshot> {
  const aggregator = new TelemetryAggregator(options);
  const snapshot = await aggregator.collect();
  log.debug('One-shot snapshot collected', { domains: snapshot.domains });
  return snapshot;
}
