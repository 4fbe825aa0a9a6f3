/**
 * Telemetry Aggregator Implementation
 *
 * Runs one polling cycle: reads the cheap local counters directly, asks each
 * expensive domain's cache for a value, and assembles one frozen Snapshot
 * with a single capture timestamp. A domain failure never fails the cycle;
 * it surfaces as a stale or fallback reading instead.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import { systemClock, type Clock } from '../clock.js';
import { resolveProbeConfiguration } from '../configuration/index.js';
import { ProbeContractError } from '../errors.js';
import {
  extractCpuPower,
  extractEfficiencyCoreCount,
  extractIoregBattery,
  extractPmsetBattery,
  extractPmsetTherm,
  extractProfilerBattery,
  extractSmcFans,
  extractThermalLevel,
} from '../extractors/index.js';
import { ExternalProbe } from '../external-probe/index.js';
import { NodeLocalIntrospection, type LocalIntrospection } from '../local-introspection/index.js';
import {
  createBatteryReconciler,
  createCpuPowerReconciler,
  createThermalReconciler,
  createTopologyReconciler,
} from '../reconciler/index.js';
import { DomainCollector, TTLCache, type CacheReading } from '../ttl-cache/index.js';
import {
  createDefaultBatteryRecord,
  createDefaultThermalRecord,
  type BatteryRecord,
  type ClusterTopology,
  type CpuPowerRecord,
  type DomainReading,
  type MemoryInfo,
  type ProbeConfiguration,
  type ProbeConfigurationOverrides,
  type ProbeRunner,
  type Snapshot,
  type SystemIdentity,
  type ThermalRecord,
} from '../types/index.js';
import { computePerformanceMetrics, computeSystemHealth, estimateCpuPower } from './derived-metrics.js';
import { createProbeCommands } from './probe-commands.js';

const log = createSubsystemLogger('probe/aggregator');

export interface TelemetryAggregatorOptions {
  config?: ProbeConfigurationOverrides;
  runner?: ProbeRunner;
  introspection?: LocalIntrospection;
  clock?: Clock;
}

const UNKNOWN_IDENTITY: SystemIdentity = {
  name: 'Unknown',
  kernelVersion: 'Unknown',
  osVersion: 'Unknown',
  hostName: 'Unknown',
  cpuArch: 'Unknown',
  cpuBrand: 'Unknown',
};

const EMPTY_MEMORY: MemoryInfo = {
  totalMemory: 0,
  usedMemory: 0,
  availableMemory: 0,
  totalSwap: 0,
  usedSwap: 0,
  usagePercentage: 0,
};

/**
 * Freezes a value and everything reachable from it
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function toDomainReading<T>(reading: CacheReading<T>): DomainReading {
  return reading.capturedAt === undefined
    ? { status: reading.status }
    : { status: reading.status, capturedAt: reading.capturedAt };
}

export class TelemetryAggregator {
  private readonly config: ProbeConfiguration;
  private readonly clock: Clock;
  private readonly introspection: LocalIntrospection;
  private readonly batteryCache: TTLCache<BatteryRecord>;
  private readonly cpuPowerCache: TTLCache<CpuPowerRecord, number>;
  private readonly thermalCache: TTLCache<ThermalRecord>;
  private readonly topologyCache?: TTLCache<ClusterTopology>;
  private clusterTopology: ClusterTopology;
  private collecting = false;

  constructor(options: TelemetryAggregatorOptions = {}) {
    this.config = resolveProbeConfiguration(options.config);
    this.clock = options.clock ?? systemClock;
    this.introspection = options.introspection ?? new NodeLocalIntrospection();
    this.clusterTopology = { efficiencyCoreCount: this.config.clusterTopology.efficiencyCoreCount };

    const runner = options.runner ?? new ExternalProbe(this.clock);
    const commands = createProbeCommands(this.config.timeouts);

    const battery = new DomainCollector<BatteryRecord>({
      reconciler: createBatteryReconciler(),
      runner,
      sources: [
        { command: commands['pmset-batt'], extract: extractPmsetBattery },
        { command: commands['system-profiler-power'], extract: extractProfilerBattery },
        { command: commands['ioreg-smart-battery'], extract: extractIoregBattery },
      ],
    });
    this.batteryCache = new TTLCache<BatteryRecord>({
      domain: 'battery',
      ttlMs: this.config.domains.battery.ttlMs,
      clock: this.clock,
      refresh: () => battery.refresh(),
      fallback: createDefaultBatteryRecord,
    });

    const cpuPower = new DomainCollector<CpuPowerRecord>({
      reconciler: createCpuPowerReconciler(),
      runner,
      sources: [
        {
          command: commands['powermetrics-cpu'],
          extract: (text) => extractCpuPower(text, this.clusterTopology),
        },
      ],
    });
    this.cpuPowerCache = new TTLCache<CpuPowerRecord, number>({
      domain: 'cpuPower',
      ttlMs: this.config.domains.cpuPower.ttlMs,
      clock: this.clock,
      refresh: () => cpuPower.refresh(),
      fallback: estimateCpuPower,
    });

    const thermal = new DomainCollector<ThermalRecord>({
      reconciler: createThermalReconciler(),
      runner,
      sources: [
        { command: commands['sysctl-thermal-level'], extract: extractThermalLevel },
        { command: commands['powermetrics-smc'], extract: extractSmcFans },
        { command: commands['pmset-therm'], extract: extractPmsetTherm },
      ],
    });
    this.thermalCache = new TTLCache<ThermalRecord>({
      domain: 'thermal',
      ttlMs: this.config.domains.thermal.ttlMs,
      clock: this.clock,
      refresh: () => thermal.refresh(),
      fallback: createDefaultThermalRecord,
    });

    if (this.config.clusterTopology.discover) {
      const configured = { ...this.clusterTopology };
      const topology = new DomainCollector<ClusterTopology>({
        reconciler: createTopologyReconciler(configured),
        runner,
        sources: [{ command: commands['sysctl-perflevel'], extract: extractEfficiencyCoreCount }],
      });
      // the core layout does not change while the process runs; a failed
      // discovery is retried at the cpuPower cadence
      this.topologyCache = new TTLCache<ClusterTopology>({
        domain: 'topology',
        ttlMs: Number.POSITIVE_INFINITY,
        fallbackTtlMs: this.config.domains.cpuPower.ttlMs,
        clock: this.clock,
        refresh: () => topology.refresh(),
        fallback: () => ({ ...configured }),
      });
    }

    log.debug('Telemetry aggregator initialized', {
      ttls: this.config.domains,
      timeouts: this.config.timeouts,
      clusterTopology: this.config.clusterTopology,
    });
  }

  /**
   * The validated configuration this aggregator runs with
   */
  getConfiguration(): ProbeConfiguration {
    return structuredClone(this.config);
  }

  getClusterTopology(): ClusterTopology {
    return { ...this.clusterTopology };
  }

  /**
   * Collects one snapshot. Must not be called again before the previous
   * call has settled.
   */
  async collect(): Promise<Snapshot> {
    if (this.collecting) {
      throw new ProbeContractError('collect() is already running on this aggregator');
    }
    this.collecting = true;

    try {
      const coreUsages = this.readLocal('core usages', () => this.introspection.sampleCoreUsages(), []);
      const averageUsage =
        coreUsages.length > 0 ? coreUsages.reduce((sum, usage) => sum + usage, 0) / coreUsages.length : 0;
      const system = this.readLocal('identity', () => this.introspection.identity(), UNKNOWN_IDENTITY);
      const memory = this.readLocal('memory', () => this.introspection.memory(), EMPTY_MEMORY);
      const network = this.readLocal('network', () => this.introspection.networkInterfaces(), []);
      const temperatures = this.readLocal('temperatures', () => this.introspection.temperatures(), []);
      const processes = this.readLocal('processes', () => this.introspection.processes(), []);
      const loadAverages = this.readLocal<[number, number, number]>(
        'load averages',
        () => this.introspection.loadAverages(),
        [0, 0, 0],
      );
      const uptimeSeconds = this.readLocal('uptime', () => this.introspection.uptimeSeconds(), 0);

      if (this.topologyCache) {
        this.clusterTopology = (await this.topologyCache.getOrRefresh()).value;
      }

      const [battery, cpuPower, thermal] = await Promise.all([
        this.batteryCache.getOrRefresh(),
        this.cpuPowerCache.getOrRefresh(averageUsage),
        this.thermalCache.getOrRefresh(),
      ]);

      const snapshot: Snapshot = {
        capturedAt: this.clock.now(),
        system,
        cpu: { coreUsages, averageUsage, power: cpuPower.value },
        memory,
        network,
        temperatures,
        processes,
        battery: battery.value,
        thermal: thermal.value,
        performance: computePerformanceMetrics(averageUsage, cpuPower.value),
        health: computeSystemHealth(loadAverages, uptimeSeconds),
        domains: {
          battery: toDomainReading(battery),
          cpuPower: toDomainReading(cpuPower),
          thermal: toDomainReading(thermal),
        },
      };

      log.trace('Snapshot assembled', {
        capturedAt: snapshot.capturedAt,
        domains: snapshot.domains,
      });

      return deepFreeze(snapshot);
    } finally {
      this.collecting = false;
    }
  }

  private readLocal<T>(what: string, read: () => T, fallback: T): T {
    try {
      return read();
    } catch (error) {
      log.warn(`Failed to read local ${what}`, { error: error instanceof Error ? error.message : String(error) });
      return fallback;
    }
  }
}
