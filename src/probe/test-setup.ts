/**
 * Shared Test Utilities
 *
 * A manually advanced clock, a scripted probe runner, a fake local
 * introspection source, sample tool captures and fast-check generators.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import * as fc from 'fast-check';
import type { CancelTimer, Clock } from './clock.js';
import { computePerformanceMetrics, computeSystemHealth } from './aggregator/derived-metrics.js';
import type { LocalIntrospection } from './local-introspection/index.js';
import type {
  BatteryFacts,
  HealthBasis,
  HealthReading,
  MemoryInfo,
  NetworkInterfaceCounters,
  ProbeCommand,
  ProbeFailure,
  ProbeResult,
  ProbeRunner,
  ProcessStats,
  Snapshot,
  SourceId,
  SystemIdentity,
  TemperatureReading,
  ThresholdSettings,
} from './types/index.js';
import {
  createDefaultBatteryRecord,
  createDefaultCpuPowerRecord,
  createDefaultThermalRecord,
} from './types/index.js';

export type SampleCapture =
  | 'pmset-batt-charging'
  | 'pmset-batt-discharging'
  | 'system-profiler-power'
  | 'ioreg-smart-battery'
  | 'powermetrics-cpu'
  | 'powermetrics-smc'
  | 'pmset-therm-nominal'
  | 'pmset-therm-limited';

/**
 * Reads a captured tool output from `__fixtures__`
 */
export function loadSampleCapture(name: SampleCapture): string {
  return readFileSync(fileURLToPath(new URL(`./__fixtures__/${name}.txt`, import.meta.url)), 'utf8');
}

/**
 * Lets pending promise callbacks and already-resolved awaits run
 */
export function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

interface ScheduledTimer {
  id: number;
  dueAt: number;
  callback: () => void;
}

/**
 * Clock that only moves when told to. Timers fire in due order during
 * `advance`.
 */
export class ManualClock implements Clock {
  private current: number;
  private timers: ScheduledTimer[] = [];
  private nextId = 0;

  constructor(start = 1_700_000_000_000) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  schedule(callback: () => void, delayMs: number): CancelTimer {
    const id = this.nextId++;
    this.timers.push({ id, dueAt: this.current + delayMs, callback });
    return () => {
      this.timers = this.timers.filter((timer) => timer.id !== id);
    };
  }

  advance(ms: number): void {
    const target = this.current + ms;
    for (;;) {
      const due = this.timers
        .filter((timer) => timer.dueAt <= target)
        .sort((a, b) => a.dueAt - b.dueAt || a.id - b.id)[0];
      if (!due) break;
      this.timers = this.timers.filter((timer) => timer.id !== due.id);
      this.current = Math.max(this.current, due.dueAt);
      due.callback();
    }
    this.current = target;
  }

  get pendingTimers(): number {
    return this.timers.length;
  }
}

type ScriptedResponse = (command: ProbeCommand) => ProbeResult | Promise<ProbeResult>;

/**
 * Probe runner answering from a per-source script. Unscripted sources fail
 * to launch, the way a missing tool does.
 */
export class ScriptedProbeRunner implements ProbeRunner {
  readonly calls: ProbeCommand[] = [];
  private readonly responses = new Map<SourceId, ScriptedResponse>();

  constructor(private readonly clock: Clock = { now: () => 0, schedule: () => () => undefined }) {}

  succeed(source: SourceId, text: string): this {
    this.responses.set(source, () => ({
      ok: true,
      output: { source, text, capturedAt: this.clock.now(), exitCode: 0 },
    }));
    return this;
  }

  fail(source: SourceId, failure: ProbeFailure): this {
    this.responses.set(source, () => ({ ok: false, failure }));
    return this;
  }

  respond(source: SourceId, response: ScriptedResponse): this {
    this.responses.set(source, response);
    return this;
  }

  async run(command: ProbeCommand): Promise<ProbeResult> {
    this.calls.push(command);
    const response = this.responses.get(command.source);
    if (!response) {
      return {
        ok: false,
        failure: { kind: 'launch-failure', source: command.source, message: `spawn ${command.program} ENOENT` },
      };
    }
    return response(command);
  }

  callsFor(source: SourceId): number {
    return this.calls.filter((command) => command.source === source).length;
  }
}

export const testIdentity: SystemIdentity = {
  name: 'Darwin',
  kernelVersion: '23.1.0',
  osVersion: 'Darwin Kernel Version 23.1.0',
  hostName: 'test-host',
  cpuArch: 'arm64',
  cpuBrand: 'Test CPU',
};

/**
 * Introspection source whose readings are plain fields
 */
export class FakeIntrospection implements LocalIntrospection {
  coreUsages: number[] = [20, 40, 60, 80];
  memoryInfo: MemoryInfo = {
    totalMemory: 16_000,
    usedMemory: 8_000,
    availableMemory: 8_000,
    totalSwap: 0,
    usedSwap: 0,
    usagePercentage: 50,
  };
  interfaces: NetworkInterfaceCounters[] = [];
  sensors: TemperatureReading[] = [];
  processTable: ProcessStats[] = [];
  loads: [number, number, number] = [0.5, 0.5, 0.5];
  uptime = 3600;

  identity(): SystemIdentity {
    return { ...testIdentity };
  }

  sampleCoreUsages(): number[] {
    return [...this.coreUsages];
  }

  memory(): MemoryInfo {
    return { ...this.memoryInfo };
  }

  networkInterfaces(): NetworkInterfaceCounters[] {
    return this.interfaces.map((nic) => ({ ...nic }));
  }

  temperatures(): TemperatureReading[] {
    return this.sensors.map((sensor) => ({ ...sensor }));
  }

  processes(): ProcessStats[] {
    return this.processTable.map((process) => ({ ...process }));
  }

  loadAverages(): [number, number, number] {
    return [...this.loads];
  }

  uptimeSeconds(): number {
    return this.uptime;
  }
}

export interface TestSnapshotOptions {
  capturedAt?: number;
  averageUsage?: number;
  memoryPercentage?: number;
  temperatures?: TemperatureReading[];
  network?: NetworkInterfaceCounters[];
}

/**
 * A plausible snapshot with only the headline numbers chosen by the test
 */
export function createTestSnapshot(options: TestSnapshotOptions = {}): Snapshot {
  const averageUsage = options.averageUsage ?? 10;
  const power = createDefaultCpuPowerRecord();
  return {
    capturedAt: options.capturedAt ?? 1_700_000_000_000,
    system: { ...testIdentity },
    cpu: { coreUsages: [averageUsage], averageUsage, power },
    memory: {
      totalMemory: 16_000,
      usedMemory: 160 * (options.memoryPercentage ?? 40),
      availableMemory: 16_000 - 160 * (options.memoryPercentage ?? 40),
      totalSwap: 0,
      usedSwap: 0,
      usagePercentage: options.memoryPercentage ?? 40,
    },
    network: options.network ?? [],
    temperatures: options.temperatures ?? [],
    processes: [],
    battery: createDefaultBatteryRecord(),
    thermal: createDefaultThermalRecord(),
    performance: computePerformanceMetrics(averageUsage, power),
    health: computeSystemHealth([0.5, 0.5, 0.5], 3600),
    domains: {
      battery: { status: 'fallback' },
      cpuPower: { status: 'fallback' },
      thermal: { status: 'fallback' },
    },
  };
}

export const defaultTestThresholds: ThresholdSettings = {
  cpuWarning: 75,
  cpuCritical: 90,
  memoryWarning: 75,
  memoryCritical: 90,
  temperatureWarning: 70,
  temperatureCritical: 85,
};

/**
 * Fast-check generators
 */

export const healthReadingArbitrary: fc.Arbitrary<HealthReading> = fc.record({
  percent: fc.integer({ min: 0, max: 100 }),
  basis: fc.constantFrom<HealthBasis>('unknown', 'capacity-ratio', 'condition', 'direct'),
});

export const batteryFactsArbitrary: fc.Arbitrary<BatteryFacts> = fc.record(
  {
    percentage: fc.integer({ min: 0, max: 100 }),
    charging: fc.boolean(),
    plugged: fc.boolean(),
    timeRemainingSeconds: fc.option(fc.integer({ min: 0, max: 24 * 3600 }), { nil: null }),
    health: healthReadingArbitrary,
    cycleCount: fc.integer({ min: 0, max: 2000 }),
    currentCapacity: fc.integer({ min: 0, max: 10_000 }),
    designCapacity: fc.integer({ min: 1, max: 10_000 }),
    adapterWattage: fc.integer({ min: 0, max: 140 }),
  },
  { requiredKeys: [] },
);

/** Lines that look nothing like any tool output the extractors know */
export const unrelatedTextArbitrary: fc.Arbitrary<string> = fc
  .array(fc.stringMatching(/^[bcdxyz0-9 ]{0,30}$/), { maxLength: 8 })
  .map((lines) => lines.join('\n'));

export const coreUsagesArbitrary: fc.Arbitrary<number[]> = fc.array(
  fc.double({ min: 0, max: 100, noNaN: true }),
  { minLength: 1, maxLength: 16 },
);

/**
 * Test configuration for property-based tests
 */
export const propertyTestConfig = {
  numRuns: 50,
};
