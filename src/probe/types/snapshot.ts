/**
 * Snapshot Interface
 *
 * The complete, immutable result of one polling cycle.
 */

import type { BatteryRecord } from './battery.js';
import type { CpuPowerRecord } from './cpu-power.js';
import type { ThermalRecord } from './thermal.js';

/** Telemetry categories that are collected through external probes and cached */
export type CachedDomain = 'battery' | 'cpuPower' | 'thermal';

/**
 * How a domain value reached the snapshot: probed this cycle, served from a
 * cache entry within its TTL, served from an expired entry after a failed
 * refresh, or synthesized because no probe has succeeded yet.
 */
export type ReadingStatus = 'fresh' | 'cached' | 'stale' | 'fallback';

export interface DomainReading {
  status: ReadingStatus;
  /** Epoch ms of the probe that produced the value; undefined for fallbacks */
  capturedAt?: number;
}

export interface SystemIdentity {
  name: string;
  kernelVersion: string;
  osVersion: string;
  hostName: string;
  cpuArch: string;
  cpuBrand: string;
}

export interface CpuInfo {
  /** Per-core utilization (0-100) */
  coreUsages: number[];
  averageUsage: number;
  power: CpuPowerRecord;
}

export interface MemoryInfo {
  /** All sizes in bytes */
  totalMemory: number;
  usedMemory: number;
  availableMemory: number;
  totalSwap: number;
  usedSwap: number;
  /** Used / total (0-100, integer) */
  usagePercentage: number;
}

export interface NetworkInterfaceCounters {
  name: string;
  bytesReceived: number;
  bytesTransmitted: number;
  packetsReceived: number;
  packetsTransmitted: number;
}

export interface TemperatureReading {
  label: string;
  /** Celsius */
  temperature: number;
  criticalTemperature: number;
}

export interface ProcessStats {
  pid: number;
  name: string;
  cpuUsage: number;
  /** Resident set size in bytes */
  memoryUsage: number;
}

export type WorkloadType = 'idle' | 'graphics' | 'compute' | 'mixed';

export interface PerformanceMetrics {
  /** Proxy: utilization-scaled instruction estimate per package watt */
  instructionsPerWatt: number;
  performancePerWatt: number;
  frequencyEfficiency: number;
  workloadType: WorkloadType;
}

export interface SystemHealth {
  uptimeSeconds: number;
  loadAverage1: number;
  loadAverage5: number;
  loadAverage15: number;
  /** 0-100 */
  powerQualityScore: number;
  sleepWakeEfficiency: number;
}

export interface Snapshot {
  /** Epoch ms; one timestamp for the whole cycle */
  capturedAt: number;
  system: SystemIdentity;
  cpu: CpuInfo;
  memory: MemoryInfo;
  network: NetworkInterfaceCounters[];
  temperatures: TemperatureReading[];
  processes: ProcessStats[];
  battery: BatteryRecord;
  thermal: ThermalRecord;
  performance: PerformanceMetrics;
  health: SystemHealth;
  domains: Record<CachedDomain, DomainReading>;
}
