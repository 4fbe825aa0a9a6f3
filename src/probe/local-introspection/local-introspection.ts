/**
 * Local Introspection Implementation
 *
 * Cheap, synchronous host queries that are read fresh on every cycle: CPU
 * utilization, memory, network counters, thermal sensors, the process table,
 * load and uptime. Each query degrades to an empty or zero result instead of
 * throwing.
 */

import * as os from 'node:os';
import { existsSync, readFileSync, readdirSync } from 'node:fs';
import { execFileSync } from 'node:child_process';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import type {
  MemoryInfo,
  NetworkInterfaceCounters,
  ProcessStats,
  SystemIdentity,
  TemperatureReading,
} from '../types/index.js';

const log = createSubsystemLogger('probe/local');

/** Timeout for the few quick tools this module shells out to */
const QUICK_COMMAND_TIMEOUT_MS = 1000;
const DEFAULT_CRITICAL_TEMPERATURE = 100;

export interface LocalIntrospection {
  identity(): SystemIdentity;
  /** Per-core utilization (0-100) since the previous call; zeros on the first */
  sampleCoreUsages(): number[];
  memory(): MemoryInfo;
  networkInterfaces(): NetworkInterfaceCounters[];
  temperatures(): TemperatureReading[];
  processes(): ProcessStats[];
  loadAverages(): [number, number, number];
  uptimeSeconds(): number;
}

export interface CoreTimes {
  idle: number;
  total: number;
}

export function toCoreTimes(cpus: os.CpuInfo[]): CoreTimes[] {
  return cpus.map(({ times }) => ({
    idle: times.idle,
    total: times.user + times.nice + times.sys + times.irq + times.idle,
  }));
}

/**
 * Utilization per core from the tick delta between two samples
 */
export function computeCoreUsages(previous: CoreTimes[] | undefined, current: CoreTimes[]): number[] {
  if (!previous || previous.length !== current.length) {
    return current.map(() => 0);
  }
  return current.map((sample, index) => {
    const totalDelta = sample.total - previous[index].total;
    const idleDelta = sample.idle - previous[index].idle;
    if (totalDelta <= 0) return 0;
    return Math.max(0, Math.min(100, ((totalDelta - idleDelta) / totalDelta) * 100));
  });
}

/**
 * Parses `/proc/net/dev`
 */
export function parseProcNetDev(content: string): NetworkInterfaceCounters[] {
  const interfaces: NetworkInterfaceCounters[] = [];
  for (const line of content.split('\n')) {
    const separator = line.indexOf(':');
    if (separator < 0) continue;
    const name = line.slice(0, separator).trim();
    const values = line.slice(separator + 1).trim().split(/\s+/).map(Number);
    if (!name || values.length < 10 || values.some((value) => !Number.isFinite(value))) continue;
    interfaces.push({
      name,
      bytesReceived: values[0],
      packetsReceived: values[1],
      bytesTransmitted: values[8],
      packetsTransmitted: values[9],
    });
  }
  return interfaces;
}

/**
 * Parses `netstat -ibn`, keeping one link-level row per interface. Columns
 * are read from the right because the address column is sometimes empty.
 */
export function parseNetstat(content: string): NetworkInterfaceCounters[] {
  const seen = new Set<string>();
  const interfaces: NetworkInterfaceCounters[] = [];
  for (const line of content.split('\n')) {
    if (!line.includes('<Link#')) continue;
    const columns = line.trim().split(/\s+/);
    const name = columns[0];
    if (seen.has(name) || columns.length < 10) continue;
    const at = (offset: number): number => Number(columns[columns.length - offset]);
    const counters = {
      name,
      packetsReceived: at(7),
      bytesReceived: at(5),
      packetsTransmitted: at(4),
      bytesTransmitted: at(2),
    };
    if (
      !Number.isFinite(counters.packetsReceived) ||
      !Number.isFinite(counters.bytesReceived) ||
      !Number.isFinite(counters.packetsTransmitted) ||
      !Number.isFinite(counters.bytesTransmitted)
    ) {
      continue;
    }
    seen.add(name);
    interfaces.push(counters);
  }
  return interfaces;
}

const PS_ROW = /^\s*(\d+)\s+([\d.]+)\s+(\d+)\s+(.+)$/;

/**
 * Parses `ps -axo pid=,pcpu=,rss=,comm=` (rss in KiB)
 */
export function parsePsOutput(content: string): ProcessStats[] {
  const processes: ProcessStats[] = [];
  for (const line of content.split('\n')) {
    const match = PS_ROW.exec(line);
    if (!match) continue;
    const command = match[4].trim();
    processes.push({
      pid: Number.parseInt(match[1], 10),
      name: command.split('/').pop() || command,
      cpuUsage: Number.parseFloat(match[2]),
      memoryUsage: Number.parseInt(match[3], 10) * 1024,
    });
  }
  return processes;
}

const SWAP_USAGE = /total\s*=\s*([\d.]+)M\s+used\s*=\s*([\d.]+)M/;

/**
 * Parses `sysctl -n vm.swapusage`, e.g. `total = 2048.00M  used = 1024.00M  free = 1024.00M`
 */
export function parseSwapUsage(content: string): { total: number; used: number } | undefined {
  const match = SWAP_USAGE.exec(content);
  if (!match) return undefined;
  const mib = 1024 * 1024;
  return {
    total: Math.round(Number.parseFloat(match[1]) * mib),
    used: Math.round(Number.parseFloat(match[2]) * mib),
  };
}

const VM_PAGE_SIZE = /page size of (\d+) bytes/;
const VM_PAGES = /^Pages (free|inactive|speculative):\s+(\d+)\./gm;

/**
 * Bytes the kernel can hand out without swapping, from `vm_stat`: free,
 * inactive and speculative pages. `os.freemem()` on macOS counts free pages
 * only.
 */
export function parseVmStatAvailable(content: string): number | undefined {
  const pageSize = VM_PAGE_SIZE.exec(content);
  if (!pageSize) return undefined;

  let pages = 0;
  let freeSeen = false;
  for (const match of content.matchAll(VM_PAGES)) {
    pages += Number.parseInt(match[2], 10);
    if (match[1] === 'free') freeSeen = true;
  }
  return freeSeen ? pages * Number.parseInt(pageSize[1], 10) : undefined;
}

/**
 * Introspection backed by node:os, procfs/sysfs on Linux and a couple of
 * quick BSD tools on macOS.
 */
export class NodeLocalIntrospection implements LocalIntrospection {
  private previousCoreTimes?: CoreTimes[];

  identity(): SystemIdentity {
    return {
      name: os.type(),
      kernelVersion: os.release(),
      osVersion: os.version(),
      hostName: os.hostname(),
      cpuArch: os.arch(),
      cpuBrand: os.cpus()[0]?.model ?? 'Unknown',
    };
  }

  sampleCoreUsages(): number[] {
    const current = toCoreTimes(os.cpus());
    const usages = computeCoreUsages(this.previousCoreTimes, current);
    this.previousCoreTimes = current;
    return usages;
  }

  memory(): MemoryInfo {
    const totalMemory = os.totalmem();
    const availableMemory = Math.min(totalMemory, this.readAvailableMemory());
    const usedMemory = Math.max(0, totalMemory - availableMemory);
    const swap = this.readSwap();

    return {
      totalMemory,
      usedMemory,
      availableMemory,
      totalSwap: swap.total,
      usedSwap: swap.used,
      usagePercentage: totalMemory > 0 ? Math.floor((usedMemory / totalMemory) * 100) : 0,
    };
  }

  networkInterfaces(): NetworkInterfaceCounters[] {
    try {
      if (existsSync('/proc/net/dev')) {
        return parseProcNetDev(readFileSync('/proc/net/dev', 'utf8'));
      }
      if (os.platform() === 'darwin') {
        return parseNetstat(this.runQuick('netstat', ['-ibn']));
      }
      return [];
    } catch (error) {
      log.warn('Failed to read network counters', { error: String(error) });
      return [];
    }
  }

  temperatures(): TemperatureReading[] {
    const root = '/sys/class/thermal';
    try {
      if (!existsSync(root)) {
        return [];
      }
      const readings: TemperatureReading[] = [];
      for (const zone of readdirSync(root).filter((entry) => entry.startsWith('thermal_zone')).sort()) {
        const tempPath = `${root}/${zone}/temp`;
        if (!existsSync(tempPath)) continue;
        const milliC = Number.parseInt(readFileSync(tempPath, 'utf8').trim(), 10);
        if (!Number.isFinite(milliC)) continue;
        const typePath = `${root}/${zone}/type`;
        const label = existsSync(typePath) ? readFileSync(typePath, 'utf8').trim() : zone;
        readings.push({
          label,
          temperature: milliC / 1000,
          criticalTemperature: DEFAULT_CRITICAL_TEMPERATURE,
        });
      }
      return readings;
    } catch (error) {
      log.warn('Failed to read thermal sensors', { error: String(error) });
      return [];
    }
  }

  processes(): ProcessStats[] {
    try {
      return parsePsOutput(this.runQuick('ps', ['-axo', 'pid=,pcpu=,rss=,comm=']));
    } catch (error) {
      log.warn('Failed to read process table', { error: String(error) });
      return [];
    }
  }

  loadAverages(): [number, number, number] {
    const [one = 0, five = 0, fifteen = 0] = os.loadavg();
    return [one, five, fifteen];
  }

  uptimeSeconds(): number {
    return Math.floor(os.uptime());
  }

  private readAvailableMemory(): number {
    if (os.platform() !== 'darwin') {
      return os.freemem();
    }
    try {
      const available = parseVmStatAvailable(this.runQuick('vm_stat', []));
      if (available !== undefined) {
        return available;
      }
      log.warn('Unrecognized vm_stat output, using free pages only');
    } catch (error) {
      log.warn('Failed to read vm_stat', { error: String(error) });
    }
    return os.freemem();
  }

  private readSwap(): { total: number; used: number } {
    try {
      if (existsSync('/proc/meminfo')) {
        const lines = readFileSync('/proc/meminfo', 'utf8').split('\n');
        const getMemValue = (key: string): number => {
          const line = lines.find((l) => l.startsWith(key));
          const match = line?.match(/(\d+)/);
          return match ? Number.parseInt(match[1], 10) * 1024 : 0;
        };
        const total = getMemValue('SwapTotal:');
        return { total, used: Math.max(0, total - getMemValue('SwapFree:')) };
      }
      if (os.platform() === 'darwin') {
        return parseSwapUsage(this.runQuick('sysctl', ['-n', 'vm.swapusage'])) ?? { total: 0, used: 0 };
      }
    } catch (error) {
      log.warn('Failed to read swap usage', { error: String(error) });
    }
    return { total: 0, used: 0 };
  }

  private runQuick(program: string, args: string[]): string {
    return execFileSync(program, args, {
      encoding: 'utf8',
      timeout: QUICK_COMMAND_TIMEOUT_MS,
      stdio: ['ignore', 'pipe', 'ignore'],
    });
  }
}
