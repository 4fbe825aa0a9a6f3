/**
 * Probe Command Catalog
 *
 * The fixed set of diagnostic invocations, with wait bounds taken from the
 * configuration.
 */

import type { ProbeCommand, ProbeTimeouts, SourceId } from '../types/index.js';

export function createProbeCommands(timeouts: ProbeTimeouts): Record<SourceId, ProbeCommand> {
  return {
    'pmset-batt': {
      source: 'pmset-batt',
      program: 'pmset',
      args: ['-g', 'batt'],
      timeoutMs: timeouts.pmset,
    },
    'system-profiler-power': {
      source: 'system-profiler-power',
      program: 'system_profiler',
      args: ['SPPowerDataType'],
      timeoutMs: timeouts.systemProfiler,
    },
    'ioreg-smart-battery': {
      source: 'ioreg-smart-battery',
      program: 'ioreg',
      args: ['-rn', 'AppleSmartBattery'],
      timeoutMs: timeouts.ioreg,
    },
    'powermetrics-cpu': {
      source: 'powermetrics-cpu',
      program: 'powermetrics',
      args: ['--samplers', 'cpu_power,gpu_power', '-n', '1', '-i', '1000'],
      timeoutMs: timeouts.powermetrics,
    },
    'powermetrics-smc': {
      source: 'powermetrics-smc',
      program: 'powermetrics',
      args: ['--samplers', 'smc', '-n', '1', '-i', '500'],
      timeoutMs: timeouts.powermetrics,
    },
    'sysctl-thermal-level': {
      source: 'sysctl-thermal-level',
      program: 'sysctl',
      args: ['-n', 'machdep.xcpm.cpu_thermal_level'],
      timeoutMs: timeouts.sysctl,
    },
    'pmset-therm': {
      source: 'pmset-therm',
      program: 'pmset',
      args: ['-g', 'therm'],
      timeoutMs: timeouts.pmset,
    },
    'sysctl-perflevel': {
      source: 'sysctl-perflevel',
      program: 'sysctl',
      args: ['-n', 'hw.perflevel1.logicalcpu'],
      timeoutMs: timeouts.sysctl,
    },
  };
}
