/**
 * Probe Errors
 *
 * Runtime data-source failures are values (see ProbeFailure); only contract
 * violations are thrown.
 */

import type { ProbeFailure } from './types/index.js';

/** A configuration or priority table that cannot be honoured */
export class ProbeConfigurationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid probe configuration: ${problems.join('; ')}`);
    this.name = 'ProbeConfigurationError';
    this.problems = problems;
  }
}

/** An API used outside its contract, e.g. overlapping collect() calls */
export class ProbeContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProbeContractError';
  }
}

export function describeProbeFailure(failure: ProbeFailure): string {
  switch (failure.kind) {
    case 'timeout':
      return `${failure.source} timed out after ${failure.timeoutMs}ms`;
    case 'launch-failure':
      return `${failure.source} could not be launched: ${failure.message}`;
    case 'non-zero-exit': {
      const detail = failure.stderr.trim();
      return detail
        ? `${failure.source} exited with code ${failure.code}: ${detail}`
        : `${failure.source} exited with code ${failure.code}`;
    }
  }
}
