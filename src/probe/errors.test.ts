/**
 * Unit Tests for probe errors
 */

import { describe, it, expect } from 'vitest';
import { ProbeConfigurationError, ProbeContractError, describeProbeFailure } from './errors.js';

describe('describeProbeFailure', () => {
  it('should describe a timeout', () => {
    expect(describeProbeFailure({ kind: 'timeout', source: 'powermetrics-cpu', timeoutMs: 4000 })).toBe(
      'powermetrics-cpu timed out after 4000ms',
    );
  });

  it('should describe a launch failure', () => {
    expect(
      describeProbeFailure({ kind: 'launch-failure', source: 'ioreg-smart-battery', message: 'spawn ioreg ENOENT' }),
    ).toBe('ioreg-smart-battery could not be launched: spawn ioreg ENOENT');
  });

  it('should include trimmed stderr for a non-zero exit', () => {
    expect(
      describeProbeFailure({ kind: 'non-zero-exit', source: 'pmset-batt', code: 2, stderr: '  usage: pmset\n' }),
    ).toBe('pmset-batt exited with code 2: usage: pmset');
  });

  it('should omit empty stderr', () => {
    expect(describeProbeFailure({ kind: 'non-zero-exit', source: 'pmset-therm', code: 1, stderr: '\n' })).toBe(
      'pmset-therm exited with code 1',
    );
  });
});

describe('error classes', () => {
  it('should list every configuration problem', () => {
    const error = new ProbeConfigurationError(['History size must be a positive integer', 'Bad TTL']);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ProbeConfigurationError');
    expect(error.problems).toEqual(['History size must be a positive integer', 'Bad TTL']);
    expect(error.message).toBe('Invalid probe configuration: History size must be a positive integer; Bad TTL');
  });

  it('should name contract violations', () => {
    const error = new ProbeContractError('collect() is already running on this aggregator');

    expect(error.name).toBe('ProbeContractError');
    expect(error.message).toBe('collect() is already running on this aggregator');
  });
});
