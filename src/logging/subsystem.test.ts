/**
 * Unit Tests for subsystem logging
 */

import { describe, it, expect } from 'vitest';
import { createSubsystemLogger, parseLogLevel } from './subsystem.js';

describe('parseLogLevel', () => {
  it('should accept known levels regardless of case and padding', () => {
    expect(parseLogLevel('debug')).toBe('debug');
    expect(parseLogLevel(' WARN ')).toBe('warn');
  });

  it('should fall back to info', () => {
    expect(parseLogLevel(undefined)).toBe('info');
    expect(parseLogLevel('verbose')).toBe('info');
  });
});

describe('createSubsystemLogger', () => {
  it('should name child loggers under their parent', () => {
    const logger = createSubsystemLogger('probe');

    expect(logger.subsystem).toBe('probe');
    expect(logger.child('battery').subsystem).toBe('probe/battery');
  });

  it('should accept records with and without metadata', () => {
    const logger = createSubsystemLogger('probe/test');

    expect(() => {
      logger.info('collected');
      logger.warn('probe failed', { source: 'pmset-batt' });
    }).not.toThrow();
  });
});
