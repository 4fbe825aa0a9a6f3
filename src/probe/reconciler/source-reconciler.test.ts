/**
 * Unit Tests for SourceReconciler
 */

import { describe, it, expect } from 'vitest';
import { SourceReconciler, validatePriorityTable, type ReconcilerSpec } from './source-reconciler.js';
import { ProbeConfigurationError } from '../errors.js';
import type { SourceId } from '../types/index.js';

interface Sample {
  level: number;
  label: string;
  ready: boolean;
}

const defaults = (): Sample => ({ level: 0, label: 'none', ready: false });

function createSpec(overrides: Partial<ReconcilerSpec<Sample>> = {}): ReconcilerSpec<Sample> {
  return {
    domain: 'sample',
    defaults,
    contributions: [
      { source: 'ioreg-smart-battery', priority: 1, fields: ['level', 'label'] },
      { source: 'pmset-batt', priority: 0, fields: ['level', 'label', 'ready'] },
    ],
    ...overrides,
  };
}

function records(entries: Array<[SourceId, Partial<Sample>]>): Map<SourceId, Partial<Sample>> {
  return new Map(entries);
}

describe('SourceReconciler', () => {
  describe('merge', () => {
    it('should take a field from the higher priority source when both produced it', () => {
      const reconciler = new SourceReconciler(createSpec());

      const merged = reconciler.merge(
        records([
          ['pmset-batt', { level: 5 }],
          ['ioreg-smart-battery', { level: 7 }],
        ]),
      );

      expect(merged.level).toBe(7);
    });

    it('should keep the lower priority value when the higher priority source is silent', () => {
      const reconciler = new SourceReconciler(createSpec());

      const merged = reconciler.merge(
        records([
          ['pmset-batt', { level: 5 }],
          ['ioreg-smart-battery', { label: 'registry' }],
        ]),
      );

      expect(merged).toEqual({ level: 5, label: 'registry', ready: false });
    });

    it('should return the defaults when no source produced anything', () => {
      const reconciler = new SourceReconciler(createSpec());

      expect(reconciler.merge(new Map())).toEqual(defaults());
    });

    it('should ignore fields a source is not declared to contribute', () => {
      const reconciler = new SourceReconciler(createSpec());

      const merged = reconciler.merge(records([['ioreg-smart-battery', { ready: true }]]));

      expect(merged.ready).toBe(false);
    });

    it('should ignore records from sources missing from the table', () => {
      const reconciler = new SourceReconciler(createSpec());

      const merged = reconciler.merge(records([['pmset-therm', { level: 9 }]]));

      expect(merged).toEqual(defaults());
    });

    it('should consult the guard before replacing a merged value', () => {
      const reconciler = new SourceReconciler(
        createSpec({ guards: { level: (current, incoming) => incoming > current } }),
      );

      const merged = reconciler.merge(
        records([
          ['pmset-batt', { level: 8 }],
          ['ioreg-smart-battery', { level: 3 }],
        ]),
      );

      expect(merged.level).toBe(8);
    });

    it('should run finalize on the merged record', () => {
      const reconciler = new SourceReconciler(
        createSpec({ finalize: (record) => ({ ...record, ready: record.level > 0 }) }),
      );

      expect(reconciler.merge(records([['pmset-batt', { level: 1 }]])).ready).toBe(true);
      expect(reconciler.merge(new Map()).ready).toBe(false);
    });

    it('should start every merge from a fresh default record', () => {
      const reconciler = new SourceReconciler(createSpec());

      reconciler.merge(records([['pmset-batt', { level: 4 }]]));

      expect(reconciler.merge(new Map()).level).toBe(0);
    });
  });

  describe('sources', () => {
    it('should list sources in ascending priority', () => {
      expect(new SourceReconciler(createSpec()).sources).toEqual(['pmset-batt', 'ioreg-smart-battery']);
    });
  });

  describe('validation', () => {
    it('should reject a table with duplicate sources and priorities', () => {
      const spec = createSpec({
        contributions: [
          { source: 'pmset-batt', priority: 0, fields: ['level'] },
          { source: 'pmset-batt', priority: 0, fields: ['label'] },
        ],
      });

      expect(validatePriorityTable(spec)).toEqual([
        'sample: source pmset-batt is listed twice',
        'sample: priority 0 is used by more than one source',
      ]);
      expect(() => new SourceReconciler(spec)).toThrow(ProbeConfigurationError);
    });

    it('should reject an empty table', () => {
      expect(validatePriorityTable(createSpec({ contributions: [] }))).toEqual([
        'sample: at least one source must contribute',
      ]);
    });

    it('should reject a contribution without fields or with a non-finite priority', () => {
      const spec = createSpec({
        contributions: [{ source: 'pmset-batt', priority: Number.NaN, fields: [] }],
      });

      expect(validatePriorityTable(spec)).toEqual([
        'sample: source pmset-batt has a non-finite priority',
        'sample: source pmset-batt contributes no fields',
      ]);
    });

    it('should carry the problems on the thrown error', () => {
      let thrown: unknown;
      try {
        new SourceReconciler(createSpec({ contributions: [] }));
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(ProbeConfigurationError);
      expect(thrown).toMatchObject({
        problems: ['sample: at least one source must contribute'],
        message: 'Invalid probe configuration: sample: at least one source must contribute',
      });
    });
  });
});
