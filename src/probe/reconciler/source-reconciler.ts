/**
 * Source Reconciler Implementation
 *
 * Merges the partial records that several sources produced for one domain
 * into one complete record. Sources are applied in ascending priority over a
 * default record; each source may only write the fields it is declared to
 * contribute, and only the ones it actually produced, so the highest priority
 * source that produced a field wins it.
 */

import { ProbeConfigurationError } from '../errors.js';
import type { SourceId } from '../types/index.js';

export interface SourceContribution<T> {
  source: SourceId;
  /** Higher numbers win */
  priority: number;
  fields: ReadonlyArray<keyof T>;
}

/**
 * Decides whether an incoming value may replace the one already merged.
 * Lets a domain keep a high-confidence value when a lower-confidence
 * derivation arrives later in the order.
 */
export type FieldGuard<V> = (current: V, incoming: V) => boolean;

export type FieldGuards<T> = { [K in keyof T]?: FieldGuard<T[K]> };

export interface ReconcilerSpec<T extends object> {
  domain: string;
  defaults: () => T;
  contributions: ReadonlyArray<SourceContribution<T>>;
  guards?: FieldGuards<T>;
  /** Derives dependent fields once all sources are applied */
  finalize?: (record: T) => T;
}

export class SourceReconciler<T extends object> {
  private readonly spec: ReconcilerSpec<T>;
  private readonly ordered: ReadonlyArray<SourceContribution<T>>;

  constructor(spec: ReconcilerSpec<T>) {
    const problems = validatePriorityTable(spec);
    if (problems.length > 0) {
      throw new ProbeConfigurationError(problems);
    }
    this.spec = spec;
    this.ordered = [...spec.contributions].sort((a, b) => a.priority - b.priority);
  }

  get domain(): string {
    return this.spec.domain;
  }

  /** Sources in the order they are applied */
  get sources(): SourceId[] {
    return this.ordered.map((contribution) => contribution.source);
  }

  /**
   * Merges whatever the sources produced this cycle. A source missing from
   * `records` is treated exactly like one that produced no fields.
   */
  merge(records: ReadonlyMap<SourceId, Partial<T>>): T {
    const merged = this.spec.defaults();

    for (const contribution of this.ordered) {
      const partial = records.get(contribution.source);
      if (!partial) continue;
      for (const field of contribution.fields) {
        this.apply(merged, partial, field);
      }
    }

    return this.spec.finalize ? this.spec.finalize(merged) : merged;
  }

  private apply<K extends keyof T>(merged: T, partial: Partial<T>, field: K): void {
    const incoming = partial[field];
    if (incoming === undefined) return;
    const guard = this.spec.guards?.[field];
    if (guard && !guard(merged[field], incoming)) return;
    merged[field] = incoming;
  }
}

export function validatePriorityTable<T extends object>(spec: ReconcilerSpec<T>): string[] {
  const problems: string[] = [];

  if (spec.contributions.length === 0) {
    problems.push(`${spec.domain}: at least one source must contribute`);
  }

  const sources = new Set<SourceId>();
  const priorities = new Set<number>();
  for (const contribution of spec.contributions) {
    if (sources.has(contribution.source)) {
      problems.push(`${spec.domain}: source ${contribution.source} is listed twice`);
    }
    if (priorities.has(contribution.priority)) {
      problems.push(`${spec.domain}: priority ${contribution.priority} is used by more than one source`);
    }
    if (!Number.isFinite(contribution.priority)) {
      problems.push(`${spec.domain}: source ${contribution.source} has a non-finite priority`);
    }
    if (contribution.fields.length === 0) {
      problems.push(`${spec.domain}: source ${contribution.source} contributes no fields`);
    }
    sources.add(contribution.source);
    priorities.add(contribution.priority);
  }

  return problems;
}
