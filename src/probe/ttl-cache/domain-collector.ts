/**
 * Domain Collector
 *
 * The probe → extract → reconcile pipeline of one domain. Every source runs
 * concurrently under its own timeout; a source that fails or whose output is
 * unrecognizable simply contributes nothing to the merge.
 */

import { ProbeConfigurationError, describeProbeFailure } from '../errors.js';
import type { SourceReconciler } from '../reconciler/index.js';
import type {
  ExtractionResult,
  ProbeCommand,
  ProbeFailure,
  ProbeRunner,
  SourceId,
} from '../types/index.js';

export interface DomainSource<T> {
  command: ProbeCommand;
  extract: (text: string) => ExtractionResult<T>;
}

export type SourceReport =
  | { source: SourceId; status: 'facts'; fields: string[] }
  | { source: SourceId; status: 'mismatch'; reason: string }
  | { source: SourceId; status: 'failed'; failure: ProbeFailure };

export type RefreshOutcome<T> =
  | { ok: true; value: T; reports: SourceReport[] }
  | { ok: false; reports: SourceReport[] };

export interface DomainCollectorOptions<T extends object> {
  reconciler: SourceReconciler<T>;
  sources: ReadonlyArray<DomainSource<T>>;
  runner: ProbeRunner;
}

export class DomainCollector<T extends object> {
  private readonly reconciler: SourceReconciler<T>;
  private readonly sources: ReadonlyArray<DomainSource<T>>;
  private readonly runner: ProbeRunner;

  constructor(options: DomainCollectorOptions<T>) {
    const declared = new Set(options.reconciler.sources);
    const problems = options.sources
      .filter((source) => !declared.has(source.command.source))
      .map((source) => `${options.reconciler.domain}: source ${source.command.source} has no priority entry`);
    if (options.sources.length === 0) {
      problems.push(`${options.reconciler.domain}: no sources configured`);
    }
    if (problems.length > 0) {
      throw new ProbeConfigurationError(problems);
    }

    this.reconciler = options.reconciler;
    this.sources = options.sources;
    this.runner = options.runner;
  }

  get domain(): string {
    return this.reconciler.domain;
  }

  /**
   * Succeeds when at least one source produced a recognizable record.
   */
  async refresh(): Promise<RefreshOutcome<T>> {
    const results = await Promise.all(
      this.sources.map(async (source) => ({ source, result: await this.runner.run(source.command) })),
    );

    const records = new Map<SourceId, Partial<T>>();
    const reports: SourceReport[] = [];

    for (const { source, result } of results) {
      const id = source.command.source;
      if (!result.ok) {
        reports.push({ source: id, status: 'failed', failure: result.failure });
        continue;
      }
      const extraction = source.extract(result.output.text);
      if (extraction.kind === 'mismatch') {
        reports.push({ source: id, status: 'mismatch', reason: extraction.reason });
        continue;
      }
      records.set(id, extraction.facts);
      reports.push({ source: id, status: 'facts', fields: Object.keys(extraction.facts) });
    }

    if (records.size === 0) {
      return { ok: false, reports };
    }
    return { ok: true, value: this.reconciler.merge(records), reports };
  }
}

export function describeSourceReport(report: SourceReport): string {
  switch (report.status) {
    case 'facts':
      return `${report.source}: ${report.fields.length > 0 ? report.fields.join(', ') : 'no fields'}`;
    case 'mismatch':
      return `${report.source}: unrecognized output (${report.reason})`;
    case 'failed':
      return describeProbeFailure(report.failure);
  }
}
