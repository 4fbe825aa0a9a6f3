/**
 * Probe Types
 *
 * Describes one invocation of an external diagnostic tool, its raw output,
 * and the closed set of ways it can fail.
 */

/** Identifies one external tool output stream. */
export type SourceId =
  | 'pmset-batt'
  | 'system-profiler-power'
  | 'ioreg-smart-battery'
  | 'powermetrics-cpu'
  | 'powermetrics-smc'
  | 'sysctl-thermal-level'
  | 'pmset-therm'
  | 'sysctl-perflevel';

export interface ProbeCommand {
  source: SourceId;
  program: string;
  args: readonly string[];
  /** Hard upper bound on the run; exceeding it kills the process */
  timeoutMs: number;
}

export interface RawProbeOutput {
  source: SourceId;
  /** Captured standard output */
  text: string;
  /** Epoch milliseconds when the process exited */
  capturedAt: number;
  exitCode: number;
}

export type ProbeFailure =
  | { kind: 'timeout'; source: SourceId; timeoutMs: number }
  | { kind: 'launch-failure'; source: SourceId; message: string }
  | { kind: 'non-zero-exit'; source: SourceId; code: number; stderr: string };

export type ProbeResult =
  | { ok: true; output: RawProbeOutput }
  | { ok: false; failure: ProbeFailure };

/**
 * Anything that can execute a probe command. The cache layer depends on this
 * rather than on process spawning directly.
 */
export interface ProbeRunner {
  run(command: ProbeCommand): Promise<ProbeResult>;
}

/**
 * Outcome of turning raw text into a partial record. `mismatch` means the
 * text did not look like the source's output at all.
 */
export type ExtractionResult<T> =
  | { kind: 'facts'; facts: Partial<T> }
  | { kind: 'mismatch'; reason: string };
