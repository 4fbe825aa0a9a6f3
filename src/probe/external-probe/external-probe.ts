/**
 * External Probe Implementation
 *
 * Runs one diagnostic command under a strict wait bound and reports the
 * outcome as a ProbeResult. A hung tool is killed once its bound expires, so
 * a single slow probe cannot hold up a polling cycle. There is no retry here;
 * the cache layer decides when to run a probe again.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { systemClock, type Clock } from '../clock.js';
import type { ProbeCommand, ProbeFailure, ProbeResult, ProbeRunner } from '../types/index.js';

const log = createSubsystemLogger('probe/external');

export class ExternalProbe implements ProbeRunner {
  private readonly clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  run(command: ProbeCommand): Promise<ProbeResult> {
    return new Promise<ProbeResult>((resolve) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;
      let cancelTimer: (() => void) | undefined;

      const settle = (result: ProbeResult): void => {
        if (settled) return;
        settled = true;
        cancelTimer?.();
        resolve(result);
      };

      const fail = (failure: ProbeFailure): void => settle({ ok: false, failure });

      let child: ChildProcess;
      try {
        child = spawn(command.program, [...command.args], {
          stdio: ['ignore', 'pipe', 'pipe'],
          windowsHide: true,
        });
      } catch (error) {
        fail({
          kind: 'launch-failure',
          source: command.source,
          message: error instanceof Error ? error.message : String(error),
        });
        return;
      }

      cancelTimer = this.clock.schedule(() => {
        if (settled) return;
        log.debug('Probe exceeded its wait bound, killing it', {
          source: command.source,
          program: command.program,
          timeoutMs: command.timeoutMs,
        });
        child.kill('SIGKILL');
        fail({ kind: 'timeout', source: command.source, timeoutMs: command.timeoutMs });
      }, command.timeoutMs);

      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error: Error) => {
        fail({ kind: 'launch-failure', source: command.source, message: error.message });
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (code === 0) {
          settle({
            ok: true,
            output: {
              source: command.source,
              text: Buffer.concat(stdout).toString('utf8'),
              capturedAt: this.clock.now(),
              exitCode: 0,
            },
          });
          return;
        }

        const stderrText = Buffer.concat(stderr).toString('utf8');
        fail({
          kind: 'non-zero-exit',
          source: command.source,
          code: code ?? -1,
          stderr: signal ? `${stderrText}terminated by ${signal}`.trim() : stderrText,
        });
      });
    });
  }
}
