/**
 * Drives the prober at a fixed cadence for the length of the observation window.
 * One probe in flight at a time; failures are recorded, never retried.
 */

import { systemClock } from './clock';
import { validateRunConfig } from './config';
import { log } from './logger';
import { Clock, ProbeOutcome, Prober, RunConfig, ScheduledRun, SchedulerState } from '../types/probe';

export class ProbeScheduler {
  private prober: Prober;
  private clock: Clock;
  private currentState: SchedulerState = 'not_started';

  constructor(prober: Prober, clock: Clock = systemClock) {
    this.prober = prober;
    this.clock = clock;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  /**
   * Probes until no further full interval fits in the window, or until `signal`
   * aborts. Ticks are anchored to when the previous tick started, so probe
   * latency does not accumulate as drift; a probe slower than the interval is
   * followed immediately by the next one.
   */
  async run(config: RunConfig, signal?: AbortSignal): Promise<ScheduledRun> {
    if (this.currentState !== 'not_started') {
      throw new Error(`Scheduler already ${this.currentState}; create a new one per run`);
    }
    const runConfig = validateRunConfig(config);

    this.currentState = 'running';
    const outcomes: ProbeOutcome[] = [];
    const durationMs = runConfig.durationSeconds * 1000;
    const intervalMs = runConfig.intervalSeconds * 1000;
    const startTime = this.clock.now();
    const startedAt = this.clock.wallClock().toISOString();
    let cancelled = false;

    log(`Probing ${runConfig.url} every ${runConfig.intervalSeconds}s for ${runConfig.durationSeconds}s`, 'info');

    try {
      while (true) {
        if (signal?.aborted) {
          cancelled = true;
          break;
        }

        const tickStart = this.clock.now();
        const outcome = await this.prober.probe(runConfig, signal);
        if (signal?.aborted) {
          cancelled = true;
          break;
        }
        outcomes.push(outcome);

        log(
          `Probe #${outcomes.length}: ${outcome.success ? 'ok' : outcome.error} ` +
            `status=${outcome.statusCode ?? '-'} latency=${outcome.latencyMs}ms`,
          outcome.success ? 'debug' : 'warn'
        );

        const elapsed = this.clock.now() - startTime;
        if (elapsed + intervalMs >= durationMs) {
          break;
        }

        const spent = this.clock.now() - tickStart;
        await this.clock.sleep(Math.max(0, intervalMs - spent), signal);
      }
    } finally {
      this.currentState = 'completed';
    }

    if (cancelled) {
      log(`Run cancelled after ${outcomes.length} probe(s)`, 'warn');
    }

    return {
      outcomes,
      startedAt,
      finishedAt: this.clock.wallClock().toISOString(),
      cancelled
    };
  }
}
