import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { ConfigurationError } from './errors';
import { ProbeScheduler } from './scheduler';
import { aggregate } from './statistics';
import { FakeClock, ScriptedProber } from '../testing/fake-clock';
import { RunConfig } from '../types/probe';

function config(overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    url: 'http://127.0.0.1:8000/health',
    method: 'GET',
    durationSeconds: 10,
    intervalSeconds: 2,
    timeoutSeconds: 2,
    expected: null,
    expectedStatus: null,
    ...overrides
  };
}

describe('ProbeScheduler', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('takes five probes two seconds apart over a ten second window', async () => {
    const clock = new FakeClock();
    const prober = new ScriptedProber(clock);
    const scheduler = new ProbeScheduler(prober, clock);

    const run = await scheduler.run(config());

    expect(run.outcomes).toHaveLength(5);
    expect(prober.startedAt).toEqual([0, 2000, 4000, 6000, 8000]);
    expect(clock.sleeps).toEqual([2000, 2000, 2000, 2000]);
    expect(run.cancelled).toBe(false);
    expect(run.startedAt).toBe('2024-01-01T00:00:00.000Z');
    expect(run.finishedAt).toBe('2024-01-01T00:00:08.000Z');
    expect(scheduler.state).toBe('completed');
  });

  it('subtracts probe latency from the sleep so ticks stay on cadence', async () => {
    const clock = new FakeClock();
    const prober = new ScriptedProber(clock, [{ latencyMs: 500 }]);

    const run = await new ProbeScheduler(prober, clock).run(config());

    expect(run.outcomes).toHaveLength(5);
    expect(prober.startedAt).toEqual([0, 2000, 4000, 6000, 8000]);
    expect(clock.sleeps).toEqual([1500, 1500, 1500, 1500]);
  });

  it('fires the next tick immediately after a probe slower than the interval', async () => {
    const clock = new FakeClock();
    const prober = new ScriptedProber(clock, [{ latencyMs: 0 }, { latencyMs: 3000 }, { latencyMs: 0 }]);

    const run = await new ProbeScheduler(prober, clock).run(config());

    expect(prober.startedAt).toEqual([0, 2000, 5000, 7000, 9000]);
    expect(clock.sleeps).toEqual([2000, 0, 2000, 2000]);
    expect(run.outcomes).toHaveLength(5);
    expect(clock.now()).toBeLessThanOrEqual(10_000);
  });

  it('records failures and keeps probing', async () => {
    const clock = new FakeClock();
    const prober = new ScriptedProber(clock, [{ success: false }]);

    const run = await new ProbeScheduler(prober, clock).run(config({ durationSeconds: 6 }));
    const stats = aggregate(run.outcomes);

    expect(run.outcomes).toHaveLength(3);
    expect(run.outcomes.every((outcome) => !outcome.success && outcome.error === 'connection_error')).toBe(true);
    expect(stats.availabilityPct).toBe(0);
    expect(stats.p50LatencyMs).toBeNull();
    expect(stats.p95LatencyMs).toBeNull();
  });

  it('takes one probe when the window equals the interval', async () => {
    const clock = new FakeClock();
    const prober = new ScriptedProber(clock);

    const run = await new ProbeScheduler(prober, clock).run(config({ durationSeconds: 2 }));

    expect(run.outcomes).toHaveLength(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('keeps outcomes in probe order', async () => {
    const clock = new FakeClock();
    const prober = new ScriptedProber(clock, [{ latencyMs: 30 }, { latencyMs: 10 }, { latencyMs: 20 }]);

    const run = await new ProbeScheduler(prober, clock).run(config({ durationSeconds: 6 }));

    expect(run.outcomes.map((outcome) => outcome.latencyMs)).toEqual([30, 10, 20]);
    expect(run.outcomes.map((outcome) => outcome.timestamp.monotonicMs)).toEqual([0, 2000, 4000]);
  });

  it('rejects a zero interval before probing', async () => {
    const clock = new FakeClock();
    const prober = new ScriptedProber(clock);
    const scheduler = new ProbeScheduler(prober, clock);

    await expect(scheduler.run(config({ intervalSeconds: 0 }))).rejects.toThrow(ConfigurationError);
    expect(prober.callCount).toBe(0);
    expect(scheduler.state).toBe('not_started');
  });

  it('rejects a non-positive duration before probing', async () => {
    const clock = new FakeClock();
    const prober = new ScriptedProber(clock);

    await expect(new ProbeScheduler(prober, clock).run(config({ durationSeconds: -1 }))).rejects.toThrow(
      'Invalid duration: must be greater than 0, got -1'
    );
    expect(prober.callCount).toBe(0);
  });

  it('stops on cancellation and drops the probe that was cut short', async () => {
    const clock = new FakeClock();
    const controller = new AbortController();
    const prober = new ScriptedProber(clock, [{}], (call) => {
      if (call === 3) {
        controller.abort();
      }
    });
    const scheduler = new ProbeScheduler(prober, clock);

    const run = await scheduler.run(config(), controller.signal);

    expect(run.cancelled).toBe(true);
    expect(run.outcomes).toHaveLength(2);
    expect(prober.callCount).toBe(3);
    expect(scheduler.state).toBe('completed');
  });

  it('stops when cancelled during the sleep between ticks', async () => {
    const clock = new FakeClock();
    const controller = new AbortController();
    clock.onSleep = () => {
      if (clock.sleeps.length === 2) {
        controller.abort();
      }
    };
    const prober = new ScriptedProber(clock);
    const scheduler = new ProbeScheduler(prober, clock);

    const run = await scheduler.run(config(), controller.signal);

    expect(run.cancelled).toBe(true);
    expect(run.outcomes).toHaveLength(2);
    expect(prober.callCount).toBe(2);
    expect(clock.sleeps).toEqual([2000, 2000]);
    expect(clock.now()).toBe(2000);
    expect(run.finishedAt).toBe('2024-01-01T00:00:02.000Z');
    expect(scheduler.state).toBe('completed');
  });

  it('returns no outcomes when cancelled before the first tick', async () => {
    const clock = new FakeClock();
    const controller = new AbortController();
    controller.abort();
    const prober = new ScriptedProber(clock);

    const run = await new ProbeScheduler(prober, clock).run(config(), controller.signal);

    expect(run.cancelled).toBe(true);
    expect(run.outcomes).toEqual([]);
    expect(prober.callCount).toBe(0);
  });

  it('refuses to run twice', async () => {
    const clock = new FakeClock();
    const scheduler = new ProbeScheduler(new ScriptedProber(clock), clock);

    await scheduler.run(config({ durationSeconds: 2 }));

    await expect(scheduler.run(config({ durationSeconds: 2 }))).rejects.toThrow(
      'Scheduler already completed; create a new one per run'
    );
  });
});
