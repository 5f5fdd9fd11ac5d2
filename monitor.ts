import { systemClock } from './handlers/clock';
import { validateRunConfig } from './handlers/config';
import { errorMessage } from './handlers/errors';
import { log } from './handlers/logger';
import { HttpProber } from './handlers/probe';
import { buildReport } from './handlers/report';
import { ProbeScheduler } from './handlers/scheduler';
import { aggregate } from './handlers/statistics';
import { Clock, LogCollector, Prober, Report, RunConfig } from './types/probe';

export interface MonitorDependencies {
  prober?: Prober;
  logCollector?: LogCollector;
  clock?: Clock;
}

export interface RunOptions {
  signal?: AbortSignal;
  containerId?: string | null;
}

/**
 * Connects the prober, scheduler, aggregator and report builder for one run.
 * Each call to `run` gets its own scheduler, so a monitor can be reused.
 */
export class StabilityMonitor {
  private prober: Prober;
  private logCollector: LogCollector | null;
  private clock: Clock;

  constructor({ prober, logCollector, clock = systemClock }: MonitorDependencies = {}) {
    this.clock = clock;
    this.prober = prober ?? new HttpProber(clock);
    this.logCollector = logCollector ?? null;
  }

  async run(config: RunConfig, { signal, containerId = null }: RunOptions = {}): Promise<Report> {
    const runConfig = validateRunConfig(config);

    const scheduler = new ProbeScheduler(this.prober, this.clock);
    const scheduled = await scheduler.run(runConfig, signal);
    const statistics = aggregate(scheduled.outcomes);

    const collectedLogs = containerId ? await this.collectLogs(containerId) : null;

    log(
      `Run finished: ${statistics.successfulProbes}/${statistics.totalProbes} probes ok, ` +
        `availability ${statistics.availabilityPct.toFixed(2)}%, ` +
        `p50 ${statistics.p50LatencyMs ?? 'n/a'}ms, p95 ${statistics.p95LatencyMs ?? 'n/a'}ms`,
      'info'
    );

    return buildReport(
      runConfig,
      scheduled.outcomes,
      statistics,
      collectedLogs,
      {
        startedAt: scheduled.startedAt,
        finishedAt: scheduled.finishedAt,
        cancelled: scheduled.cancelled,
        containerId
      },
      () => this.clock.wallClock()
    );
  }

  private async collectLogs(containerId: string): Promise<string | null> {
    if (!this.logCollector) {
      log(`No log collector configured, skipping logs for ${containerId}`, 'warn');
      return null;
    }

    try {
      const logs = await this.logCollector.collect(containerId);
      log(`Collected ${logs.length} characters of logs from ${containerId}`, 'info');
      return logs;
    } catch (error) {
      log(errorMessage(error), 'warn');
      return null;
    }
  }
}

export { aggregate, percentile } from './handlers/statistics';
export { buildReport, serializeReport, toReportDocument, writeReport } from './handlers/report';
export { HttpProber } from './handlers/probe';
export { ProbeScheduler } from './handlers/scheduler';
export { DockerLogCollector } from './handlers/docker';
export { resolveRunConfig, validateRunConfig } from './handlers/config';
export * from './handlers/errors';
export * from './types/probe';
