import fs from 'fs/promises';
import path from 'path';
import { ReportSinkError } from './errors';
import { ProbeOutcome, Report, RunConfig, RunMetadata, RunStatistics } from '../types/probe';

/**
 * On-disk shape of the report (snake_case keys).
 */
export interface ReportDocument {
  config: {
    url: string;
    duration_seconds: number;
    interval_seconds: number;
    expected: string | null;
    timeout_seconds: number;
    method: string;
    expected_status: number | null;
  };
  statistics: {
    total_probes: number;
    successful_probes: number;
    availability_pct: number;
    p50_latency_ms: number | null;
    p95_latency_ms: number | null;
  };
  outcomes: Array<{
    timestamp: string;
    success: boolean;
    status_code: number | null;
    latency_ms: number;
    error: string | null;
    detail: string | null;
  }>;
  collected_logs: string | null;
  generated_at: string;
  run: {
    started_at: string;
    finished_at: string;
    cancelled: boolean;
    container_id: string | null;
  } | null;
}

export function buildReport(
  config: Readonly<RunConfig>,
  outcomes: readonly ProbeOutcome[],
  statistics: RunStatistics,
  logs: string | null = null,
  run: RunMetadata | null = null,
  now: () => Date = () => new Date()
): Report {
  return {
    config: Object.freeze({ ...config }),
    statistics: Object.freeze({ ...statistics }),
    outcomes: Object.freeze([...outcomes]),
    collectedLogs: logs,
    generatedAt: now().toISOString(),
    run
  };
}

export function toReportDocument(report: Report): ReportDocument {
  return {
    config: {
      url: report.config.url,
      duration_seconds: report.config.durationSeconds,
      interval_seconds: report.config.intervalSeconds,
      expected: report.config.expected,
      timeout_seconds: report.config.timeoutSeconds,
      method: report.config.method,
      expected_status: report.config.expectedStatus
    },
    statistics: {
      total_probes: report.statistics.totalProbes,
      successful_probes: report.statistics.successfulProbes,
      availability_pct: report.statistics.availabilityPct,
      p50_latency_ms: report.statistics.p50LatencyMs,
      p95_latency_ms: report.statistics.p95LatencyMs
    },
    outcomes: report.outcomes.map((outcome) => ({
      timestamp: outcome.timestamp.wallClock,
      success: outcome.success,
      status_code: outcome.statusCode,
      latency_ms: outcome.latencyMs,
      error: outcome.error,
      detail: outcome.detail
    })),
    collected_logs: report.collectedLogs,
    generated_at: report.generatedAt,
    run: report.run
      ? {
          started_at: report.run.startedAt,
          finished_at: report.run.finishedAt,
          cancelled: report.run.cancelled,
          container_id: report.run.containerId
        }
      : null
  };
}

export function serializeReport(report: Report): string {
  return JSON.stringify(toReportDocument(report), null, 2);
}

export function defaultReportPath(generatedAt: string, cwd: string = process.cwd()): string {
  const stamp = generatedAt.replace(/[:.]/g, '-');
  return path.join(cwd, `stability-report-${stamp}.json`);
}

/**
 * Writes the report to `destination`, or to stdout when it is `-`.
 * Returns where the report went.
 */
export async function writeReport(report: Report, destination: string): Promise<string> {
  const body = `${serializeReport(report)}\n`;

  if (destination === '-') {
    process.stdout.write(body);
    return 'stdout';
  }

  const target = path.resolve(destination);
  try {
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, body, 'utf-8');
  } catch (error) {
    throw new ReportSinkError(target, error);
  }
  return target;
}
