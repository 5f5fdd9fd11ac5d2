export type ProbeErrorKind = 'timeout' | 'connection_error' | 'unexpected_response' | 'other';

export type HttpMethod = 'GET' | 'HEAD' | 'POST';

export interface ProbeTimestamp {
  wallClock: string;
  monotonicMs: number;
}

export interface ProbeOutcome {
  timestamp: ProbeTimestamp;
  success: boolean;
  statusCode: number | null;
  latencyMs: number;
  error: ProbeErrorKind | null;
  detail: string | null;
}

export interface ProbeTarget {
  url: string;
  method: HttpMethod;
  timeoutSeconds: number;
  expected: string | null;
  expectedStatus: number | null;
}

export interface RunConfig extends ProbeTarget {
  durationSeconds: number;
  intervalSeconds: number;
}

export interface RunStatistics {
  totalProbes: number;
  successfulProbes: number;
  availabilityPct: number;
  p50LatencyMs: number | null;
  p95LatencyMs: number | null;
}

export type SchedulerState = 'not_started' | 'running' | 'completed';

export interface ScheduledRun {
  outcomes: ProbeOutcome[];
  startedAt: string;
  finishedAt: string;
  cancelled: boolean;
}

export interface RunMetadata {
  startedAt: string;
  finishedAt: string;
  cancelled: boolean;
  containerId: string | null;
}

export interface Report {
  config: Readonly<RunConfig>;
  statistics: RunStatistics;
  outcomes: readonly ProbeOutcome[];
  collectedLogs: string | null;
  generatedAt: string;
  run: RunMetadata | null;
}

/**
 * Performs one timed request. Implementations never reject: every failure
 * comes back as an outcome with `error` set.
 */
export interface Prober {
  probe(target: ProbeTarget, signal?: AbortSignal): Promise<ProbeOutcome>;
}

export interface LogCollector {
  collect(containerId: string): Promise<string>;
}

export interface Clock {
  /** Monotonic milliseconds. */
  now(): number;
  wallClock(): Date;
  /** Resolves after `ms`, or early once `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
