import { ProbeOutcome, RunStatistics } from '../types/probe';

/**
 * Nearest-rank percentile over an ascending list: the value at
 * `ceil(p / 100 * n) - 1`, clamped to the list bounds. No interpolation.
 */
export function percentile(sortedValues: readonly number[], p: number): number | null {
  if (sortedValues.length === 0) {
    return null;
  }

  const rank = Math.ceil((p / 100) * sortedValues.length) - 1;
  const index = Math.min(Math.max(rank, 0), sortedValues.length - 1);
  return sortedValues[index];
}

export function aggregate(outcomes: readonly ProbeOutcome[]): RunStatistics {
  const latencies = outcomes
    .filter((outcome) => outcome.success)
    .map((outcome) => outcome.latencyMs)
    .sort((a, b) => a - b);

  const totalProbes = outcomes.length;
  const successfulProbes = latencies.length;

  return {
    totalProbes,
    successfulProbes,
    availabilityPct: totalProbes > 0 ? (successfulProbes / totalProbes) * 100 : 0,
    p50LatencyMs: percentile(latencies, 50),
    p95LatencyMs: percentile(latencies, 95)
  };
}
