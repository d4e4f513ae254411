import {
  AggregateResult,
  ErrorBreakdownEntry,
  ErrorCodeCount,
  FailureCategory,
  LatencyStats,
  RequestOutcome,
  ScenarioKind,
  ScenarioRun,
} from './types.js';

export interface AggregateOptions {
  label: string;
  scenario: ScenarioKind;
  wallClockMs: number;
}

export function calculateLatencyStats(latencies: readonly number[]): LatencyStats {
  if (latencies.length === 0) {
    return { min: 0, max: 0, mean: 0, p50: 0, p95: 0, p99: 0 };
  }

  // Summing the sorted copy keeps the mean bit-identical whatever order outcomes arrived in.
  const sorted = [...latencies].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);

  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    mean: sum / sorted.length,
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
  };
}

/** Nearest-rank percentile over an ascending array. */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    return 0;
  }
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.min(sorted.length - 1, Math.max(0, index))];
}

function byCountThenName<T extends { count: number }>(name: (entry: T) => string) {
  return (a: T, b: T): number => b.count - a.count || name(a).localeCompare(name(b));
}

function breakdownErrors(failures: readonly RequestOutcome[], total: number): ErrorBreakdownEntry[] {
  const grouped = new Map<FailureCategory, Map<string, number>>();

  for (const outcome of failures) {
    const category = outcome.category ?? 'status';
    const code = outcome.errorCode ?? 'UNKNOWN';
    const codes = grouped.get(category) ?? new Map<string, number>();
    codes.set(code, (codes.get(code) ?? 0) + 1);
    grouped.set(category, codes);
  }

  const entries: ErrorBreakdownEntry[] = [];
  for (const [category, codeCounts] of grouped) {
    const codes: ErrorCodeCount[] = [...codeCounts]
      .map(([code, count]) => ({ code, count }))
      .sort(byCountThenName<ErrorCodeCount>(c => c.code));
    const count = codes.reduce((sum, c) => sum + c.count, 0);
    entries.push({
      category,
      count,
      percentage: total > 0 ? (count / total) * 100 : 0,
      codes,
    });
  }

  return entries.sort(byCountThenName<ErrorBreakdownEntry>(e => e.category));
}

/**
 * Reduces one run's outcomes to summary statistics.
 *
 * Latency figures include successful outcomes only, and throughput counts
 * successes over the run's wall-clock time. The result depends on the
 * outcome set, not its order.
 */
export function aggregateOutcomes(
  outcomes: readonly RequestOutcome[],
  options: AggregateOptions
): AggregateResult {
  const successes = outcomes.filter(o => o.success);
  const failures = outcomes.filter(o => !o.success);
  const total = outcomes.length;
  const seconds = options.wallClockMs / 1000;

  return {
    label: options.label,
    scenario: options.scenario,
    totalRequests: total,
    successfulRequests: successes.length,
    failedRequests: failures.length,
    durationMs: options.wallClockMs,
    requestsPerSecond: seconds > 0 ? successes.length / seconds : 0,
    errorRate: total > 0 ? (failures.length / total) * 100 : 0,
    latency: calculateLatencyStats(successes.map(o => o.latencyMs)),
    errors: breakdownErrors(failures, total),
    bytesReceived: outcomes.reduce((sum, o) => sum + o.bytes, 0),
    abandonedWorkers: outcomes.filter(o => o.terminal).length,
  };
}

export function aggregateRun(run: ScenarioRun): AggregateResult {
  return aggregateOutcomes(run.outcomes, {
    label: run.config.label,
    scenario: run.config.scenario,
    wallClockMs: run.wallClockMs,
  });
}
