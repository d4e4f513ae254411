import { getScenario } from '../scenarios/index.js';
import {
  AggregateResult,
  ComparisonReport,
  ComparisonSuite,
  ErrorBreakdownEntry,
  OverallComparison,
  OverallMetrics,
  ScenarioKind,
  Verdict,
} from '../types.js';

export function fixed(value: number, digits = 2): string {
  return value.toFixed(digits);
}

export function signedPercent(delta: number | null): string {
  if (delta === null) {
    return 'n/a';
  }
  return `${delta >= 0 ? '+' : ''}${delta.toFixed(2)}%`;
}

export function signedPoints(delta: number): string {
  return `${delta >= 0 ? '+' : ''}${delta.toFixed(2)} pp`;
}

export function scenarioTitle(kind: ScenarioKind): string {
  return getScenario(kind).title;
}

export function formatCodes(entry: ErrorBreakdownEntry): string {
  return entry.codes.map(c => `${c.code} ×${c.count}`).join(', ');
}

export function describeSettings(suite: ComparisonSuite): string {
  const s = suite.settings;
  return (
    `Virtual users: ${s.concurrency}, duration: ${s.durationSeconds}s, ramp-up: ${s.rampUpSeconds}s, ` +
    `think time: ${s.thinkTimeMs}ms, request timeout: ${s.requestTimeoutMs}ms`
  );
}

export interface MetricRow {
  metric: string;
  baseline: string;
  candidate: string;
  delta: string;
}

/** The per-scenario metric table shared by the Markdown and HTML renderers. */
export function metricRows(report: ComparisonReport): MetricRow[] {
  const { baseline: a, candidate: b, deltas } = report;
  const row = (metric: string, pick: (r: AggregateResult) => string, delta = ''): MetricRow => ({
    metric,
    baseline: pick(a),
    candidate: pick(b),
    delta,
  });

  return [
    row('Requests/sec', r => fixed(r.requestsPerSecond), signedPercent(deltas.throughputPercent)),
    row('Mean latency (ms)', r => fixed(r.latency.mean), signedPercent(deltas.meanLatencyPercent)),
    row('P95 latency (ms)', r => fixed(r.latency.p95), signedPercent(deltas.p95LatencyPercent)),
    row('P99 latency (ms)', r => fixed(r.latency.p99), signedPercent(deltas.p99LatencyPercent)),
    row('Total requests', r => String(r.totalRequests)),
    row('Successful requests', r => String(r.successfulRequests)),
    row('Error rate', r => `${fixed(r.errorRate)}%`, signedPoints(deltas.errorRatePoints)),
    row('Abandoned workers', r => String(r.abandonedWorkers)),
  ];
}

export interface ErrorRow {
  label: string;
  category: string;
  count: number;
  share: string;
  codes: string;
}

export function errorRows(report: ComparisonReport): ErrorRow[] {
  return [report.baseline, report.candidate].flatMap(result =>
    result.errors.map(entry => ({
      label: result.label,
      category: entry.category,
      count: entry.count,
      share: `${fixed(entry.percentage)}%`,
      codes: formatCodes(entry),
    }))
  );
}

/** Cross-scenario averages; latency averages skip scenarios a side never answered. */
export function overallRows(overall: OverallComparison): MetricRow[] {
  const { baseline: a, candidate: b, deltas } = overall;
  const row = (metric: string, pick: (m: OverallMetrics) => string, delta = ''): MetricRow => ({
    metric,
    baseline: pick(a),
    candidate: pick(b),
    delta,
  });

  return [
    row('Avg requests/sec', m => fixed(m.requestsPerSecond), signedPercent(deltas.throughputPercent)),
    row('Avg mean latency (ms)', m => fixed(m.latency.mean), signedPercent(deltas.meanLatencyPercent)),
    row('Avg P95 latency (ms)', m => fixed(m.latency.p95), signedPercent(deltas.p95LatencyPercent)),
    row('Avg P99 latency (ms)', m => fixed(m.latency.p99), signedPercent(deltas.p99LatencyPercent)),
    row('Error rate', m => `${fixed(m.errorRate)}%`, signedPoints(deltas.errorRatePoints)),
  ];
}

export function verdictLine(subject: { readonly verdict: Readonly<Verdict> }): string {
  const { verdict } = subject;
  return `${verdict.throughput}. ${verdict.latency}. ${verdict.summary}.`;
}
