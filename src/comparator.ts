import { ConfigError } from './errors.js';
import { aggregateRun } from './metrics.js';
import { RunnerOptions, runScenario } from './runner.js';
import {
  AggregateResult,
  ComparableMetrics,
  ComparisonDeltas,
  ComparisonReport,
  ComparisonSuite,
  OverallComparison,
  OverallMetrics,
  ScenarioConfig,
  ScenarioKind,
  ScenarioRun,
  Side,
  SuiteSettings,
  TargetInfo,
  Verdict,
} from './types.js';
import { validateScenarioConfig } from './validation.js';

/** Margins below this many percent are reported as no significant difference. */
export const SIGNIFICANCE_THRESHOLD_PERCENT = 1;

/** (b - a) / a * 100. Zero when both are zero, null when only `a` is. */
export function percentChange(a: number, b: number): number | null {
  if (a === 0) {
    return b === 0 ? 0 : null;
  }
  return ((b - a) / a) * 100;
}

/** Latency reduction of `b` relative to the slower of the two, positive when `b` is faster. */
export function latencyImprovement(a: number, b: number): number {
  const slower = Math.max(a, b);
  return slower === 0 ? 0 : ((a - b) / slower) * 100;
}

export function computeDeltas(baseline: ComparableMetrics, candidate: ComparableMetrics): ComparisonDeltas {
  const latencyComparable = baseline.successfulRequests > 0 && candidate.successfulRequests > 0;
  const latency = (pick: (r: ComparableMetrics) => number): number | null =>
    latencyComparable ? latencyImprovement(pick(baseline), pick(candidate)) : null;

  return {
    throughputPercent: percentChange(baseline.requestsPerSecond, candidate.requestsPerSecond),
    meanLatencyPercent: latency(r => r.latency.mean),
    p95LatencyPercent: latency(r => r.latency.p95),
    p99LatencyPercent: latency(r => r.latency.p99),
    errorRatePoints: candidate.errorRate - baseline.errorRate,
  };
}

export interface VerdictLabels {
  baseline: string;
  candidate: string;
}

/**
 * Winner and margin from a throughput delta. A baseline win is expressed
 * relative to the candidate's figure: -50% as a delta is a 100% margin.
 */
export function throughputMargin(delta: number): { winner: Side; margin: number | null } {
  if (delta >= 0) {
    return { winner: 'candidate', margin: delta };
  }
  if (delta <= -100) {
    return { winner: 'baseline', margin: null };
  }
  return { winner: 'baseline', margin: (-delta / (100 + delta)) * 100 };
}

function describeThroughput(delta: number | null, labels: VerdictLabels): { winner: Side | null; text: string } {
  if (delta === null) {
    return {
      winner: 'candidate',
      text: `${labels.candidate} wins throughput (${labels.baseline} completed no successful requests)`,
    };
  }

  const { winner, margin } = throughputMargin(delta);
  if (margin === null) {
    return {
      winner,
      text: `${labels.baseline} wins throughput (${labels.candidate} completed no successful requests)`,
    };
  }
  if (margin < SIGNIFICANCE_THRESHOLD_PERCENT) {
    return { winner: null, text: `No significant difference in throughput (${margin.toFixed(1)}%)` };
  }
  return { winner, text: `${labels[winner]} wins throughput by ${margin.toFixed(1)}%` };
}

function describeLatency(delta: number | null, labels: VerdictLabels): { winner: Side | null; text: string } {
  if (delta === null) {
    return {
      winner: null,
      text: 'Response time not comparable (one side completed no successful requests)',
    };
  }

  const margin = Math.abs(delta);
  if (margin < SIGNIFICANCE_THRESHOLD_PERCENT) {
    return { winner: null, text: `No significant difference in response time (${margin.toFixed(1)}%)` };
  }
  const winner: Side = delta > 0 ? 'candidate' : 'baseline';
  return { winner, text: `${labels[winner]} wins response time by ${margin.toFixed(1)}%` };
}

/** Pure: the same deltas and labels always give the same verdict. */
export function renderVerdict(deltas: ComparisonDeltas, labels: VerdictLabels): Verdict {
  const throughput = describeThroughput(deltas.throughputPercent, labels);
  const latency = describeLatency(deltas.meanLatencyPercent, labels);

  let summary: string;
  if (throughput.winner === null && latency.winner === null) {
    summary = `No significant difference between ${labels.baseline} and ${labels.candidate}`;
  } else if (throughput.winner !== null && latency.winner !== null && throughput.winner !== latency.winner) {
    summary = `Mixed result: ${labels[throughput.winner]} has higher throughput, ${labels[latency.winner]} responds faster`;
  } else {
    const winner = throughput.winner ?? latency.winner;
    summary = winner === null ? 'No clear winner' : `${labels[winner]} performs better overall`;
  }

  return {
    throughputWinner: throughput.winner,
    latencyWinner: latency.winner,
    throughput: throughput.text,
    latency: latency.text,
    summary,
  };
}

export function buildComparisonReport(baseline: AggregateResult, candidate: AggregateResult): ComparisonReport {
  if (baseline.scenario !== candidate.scenario) {
    throw new Error(`Cannot compare ${baseline.scenario} against ${candidate.scenario}`);
  }

  const deltas = computeDeltas(baseline, candidate);
  return {
    scenario: baseline.scenario,
    baseline,
    candidate,
    deltas,
    verdict: renderVerdict(deltas, { baseline: baseline.label, candidate: candidate.label }),
  };
}

function mean(values: readonly number[]): number {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0;
}

/**
 * Averages one target's per-scenario results. Latency averages skip
 * scenarios without a successful request; the error rate covers every request.
 */
export function averageResults(label: string, results: readonly AggregateResult[]): OverallMetrics {
  const measured = results.filter(r => r.successfulRequests > 0);
  const totalRequests = results.reduce((sum, r) => sum + r.totalRequests, 0);
  const failedRequests = results.reduce((sum, r) => sum + r.failedRequests, 0);

  return {
    label,
    scenarios: results.length,
    totalRequests,
    successfulRequests: results.reduce((sum, r) => sum + r.successfulRequests, 0),
    requestsPerSecond: mean(results.map(r => r.requestsPerSecond)),
    errorRate: totalRequests > 0 ? (failedRequests / totalRequests) * 100 : 0,
    latency: {
      mean: mean(measured.map(r => r.latency.mean)),
      p95: mean(measured.map(r => r.latency.p95)),
      p99: mean(measured.map(r => r.latency.p99)),
    },
  };
}

/** Cross-scenario averages for both targets and the verdict they give. */
export function summarizeSuite(suite: ComparisonSuite): OverallComparison {
  const baseline = averageResults(suite.baseline.label, suite.comparisons.map(c => c.baseline));
  const candidate = averageResults(suite.candidate.label, suite.comparisons.map(c => c.candidate));
  const deltas = computeDeltas(baseline, candidate);

  return {
    baseline,
    candidate,
    deltas,
    verdict: renderVerdict(deltas, { baseline: baseline.label, candidate: candidate.label }),
  };
}

export function scenarioConfigFor(target: TargetInfo, scenario: ScenarioKind, settings: SuiteSettings): ScenarioConfig {
  return {
    label: target.label,
    targetUrl: target.url,
    scenario,
    concurrency: settings.concurrency,
    durationSeconds: settings.durationSeconds,
    rampUpSeconds: settings.rampUpSeconds,
    thinkTimeMs: settings.thinkTimeMs,
    requestTimeoutMs: settings.requestTimeoutMs,
    connectRetries: settings.connectRetries,
    deadlinePolicy: settings.deadlinePolicy,
  };
}

/** One validated config per scenario; throws ConfigError on the first invalid one. */
export function validatedConfigs(
  target: TargetInfo,
  scenarios: readonly ScenarioKind[],
  settings: SuiteSettings
): ScenarioConfig[] {
  return scenarios.map(scenario => validateScenarioConfig(scenarioConfigFor(target, scenario, settings)));
}

export interface ComparisonPlan {
  baseline: TargetInfo;
  candidate: TargetInfo;
  scenarios: ScenarioKind[];
  settings: SuiteSettings;
  /** Pause between one scenario's candidate run and the next scenario's baseline run. */
  scenarioPauseMs?: number;
}

export interface ComparatorHooks extends RunnerOptions {
  onRunStart?: (side: Side, config: ScenarioConfig) => void;
  onRunComplete?: (side: Side, result: AggregateResult, run: ScenarioRun) => void;
  onPause?: (ms: number, reason: 'cooldown' | 'scenario') => void;
  now?: () => Date;
}

function pause(ms: number): Promise<void> {
  return ms > 0 ? new Promise(resolve => setTimeout(resolve, ms)) : Promise.resolve();
}

async function measure(side: Side, config: ScenarioConfig, hooks: ComparatorHooks): Promise<AggregateResult> {
  hooks.onRunStart?.(side, config);
  const run = await runScenario(config, hooks);
  const result = aggregateRun(run);
  hooks.onRunComplete?.(side, result, run);
  return result;
}

/**
 * Runs every planned scenario against the baseline, then the candidate.
 * The two runs of a scenario never overlap; `cooldownMs` separates them.
 */
export async function runComparison(plan: ComparisonPlan, hooks: ComparatorHooks = {}): Promise<ComparisonSuite> {
  if (plan.scenarios.length === 0) {
    throw new ConfigError('At least one scenario is required');
  }

  // Reject bad settings for either side before any load is generated.
  const baselineConfigs = validatedConfigs(plan.baseline, plan.scenarios, plan.settings);
  const candidateConfigs = validatedConfigs(plan.candidate, plan.scenarios, plan.settings);
  const pairs = baselineConfigs.map((baseline, index) => ({ baseline, candidate: candidateConfigs[index] }));

  const comparisons: ComparisonReport[] = [];

  for (const [index, pair] of pairs.entries()) {
    if (index > 0 && plan.scenarioPauseMs) {
      hooks.onPause?.(plan.scenarioPauseMs, 'scenario');
      await pause(plan.scenarioPauseMs);
    }

    const baseline = await measure('baseline', pair.baseline, hooks);

    if (plan.settings.cooldownMs > 0) {
      hooks.onPause?.(plan.settings.cooldownMs, 'cooldown');
      await pause(plan.settings.cooldownMs);
    }

    const candidate = await measure('candidate', pair.candidate, hooks);
    comparisons.push(buildComparisonReport(baseline, candidate));
  }

  return {
    generatedAt: (hooks.now?.() ?? new Date()).toISOString(),
    baseline: plan.baseline,
    candidate: plan.candidate,
    settings: plan.settings,
    comparisons,
  };
}
