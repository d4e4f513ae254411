export type ScenarioKind = 'health' | 'rest' | 'graphql' | 'mixed';

export const SCENARIO_KINDS: readonly ScenarioKind[] = ['health', 'rest', 'graphql', 'mixed'];

export type FailureCategory = 'timeout' | 'connection' | 'status' | 'body';

export type DeadlinePolicy = 'finish-in-flight' | 'abort-in-flight';

export interface RequestOutcome {
  readonly timestamp: number;
  readonly scenario: ScenarioKind;
  readonly tag: string;
  readonly workerId: number;
  readonly latencyMs: number;
  readonly success: boolean;
  readonly status?: number;
  readonly category?: FailureCategory;
  readonly errorCode?: string;
  readonly bytes: number;
  /** Set on the failure after which the worker stopped issuing requests. */
  readonly terminal?: boolean;
}

export interface ScenarioConfig {
  label: string;
  targetUrl: string;
  scenario: ScenarioKind;
  concurrency: number;
  durationSeconds: number;
  rampUpSeconds: number;
  thinkTimeMs: number;
  requestTimeoutMs: number;
  connectRetries: number;
  deadlinePolicy: DeadlinePolicy;
}

export interface ScenarioRun {
  config: Readonly<ScenarioConfig>;
  startedAt: string;
  wallClockMs: number;
  outcomes: readonly RequestOutcome[];
  cancelledInFlight: number;
}

export interface LatencyStats {
  min: number;
  max: number;
  mean: number;
  p50: number;
  p95: number;
  p99: number;
}

export interface ErrorCodeCount {
  code: string;
  count: number;
}

export interface ErrorBreakdownEntry {
  category: FailureCategory;
  count: number;
  /** Share of all requests in the run, 0-100. */
  percentage: number;
  codes: ErrorCodeCount[];
}

export interface AggregateResult {
  readonly label: string;
  readonly scenario: ScenarioKind;
  readonly totalRequests: number;
  readonly successfulRequests: number;
  readonly failedRequests: number;
  readonly durationMs: number;
  readonly requestsPerSecond: number;
  readonly errorRate: number;
  readonly latency: Readonly<LatencyStats>;
  readonly errors: readonly ErrorBreakdownEntry[];
  readonly bytesReceived: number;
  readonly abandonedWorkers: number;
}

/** The figures deltas are computed from; both per-scenario and averaged results carry them. */
export interface ComparableMetrics {
  readonly requestsPerSecond: number;
  readonly successfulRequests: number;
  readonly errorRate: number;
  readonly latency: Readonly<Pick<LatencyStats, 'mean' | 'p95' | 'p99'>>;
}

/** One target's results averaged across every scenario of a suite. */
export interface OverallMetrics extends ComparableMetrics {
  readonly label: string;
  readonly scenarios: number;
  readonly totalRequests: number;
}

export interface ComparisonDeltas {
  /** (B - A) / A * 100; null when only the baseline had zero throughput. */
  throughputPercent: number | null;
  /** (A - B) / max(A, B) * 100, positive when the candidate is faster. */
  meanLatencyPercent: number | null;
  p95LatencyPercent: number | null;
  p99LatencyPercent: number | null;
  /** Candidate error rate minus baseline error rate, in percentage points. */
  errorRatePoints: number;
}

export type Side = 'baseline' | 'candidate';

export interface Verdict {
  throughputWinner: Side | null;
  latencyWinner: Side | null;
  throughput: string;
  latency: string;
  summary: string;
}

export interface ComparisonReport {
  readonly scenario: ScenarioKind;
  readonly baseline: AggregateResult;
  readonly candidate: AggregateResult;
  readonly deltas: Readonly<ComparisonDeltas>;
  readonly verdict: Readonly<Verdict>;
}

export interface OverallComparison {
  readonly baseline: OverallMetrics;
  readonly candidate: OverallMetrics;
  readonly deltas: Readonly<ComparisonDeltas>;
  readonly verdict: Readonly<Verdict>;
}

export interface TargetInfo {
  label: string;
  url: string;
}

export interface SuiteSettings {
  concurrency: number;
  durationSeconds: number;
  rampUpSeconds: number;
  thinkTimeMs: number;
  requestTimeoutMs: number;
  connectRetries: number;
  deadlinePolicy: DeadlinePolicy;
  cooldownMs: number;
}

export interface ComparisonSuite {
  generatedAt: string;
  baseline: TargetInfo;
  candidate: TargetInfo;
  settings: SuiteSettings;
  comparisons: ComparisonReport[];
}

export type ReportFormat = 'markdown' | 'json' | 'html';
