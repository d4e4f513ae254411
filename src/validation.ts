import { z } from 'zod';
import { ConfigError } from './errors.js';
import { ComparisonSuite, ScenarioConfig } from './types.js';

const scenarioKind = z.enum(['health', 'rest', 'graphql', 'mixed']);
const deadlinePolicy = z.enum(['finish-in-flight', 'abort-in-flight']);
const failureCategory = z.enum(['timeout', 'connection', 'status', 'body']);
const side = z.enum(['baseline', 'candidate']);

const httpUrl = z
  .string()
  .url('must be a valid URL')
  .refine(value => /^https?:\/\//i.test(value), 'must use http or https');

const nonNegative = z.number().finite().nonnegative();

export const scenarioConfigSchema = z.object({
  label: z.string().trim().min(1, 'must not be empty'),
  targetUrl: httpUrl,
  scenario: scenarioKind,
  concurrency: z.number().int('must be a whole number').positive('must be at least 1'),
  durationSeconds: nonNegative,
  rampUpSeconds: nonNegative,
  thinkTimeMs: nonNegative,
  requestTimeoutMs: z.number().finite().positive('must be greater than 0'),
  connectRetries: z.number().int().nonnegative(),
  deadlinePolicy,
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function validateScenarioConfig(config: ScenarioConfig): ScenarioConfig {
  const parsed = scenarioConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new ConfigError(`Invalid scenario config for "${config.label}": ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

const latencyStats = z.object({
  min: z.number(),
  max: z.number(),
  mean: z.number(),
  p50: z.number(),
  p95: z.number(),
  p99: z.number(),
});

const aggregateResult = z.object({
  label: z.string(),
  scenario: scenarioKind,
  totalRequests: z.number().int().nonnegative(),
  successfulRequests: z.number().int().nonnegative(),
  failedRequests: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative(),
  requestsPerSecond: z.number().nonnegative(),
  errorRate: z.number(),
  latency: latencyStats,
  errors: z.array(
    z.object({
      category: failureCategory,
      count: z.number().int(),
      percentage: z.number(),
      codes: z.array(z.object({ code: z.string(), count: z.number().int() })),
    })
  ),
  bytesReceived: z.number().nonnegative(),
  abandonedWorkers: z.number().int().nonnegative(),
});

const comparisonReport = z.object({
  scenario: scenarioKind,
  baseline: aggregateResult,
  candidate: aggregateResult,
  deltas: z.object({
    throughputPercent: z.number().nullable(),
    meanLatencyPercent: z.number().nullable(),
    p95LatencyPercent: z.number().nullable(),
    p99LatencyPercent: z.number().nullable(),
    errorRatePoints: z.number(),
  }),
  verdict: z.object({
    throughputWinner: side.nullable(),
    latencyWinner: side.nullable(),
    throughput: z.string(),
    latency: z.string(),
    summary: z.string(),
  }),
});

const targetInfo = z.object({ label: z.string(), url: z.string() });

export const comparisonSuiteSchema: z.ZodType<ComparisonSuite> = z.object({
  generatedAt: z.string(),
  baseline: targetInfo,
  candidate: targetInfo,
  settings: z.object({
    concurrency: z.number(),
    durationSeconds: z.number(),
    rampUpSeconds: z.number(),
    thinkTimeMs: z.number(),
    requestTimeoutMs: z.number(),
    connectRetries: z.number(),
    deadlinePolicy,
    cooldownMs: z.number(),
  }),
  comparisons: z.array(comparisonReport),
});

export type SuiteParseResult =
  | { ok: true; suite: ComparisonSuite }
  | { ok: false; problem: string };

export function parseComparisonSuite(data: unknown): SuiteParseResult {
  const parsed = comparisonSuiteSchema.safeParse(data);
  if (!parsed.success) {
    return { ok: false, problem: describeIssues(parsed.error) };
  }
  return { ok: true, suite: parsed.data };
}
