import { config } from 'dotenv';
import { ConfigError } from './errors.js';
import { DeadlinePolicy } from './types.js';

config();

export interface BenchConfig {
  baselineUrl: string;
  baselineLabel: string;
  candidateUrl: string;
  candidateLabel: string;
  requestTimeoutMs: number;
  thinkTimeMs: number;
  connectRetries: number;
  cooldownMs: number;
  scenarioPauseMs: number;
  deadlinePolicy: DeadlinePolicy;
  resultsFile: string;
  webhookSecret: string;
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function readPolicy(env: NodeJS.ProcessEnv): DeadlinePolicy {
  const raw = env.BENCH_DEADLINE_POLICY || 'finish-in-flight';
  if (raw !== 'finish-in-flight' && raw !== 'abort-in-flight') {
    throw new ConfigError(
      `BENCH_DEADLINE_POLICY must be "finish-in-flight" or "abort-in-flight", got "${raw}"`
    );
  }
  return raw;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BenchConfig {
  return {
    baselineUrl: env.BENCH_BASELINE_URL || 'http://localhost:3000',
    baselineLabel: env.BENCH_BASELINE_LABEL || 'axum',
    candidateUrl: env.BENCH_CANDIDATE_URL || 'http://localhost:5150',
    candidateLabel: env.BENCH_CANDIDATE_LABEL || 'loco',
    requestTimeoutMs: readInt(env, 'BENCH_REQUEST_TIMEOUT_MS', 5000),
    thinkTimeMs: readInt(env, 'BENCH_THINK_TIME_MS', 10),
    connectRetries: readInt(env, 'BENCH_CONNECT_RETRIES', 3),
    cooldownMs: readInt(env, 'BENCH_COOLDOWN_MS', 5000),
    scenarioPauseMs: readInt(env, 'BENCH_SCENARIO_PAUSE_MS', 2000),
    deadlinePolicy: readPolicy(env),
    resultsFile: env.BENCH_RESULTS_FILE || 'benchmark-results.json',
    webhookSecret: env.BENCH_WEBHOOK_SECRET || 'webhook-secret',
  };
}
