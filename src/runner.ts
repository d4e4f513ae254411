import { executeRequest } from './http-client.js';
import { getScenario } from './scenarios/index.js';
import { Scenario, ScenarioContext, VirtualUserSession } from './scenarios/scenario.js';
import { RequestOutcome, ScenarioConfig, ScenarioRun } from './types.js';
import { validateScenarioConfig } from './validation.js';

export type WorkerExitReason = 'deadline' | 'connection-failures';

export interface RunnerOptions {
  webhookSecret?: string;
  random?: () => number;
  fetchImpl?: typeof fetch;
  /** Fire onProgress every this many completed requests. */
  progressInterval?: number;
  onProgress?: (completed: number) => void;
  onWorkerExit?: (workerId: number, reason: WorkerExitReason) => void;
}

interface RunState {
  config: ScenarioConfig;
  scenario: Scenario;
  context: ScenarioContext;
  runId: string;
  deadline: number;
  stop: AbortSignal;
  options: RunnerOptions;
  recordCompletion: () => void;
}

interface WorkerReport {
  outcomes: RequestOutcome[];
  cancelled: number;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (ms <= 0 || signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

export function rampUpDelayMs(config: Pick<ScenarioConfig, 'rampUpSeconds' | 'concurrency'>, workerId: number): number {
  if (config.rampUpSeconds <= 0) {
    return 0;
  }
  return ((config.rampUpSeconds * 1000) / config.concurrency) * workerId;
}

async function runVirtualUser(workerId: number, state: RunState): Promise<WorkerReport> {
  const { config, scenario, context, stop, options } = state;
  const outcomes: RequestOutcome[] = [];
  const session: VirtualUserSession = { workerId, runId: state.runId, iteration: 0 };
  const expired = (): boolean => stop.aborted || performance.now() >= state.deadline;
  const cancelSignal = config.deadlinePolicy === 'abort-in-flight' ? stop : undefined;

  let cancelled = 0;
  let consecutiveConnectionFailures = 0;
  let issuedAny = false;

  await sleep(rampUpDelayMs(config, workerId), stop);

  while (!expired()) {
    for (const step of scenario.nextPass(session, context)) {
      if (issuedAny) {
        await sleep(config.thinkTimeMs, stop);
      }
      // The deadline is only checked between requests, never mid-request.
      if (expired()) {
        break;
      }

      issuedAny = true;
      const timestamp = Date.now();
      const result = await executeRequest(config.targetUrl, step.build(session), {
        timeoutMs: config.requestTimeoutMs,
        cancelSignal,
        fetchImpl: options.fetchImpl,
      });

      if (result.kind === 'cancelled') {
        cancelled++;
        break;
      }

      consecutiveConnectionFailures = result.category === 'connection' ? consecutiveConnectionFailures + 1 : 0;
      const terminal = consecutiveConnectionFailures > config.connectRetries;

      outcomes.push({
        timestamp,
        scenario: config.scenario,
        tag: step.tag,
        workerId,
        latencyMs: result.latencyMs,
        success: result.success,
        status: result.status,
        category: result.category,
        errorCode: result.errorCode,
        bytes: result.bytes,
        ...(terminal ? { terminal: true } : {}),
      });
      state.recordCompletion();

      if (result.success) {
        step.capture?.(result.payload, session);
      }

      if (terminal) {
        options.onWorkerExit?.(workerId, 'connection-failures');
        return { outcomes, cancelled };
      }
    }
    session.iteration++;
  }

  options.onWorkerExit?.(workerId, 'deadline');
  return { outcomes, cancelled };
}

/**
 * Runs one scenario against one target with `concurrency` independent
 * virtual users until the configured duration elapses.
 *
 * Each worker buffers its own outcomes; buffers are merged once every
 * worker has returned. Per-request failures are recorded, never thrown.
 * Throws ConfigError before any request is sent when the config is invalid.
 */
export async function runScenario(config: ScenarioConfig, options: RunnerOptions = {}): Promise<ScenarioRun> {
  const validated = validateScenarioConfig(config);
  const durationMs = validated.durationSeconds * 1000;
  const progressInterval = Math.max(1, Math.floor(options.progressInterval ?? 100));
  const stop = new AbortController();

  let completed = 0;
  const startedAt = new Date().toISOString();
  const start = performance.now();

  const state: RunState = {
    config: validated,
    scenario: getScenario(validated.scenario),
    context: {
      webhookSecret: options.webhookSecret ?? 'webhook-secret',
      random: options.random ?? Math.random,
    },
    runId: Date.now().toString(36),
    deadline: start + durationMs,
    stop: stop.signal,
    options,
    recordCompletion: () => {
      completed++;
      if (completed % progressInterval === 0) {
        options.onProgress?.(completed);
      }
    },
  };

  const timer = setTimeout(() => stop.abort(), durationMs);
  let reports: WorkerReport[];
  try {
    reports = await Promise.all(
      Array.from({ length: validated.concurrency }, (_, workerId) => runVirtualUser(workerId, state))
    );
  } finally {
    clearTimeout(timer);
    stop.abort();
  }

  const wallClockMs = performance.now() - start;

  return {
    config: validated,
    startedAt,
    wallClockMs,
    outcomes: reports.flatMap(r => r.outcomes),
    cancelledInFlight: reports.reduce((sum, r) => sum + r.cancelled, 0),
  };
}
