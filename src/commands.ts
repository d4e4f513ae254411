import chalk from 'chalk';
import { parseDurationSeconds, parseNonNegative, parsePositiveInt, parseScenarios } from './cli-options.js';
import { runComparison, validatedConfigs } from './comparator.js';
import { BenchConfig, loadConfig } from './config.js';
import { printComparison, printResult } from './console-reporter.js';
import { exitCodeFor } from './errors.js';
import { LogLevel, logger } from './logger.js';
import { aggregateRun } from './metrics.js';
import { probeTarget } from './preflight.js';
import { scenarioTitle } from './report/format.js';
import { parseReportFormat, renderReport } from './report/index.js';
import { loadSuite, saveSuite, writeTextFile } from './results-store.js';
import { runScenario } from './runner.js';
import { getScenario } from './scenarios/index.js';
import { AggregateResult, SuiteSettings, TargetInfo } from './types.js';

export interface LoadOptions {
  users: string;
  duration: string;
  rampUp: string;
  scenario: string;
  verbose?: boolean;
}

export interface CompareOptions extends LoadOptions {
  baselineUrl?: string;
  baselineLabel?: string;
  candidateUrl?: string;
  candidateLabel?: string;
  save?: string;
  format?: string;
  output?: string;
}

export interface SingleOptions extends LoadOptions {
  url: string;
  framework: string;
  json?: boolean;
}

export interface ReportOptions {
  input?: string;
  format: string;
  output?: string;
}

/** Seams for tests; the CLI uses the process environment and global fetch. */
export interface CommandEnvironment {
  env?: NodeJS.ProcessEnv;
  fetchImpl?: typeof fetch;
}

function settingsFrom(options: LoadOptions, cfg: BenchConfig): SuiteSettings {
  return {
    concurrency: parsePositiveInt('--users', options.users),
    durationSeconds: parseDurationSeconds(options.duration),
    rampUpSeconds: parseNonNegative('--ramp-up', options.rampUp),
    thinkTimeMs: cfg.thinkTimeMs,
    requestTimeoutMs: cfg.requestTimeoutMs,
    connectRetries: cfg.connectRetries,
    deadlinePolicy: cfg.deadlinePolicy,
    cooldownMs: cfg.cooldownMs,
  };
}

async function preflight(targets: TargetInfo[], timeoutMs: number, fetchImpl?: typeof fetch): Promise<void> {
  for (const target of targets) {
    const probe = await probeTarget(target, timeoutMs, fetchImpl);
    if (probe.healthy) {
      logger.debug(`${target.label} answered /health in ${probe.latencyMs.toFixed(1)}ms`);
    } else {
      logger.warn(`${target.label} answered /health with status ${probe.status ?? 'unknown'}`);
    }
  }
}

function showProgress(completed: number): void {
  process.stdout.write(`\rProgress: ${completed} requests`);
}

function endProgress(): void {
  process.stdout.write('\n');
}

/**
 * Prints a fatal error to stderr whatever the log level, so `--json` runs
 * still explain a non-zero exit. Returns the exit code for the error.
 */
export function reportFatal(error: unknown): number {
  const message = error instanceof Error ? error.message : 'An unknown error occurred';
  console.error(chalk.red(`Error: ${message}`));
  return exitCodeFor(error);
}

export async function compareCommand(options: CompareOptions, environment: CommandEnvironment = {}): Promise<void> {
  if (options.verbose) logger.setLevel(LogLevel.DEBUG);
  const cfg = loadConfig(environment.env);

  const baseline: TargetInfo = {
    label: options.baselineLabel ?? cfg.baselineLabel,
    url: options.baselineUrl ?? cfg.baselineUrl,
  };
  const candidate: TargetInfo = {
    label: options.candidateLabel ?? cfg.candidateLabel,
    url: options.candidateUrl ?? cfg.candidateUrl,
  };
  const settings = settingsFrom(options, cfg);
  const scenarios = parseScenarios(options.scenario);
  const format = options.format === undefined ? undefined : parseReportFormat(options.format);

  // A malformed URL or timeout is a configuration problem, not an unreachable target.
  validatedConfigs(baseline, scenarios, settings);
  validatedConfigs(candidate, scenarios, settings);

  await preflight([baseline, candidate], cfg.requestTimeoutMs, environment.fetchImpl);

  logger.info(
    `Comparing ${baseline.label} and ${candidate.label}: ${scenarios.length} scenario(s), ` +
      `${settings.concurrency} users for ${settings.durationSeconds}s each`
  );

  const suite = await runComparison(
    { baseline, candidate, scenarios, settings, scenarioPauseMs: cfg.scenarioPauseMs },
    {
      webhookSecret: cfg.webhookSecret,
      fetchImpl: environment.fetchImpl,
      onProgress: showProgress,
      onRunStart: (side, config) => {
        logger.info(`${scenarioTitle(config.scenario)}: running ${side} ${config.label}`);
        logger.debug(getScenario(config.scenario).description);
      },
      onRunComplete: (_, result, run) => {
        endProgress();
        if (run.cancelledInFlight > 0) {
          logger.debug(`${run.cancelledInFlight} request(s) were cancelled at the deadline`);
        }
        printResult(result);
      },
      onPause: (ms, reason) => logger.debug(`Pausing ${ms}ms (${reason})`),
      onWorkerExit: (workerId, reason) => {
        if (reason === 'connection-failures') {
          logger.warn(`Virtual user ${workerId} stopped after repeated connection failures`);
        }
      },
    }
  );

  printComparison(suite);

  const savePath = options.save ?? cfg.resultsFile;
  await saveSuite(savePath, suite);
  logger.success(`Results saved to ${savePath}`);

  if (format) {
    const rendered = renderReport(suite, format);
    if (options.output) {
      await writeTextFile(options.output, rendered);
      logger.success(`Report written to ${options.output}`);
    } else {
      console.log(rendered);
    }
  }
}

export async function singleCommand(options: SingleOptions, environment: CommandEnvironment = {}): Promise<void> {
  if (options.verbose) logger.setLevel(LogLevel.DEBUG);
  // Progress and log lines would corrupt the JSON document on stdout.
  if (options.json) logger.setLevel(LogLevel.SILENT);
  const cfg = loadConfig(environment.env);

  const target: TargetInfo = { label: options.framework, url: options.url };
  const settings = settingsFrom(options, cfg);
  const scenarios = parseScenarios(options.scenario);
  const configs = validatedConfigs(target, scenarios, settings);

  await preflight([target], cfg.requestTimeoutMs, environment.fetchImpl);

  const results: AggregateResult[] = [];
  for (const [index, config] of configs.entries()) {
    if (index > 0 && cfg.scenarioPauseMs > 0) {
      await new Promise(resolve => setTimeout(resolve, cfg.scenarioPauseMs));
    }
    logger.info(`${scenarioTitle(config.scenario)}: running ${target.label}`);
    const run = await runScenario(config, {
      webhookSecret: cfg.webhookSecret,
      fetchImpl: environment.fetchImpl,
      onProgress: options.json ? undefined : showProgress,
    });
    const result = aggregateRun(run);
    results.push(result);
    if (!options.json) {
      endProgress();
      printResult(result);
    }
  }

  if (options.json) {
    console.log(JSON.stringify(results, null, 2));
  }
}

export async function reportCommand(options: ReportOptions, environment: CommandEnvironment = {}): Promise<void> {
  const cfg = loadConfig(environment.env);
  const format = parseReportFormat(options.format);
  const suite = await loadSuite(options.input ?? cfg.resultsFile);
  const rendered = renderReport(suite, format);

  if (options.output) {
    await writeTextFile(options.output, rendered);
    logger.success(`Report written to ${options.output}`);
  } else {
    console.log(rendered);
  }
}
