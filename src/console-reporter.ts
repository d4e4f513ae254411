import chalk from 'chalk';
import { summarizeSuite } from './comparator.js';
import { scenarioTitle, signedPercent } from './report/format.js';
import { AggregateResult, ComparisonSuite } from './types.js';

function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatLatency(ms: number): string {
  return ms.toFixed(2);
}

export function printResult(result: AggregateResult): void {
  const successRate = result.totalRequests > 0 ? (100 - result.errorRate).toFixed(1) : '0.0';

  console.log('');
  console.log(chalk.bold(`${result.label}: ${scenarioTitle(result.scenario)}`));
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log(`${chalk.cyan('Duration:')}      ${formatDuration(result.durationMs)}`);
  console.log('');

  console.log(chalk.bold('Requests:'));
  console.log(`  Total:        ${result.totalRequests}`);
  console.log(`  Succeeded:    ${chalk.green(result.successfulRequests)} (${successRate}%)`);
  console.log(`  Failed:       ${chalk.red(result.failedRequests)} (${result.errorRate.toFixed(1)}%)`);
  if (result.abandonedWorkers > 0) {
    console.log(`  Abandoned:    ${chalk.yellow(result.abandonedWorkers)} worker(s) gave up after repeated connection failures`);
  }
  console.log('');

  if (result.successfulRequests > 0) {
    console.log(chalk.bold('Latency (ms, successful requests):'));
    console.log(`  Min:          ${formatLatency(result.latency.min)}`);
    console.log(`  Max:          ${formatLatency(result.latency.max)}`);
    console.log(`  Mean:         ${formatLatency(result.latency.mean)}`);
    console.log(`  p50:          ${formatLatency(result.latency.p50)}`);
    console.log(`  p95:          ${formatLatency(result.latency.p95)}`);
    console.log(`  p99:          ${formatLatency(result.latency.p99)}`);
    console.log('');
  }

  if (result.errors.length > 0) {
    console.log(chalk.bold('Errors:'));
    for (const entry of result.errors) {
      const codes = entry.codes.map(c => `${c.code}=${c.count}`).join(', ');
      console.log(`  ${chalk.red(entry.category)}:  ${entry.count} (${entry.percentage.toFixed(1)}%)  ${chalk.gray(codes)}`);
    }
    console.log('');
  }

  console.log(`${chalk.cyan('Throughput:')}   ${chalk.bold(result.requestsPerSecond.toFixed(1))} req/s`);
  console.log(chalk.gray('══════════════════════════════════════'));
}

export function printComparison(suite: ComparisonSuite): void {
  console.log('');
  console.log(chalk.bold(`${suite.baseline.label} vs ${suite.candidate.label}`));
  console.log(chalk.gray('══════════════════════════════════════'));

  for (const report of suite.comparisons) {
    const { verdict, deltas } = report;
    console.log(chalk.bold(scenarioTitle(report.scenario)));
    console.log(`  Throughput:     ${signedPercent(deltas.throughputPercent).padStart(9)}   ${verdict.throughput}`);
    console.log(`  Response time:  ${signedPercent(deltas.meanLatencyPercent).padStart(9)}   ${verdict.latency}`);
    console.log(`  ${chalk.green(verdict.summary)}`);
    console.log('');
  }

  const overall = summarizeSuite(suite);
  console.log(chalk.bold(`Overall (${overall.baseline.scenarios} scenario(s))`));
  console.log(`  Throughput:     ${signedPercent(overall.deltas.throughputPercent).padStart(9)}   ${overall.verdict.throughput}`);
  console.log(`  Response time:  ${signedPercent(overall.deltas.meanLatencyPercent).padStart(9)}   ${overall.verdict.latency}`);
  console.log(`  ${chalk.green(overall.verdict.summary)}`);
  console.log(chalk.gray('══════════════════════════════════════'));
}
