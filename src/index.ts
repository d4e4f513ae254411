#!/usr/bin/env node

import { Command } from 'commander';
import {
  CompareOptions,
  ReportOptions,
  SingleOptions,
  compareCommand,
  reportCommand,
  reportFatal,
  singleCommand,
} from './commands.js';

const program = new Command();

program
  .name('framework-bench')
  .description('Load-test two HTTP backends with identical scenarios and compare them')
  .version('1.0.0')
  // Usage errors share the exit code of invalid configuration.
  .exitOverride(err => process.exit(err.exitCode === 0 ? 0 : 2));

program
  .command('compare')
  .description('Run every scenario against a baseline and a candidate target')
  .option('--baseline-url <url>', 'Baseline target URL')
  .option('--baseline-label <name>', 'Baseline display name')
  .option('--candidate-url <url>', 'Candidate target URL')
  .option('--candidate-label <name>', 'Candidate display name')
  .option('-u, --users <number>', 'Concurrent virtual users', '100')
  .option('-d, --duration <seconds>', 'Run duration per target and scenario', '60')
  .option('-r, --ramp-up <seconds>', 'Ramp-up time', '10')
  .option('-s, --scenario <kinds>', 'Comma-separated scenarios: health, rest, graphql, mixed or all', 'all')
  .option('--save <path>', 'Where to save the raw results JSON')
  .option('-f, --format <format>', 'Also render a report: markdown, json, html')
  .option('-o, --output <path>', 'Report output path (stdout when omitted)')
  .option('--verbose', 'Show debug output')
  .action(async (options: CompareOptions) => {
    try {
      await compareCommand(options);
    } catch (error) {
      process.exit(reportFatal(error));
    }
  });

program
  .command('single')
  .description('Run scenarios against one target')
  .requiredOption('--url <url>', 'Target URL')
  .requiredOption('--framework <name>', 'Target display name')
  .option('-u, --users <number>', 'Concurrent virtual users', '100')
  .option('-d, --duration <seconds>', 'Run duration per scenario', '60')
  .option('-r, --ramp-up <seconds>', 'Ramp-up time', '10')
  .option('-s, --scenario <kinds>', 'Comma-separated scenarios: health, rest, graphql, mixed or all', 'all')
  .option('--json', 'Print results as JSON')
  .option('--verbose', 'Show debug output')
  .action(async (options: SingleOptions) => {
    try {
      await singleCommand(options);
    } catch (error) {
      process.exit(reportFatal(error));
    }
  });

program
  .command('report')
  .description('Render a report from saved comparison results')
  .option('-i, --input <path>', 'Results JSON written by compare')
  .option('-f, --format <format>', 'Output format: markdown, json, html', 'markdown')
  .option('-o, --output <path>', 'Output file (stdout when omitted)')
  .action(async (options: ReportOptions) => {
    try {
      await reportCommand(options);
    } catch (error) {
      process.exit(reportFatal(error));
    }
  });

program.parse();
