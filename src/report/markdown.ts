import { summarizeSuite } from '../comparator.js';
import { ComparisonReport, ComparisonSuite } from '../types.js';
import {
  describeSettings,
  errorRows,
  fixed,
  metricRows,
  overallRows,
  scenarioTitle,
  signedPercent,
  verdictLine,
} from './format.js';

function cell(value: string): string {
  return value.replace(/\|/g, '\\|');
}

function tableRow(cells: (string | number)[]): string {
  return `| ${cells.map(c => cell(String(c))).join(' | ')} |`;
}

function separator(columns: number): string {
  return `|${'---|'.repeat(columns)}`;
}

function renderSection(report: ComparisonReport): string[] {
  const a = report.baseline.label;
  const b = report.candidate.label;
  const lines = [
    `## ${scenarioTitle(report.scenario)}`,
    '',
    tableRow(['Metric', a, b, 'Delta']),
    separator(4),
    ...metricRows(report).map(r => tableRow([r.metric, r.baseline, r.candidate, r.delta])),
    '',
  ];

  const errors = errorRows(report);
  if (errors.length > 0) {
    lines.push(
      '### Errors',
      '',
      tableRow(['Target', 'Category', 'Count', 'Share', 'Codes']),
      separator(5),
      ...errors.map(e => tableRow([e.label, e.category, e.count, e.share, e.codes])),
      ''
    );
  }

  lines.push(`**Verdict:** ${verdictLine(report)}`, '');
  return lines;
}

export function renderMarkdown(suite: ComparisonSuite): string {
  const a = suite.baseline.label;
  const b = suite.candidate.label;
  const overall = summarizeSuite(suite);

  const lines = [
    `# ${a} vs ${b} Performance Comparison`,
    '',
    `Generated at: ${suite.generatedAt}`,
    '',
    `- Baseline: **${a}** (${suite.baseline.url})`,
    `- Candidate: **${b}** (${suite.candidate.url})`,
    `- ${describeSettings(suite)}`,
    `- Deadline policy: ${suite.settings.deadlinePolicy}`,
    '',
    'Deltas are positive when the candidate is better; latency figures cover successful requests only.',
    '',
    '## Summary',
    '',
    tableRow(['Scenario', `${a} req/s`, `${b} req/s`, 'Throughput Δ', `${a} mean (ms)`, `${b} mean (ms)`, 'Latency Δ']),
    separator(7),
    ...suite.comparisons.map(c =>
      tableRow([
        scenarioTitle(c.scenario),
        fixed(c.baseline.requestsPerSecond),
        fixed(c.candidate.requestsPerSecond),
        signedPercent(c.deltas.throughputPercent),
        fixed(c.baseline.latency.mean),
        fixed(c.candidate.latency.mean),
        signedPercent(c.deltas.meanLatencyPercent),
      ])
    ),
    '',
    '## Overall',
    '',
    `Averaged across ${overall.baseline.scenarios} scenario(s).`,
    '',
    tableRow(['Metric', a, b, 'Delta']),
    separator(4),
    ...overallRows(overall).map(r => tableRow([r.metric, r.baseline, r.candidate, r.delta])),
    '',
    `**Verdict:** ${verdictLine(overall)}`,
    '',
    ...suite.comparisons.flatMap(renderSection),
  ];

  return lines.join('\n');
}
