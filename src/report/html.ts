import Handlebars from 'handlebars';
import { summarizeSuite } from '../comparator.js';
import { ComparisonSuite } from '../types.js';
import { describeSettings, errorRows, metricRows, overallRows, scenarioTitle, verdictLine } from './format.js';

const TEMPLATE = `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>{{title}}</title>
  <style>
    body { font-family: Arial, sans-serif; margin: 40px; }
    table { border-collapse: collapse; width: 100%; margin-bottom: 16px; }
    th, td { border: 1px solid #ddd; padding: 8px; text-align: left; }
    th { background-color: #f2f2f2; }
    .metric { font-weight: bold; }
  </style>
</head>
<body>
  <h1>{{title}}</h1>
  <p>Generated at: {{generatedAt}}</p>
  <p>Baseline: <strong>{{baselineLabel}}</strong> ({{baselineUrl}}), candidate: <strong>{{candidateLabel}}</strong> ({{candidateUrl}})</p>
  <p>{{settings}}; deadline policy: {{deadlinePolicy}}</p>
  <h2>Overall</h2>
  <p>Averaged across {{overall.scenarios}} scenario(s).</p>
  <table>
    <tr><th>Metric</th><th>{{baselineLabel}}</th><th>{{candidateLabel}}</th><th>Delta</th></tr>
    {{#each overall.rows}}
    <tr><td class="metric">{{metric}}</td><td>{{baseline}}</td><td>{{candidate}}</td><td>{{delta}}</td></tr>
    {{/each}}
  </table>
  <p><strong>Verdict:</strong> {{overall.verdict}}</p>
  {{#each sections}}
  <h2>{{title}}</h2>
  <table>
    <tr><th>Metric</th><th>{{baselineLabel}}</th><th>{{candidateLabel}}</th><th>Delta</th></tr>
    {{#each rows}}
    <tr><td class="metric">{{metric}}</td><td>{{baseline}}</td><td>{{candidate}}</td><td>{{delta}}</td></tr>
    {{/each}}
  </table>
  {{#if errors.length}}
  <table>
    <tr><th>Target</th><th>Category</th><th>Count</th><th>Share</th><th>Codes</th></tr>
    {{#each errors}}
    <tr><td>{{label}}</td><td>{{category}}</td><td>{{count}}</td><td>{{share}}</td><td>{{codes}}</td></tr>
    {{/each}}
  </table>
  {{/if}}
  <p><strong>Verdict:</strong> {{verdict}}</p>
  {{/each}}
</body>
</html>
`;

// A private environment keeps helpers and partials registered elsewhere out of the report.
const handlebars = Handlebars.create();
const template = handlebars.compile(TEMPLATE);

export function renderHtml(suite: ComparisonSuite): string {
  const overall = summarizeSuite(suite);
  return template({
    title: `${suite.baseline.label} vs ${suite.candidate.label} Performance Comparison`,
    generatedAt: suite.generatedAt,
    baselineLabel: suite.baseline.label,
    baselineUrl: suite.baseline.url,
    candidateLabel: suite.candidate.label,
    candidateUrl: suite.candidate.url,
    settings: describeSettings(suite),
    deadlinePolicy: suite.settings.deadlinePolicy,
    overall: {
      scenarios: overall.baseline.scenarios,
      rows: overallRows(overall),
      verdict: verdictLine(overall),
    },
    sections: suite.comparisons.map(report => ({
      title: scenarioTitle(report.scenario),
      baselineLabel: report.baseline.label,
      candidateLabel: report.candidate.label,
      rows: metricRows(report),
      errors: errorRows(report),
      verdict: verdictLine(report),
    })),
  });
}
