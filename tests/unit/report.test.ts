/**
 * Unit Tests: Markdown, JSON and HTML renderers.
 */
import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../src/errors.js';
import { parseReportFormat, renderHtml, renderJson, renderMarkdown, renderReport } from '../../src/report/index.js';
import { signedPercent, signedPoints } from '../../src/report/format.js';
import { summarizeSuite } from '../../src/comparator.js';
import { makeSuite, twoScenarioSuite } from '../helpers/mock-fetch.js';

function withErrors() {
  return makeSuite(
    {},
    {
      failedRequests: 5,
      errorRate: 0.5,
      errors: [
        {
          category: 'status',
          count: 5,
          percentage: 0.5,
          codes: [
            { code: 'HTTP_500', count: 3 },
            { code: 'HTTP_502', count: 2 },
          ],
        },
      ],
    }
  );
}

describe('format helpers', () => {
  it('signs percentages', () => {
    expect(signedPercent(10)).toBe('+10.00%');
    expect(signedPercent(-2.5)).toBe('-2.50%');
    expect(signedPercent(null)).toBe('n/a');
  });

  it('signs percentage points', () => {
    expect(signedPoints(0.5)).toBe('+0.50 pp');
    expect(signedPoints(-1)).toBe('-1.00 pp');
  });
});

describe('renderMarkdown', () => {
  const lines = renderMarkdown(makeSuite()).split('\n');

  it('starts with the title and run settings', () => {
    expect(lines[0]).toBe('# axum vs loco Performance Comparison');
    expect(lines).toContain('Generated at: 2024-01-01T00:00:00.000Z');
    expect(lines).toContain('- Baseline: **axum** (http://localhost:3000)');
    expect(lines).toContain('- Candidate: **loco** (http://localhost:5150)');
    expect(lines).toContain(
      '- Virtual users: 100, duration: 10s, ramp-up: 2s, think time: 10ms, request timeout: 5000ms'
    );
    expect(lines).toContain('- Deadline policy: finish-in-flight');
  });

  it('summarises every scenario in one table', () => {
    expect(lines).toContain(
      '| Scenario | axum req/s | loco req/s | Throughput Δ | axum mean (ms) | loco mean (ms) | Latency Δ |'
    );
    expect(lines).toContain('| Health Check | 100.00 | 110.00 | +10.00% | 10.00 | 8.00 | +20.00% |');
  });

  it('renders the metric table with labels as columns', () => {
    expect(lines).toContain('## Health Check');
    expect(lines).toContain('| Metric | axum | loco | Delta |');
    expect(lines).toContain('|---|---|---|---|');
    expect(lines).toContain('| Requests/sec | 100.00 | 110.00 | +10.00% |');
    expect(lines).toContain('| Mean latency (ms) | 10.00 | 8.00 | +20.00% |');
    expect(lines).toContain('| P95 latency (ms) | 15.00 | 12.00 | +20.00% |');
    expect(lines).toContain('| P99 latency (ms) | 18.00 | 18.00 | +0.00% |');
    expect(lines).toContain('| Total requests | 1000 | 1100 |  |');
    expect(lines).toContain('| Error rate | 0.00% | 0.00% | +0.00 pp |');
  });

  it('ends each section with the verdict', () => {
    expect(lines).toContain(
      '**Verdict:** loco wins throughput by 10.0%. loco wins response time by 20.0%. loco performs better overall.'
    );
  });

  it('omits the error table when nothing failed', () => {
    expect(lines).not.toContain('### Errors');
  });

  it('lists failures per target', () => {
    const withErrorLines = renderMarkdown(withErrors()).split('\n');

    expect(withErrorLines).toContain('### Errors');
    expect(withErrorLines).toContain('| Target | Category | Count | Share | Codes |');
    expect(withErrorLines).toContain('| loco | status | 5 | 0.50% | HTTP_500 ×3, HTTP_502 ×2 |');
    expect(withErrorLines).toContain('| Error rate | 0.00% | 0.50% | +0.50 pp |');
  });

  it('adds the cross-scenario averages and verdict', () => {
    const overall = renderMarkdown(twoScenarioSuite()).split('\n');
    const start = overall.indexOf('## Overall');

    expect(start).toBeGreaterThan(overall.indexOf('## Summary'));
    expect(start).toBeLessThan(overall.indexOf('## Health Check'));
    expect(overall.slice(start, start + 13)).toEqual([
      '## Overall',
      '',
      'Averaged across 2 scenario(s).',
      '',
      '| Metric | axum | loco | Delta |',
      '|---|---|---|---|',
      '| Avg requests/sec | 75.00 | 75.00 | +0.00% |',
      '| Avg mean latency (ms) | 20.00 | 24.00 | -16.67% |',
      '| Avg P95 latency (ms) | 27.50 | 31.00 | -11.29% |',
      '| Avg P99 latency (ms) | 34.00 | 39.00 | -12.82% |',
      '| Error rate | 0.00% | 0.00% | +0.00 pp |',
      '',
      '**Verdict:** No significant difference in throughput (0.0%). axum wins response time by 16.7%. axum performs better overall.',
    ]);
  });

  it('computes the overall error rate over every request', () => {
    expect(renderMarkdown(withErrors()).split('\n')).toContain('| Error rate | 0.00% | 0.45% | +0.45 pp |');
  });

  it('escapes pipes in table cells', () => {
    const suite = makeSuite({ label: 'axum|v2' });
    suite.baseline.label = 'axum|v2';
    const escaped = renderMarkdown(suite).split('\n');

    expect(escaped).toContain('| Metric | axum\\|v2 | loco | Delta |');
  });
});

describe('renderJson', () => {
  it('mirrors the suite and adds the overall summary', () => {
    const suite = twoScenarioSuite();
    expect(JSON.parse(renderJson(suite))).toEqual({ ...suite, overall: summarizeSuite(suite) });
  });

  it('includes the overall verdict', () => {
    const parsed: unknown = JSON.parse(renderJson(twoScenarioSuite()));

    expect(parsed).toMatchObject({
      overall: {
        baseline: { label: 'axum', scenarios: 2, requestsPerSecond: 75 },
        candidate: { label: 'loco', scenarios: 2, requestsPerSecond: 75 },
        verdict: { summary: 'axum performs better overall' },
      },
    });
  });

  it('is indented with two spaces', () => {
    expect(renderJson(makeSuite()).split('\n')[1]).toBe('  "generatedAt": "2024-01-01T00:00:00.000Z",');
  });
});

describe('renderHtml', () => {
  it('renders a metric row per measure', () => {
    const html = renderHtml(makeSuite());

    expect(html).toContain('<title>axum vs loco Performance Comparison</title>');
    expect(html).toContain('<h2>Health Check</h2>');
    expect(html).toContain(
      '<tr><td class="metric">Requests/sec</td><td>100.00</td><td>110.00</td><td>+10.00%</td></tr>'
    );
    expect(html).toContain(
      '<p><strong>Verdict:</strong> loco wins throughput by 10.0%. loco wins response time by 20.0%. loco performs better overall.</p>'
    );
  });

  it('renders the overall averages before the scenarios', () => {
    const html = renderHtml(twoScenarioSuite());

    expect(html.indexOf('<h2>Overall</h2>')).toBeLessThan(html.indexOf('<h2>Health Check</h2>'));
    expect(html).toContain('<p>Averaged across 2 scenario(s).</p>');
    expect(html).toContain(
      '<tr><td class="metric">Avg mean latency (ms)</td><td>20.00</td><td>24.00</td><td>-16.67%</td></tr>'
    );
    expect(html).toContain(
      '<p><strong>Verdict:</strong> No significant difference in throughput (0.0%). axum wins response time by 16.7%. axum performs better overall.</p>'
    );
  });

  it('adds an error table when failures occurred', () => {
    expect(renderHtml(withErrors())).toContain(
      '<tr><td>loco</td><td>status</td><td>5</td><td>0.50%</td><td>HTTP_500 ×3, HTTP_502 ×2</td></tr>'
    );
    expect(renderHtml(makeSuite())).not.toContain('<th>Category</th>');
  });

  it('escapes labels', () => {
    const suite = makeSuite({ label: '<b>axum</b>' });
    suite.baseline.label = '<b>axum</b>';
    const html = renderHtml(suite);

    expect(html).toContain('<th>&lt;b&gt;axum&lt;/b&gt;</th>');
    expect(html).not.toContain('<b>axum</b>');
  });
});

describe('report formats', () => {
  it('accepts markdown, md, json and html', () => {
    expect(parseReportFormat('markdown')).toBe('markdown');
    expect(parseReportFormat('MD')).toBe('markdown');
    expect(parseReportFormat('json')).toBe('json');
    expect(parseReportFormat('html')).toBe('html');
  });

  it('rejects anything else', () => {
    expect(() => parseReportFormat('pdf')).toThrow(ConfigError);
    expect(() => parseReportFormat('pdf')).toThrow('Unsupported report format "pdf" (expected markdown, json or html)');
  });

  it('dispatches to the matching renderer', () => {
    const suite = makeSuite();
    expect(renderReport(suite, 'json')).toBe(renderJson(suite));
    expect(renderReport(suite, 'html')).toBe(renderHtml(suite));
    expect(renderReport(suite, 'markdown')).toBe(renderMarkdown(suite));
  });
});
