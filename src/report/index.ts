import { ConfigError } from '../errors.js';
import { ComparisonSuite, ReportFormat } from '../types.js';
import { renderHtml } from './html.js';
import { renderJson } from './json.js';
import { renderMarkdown } from './markdown.js';

export function parseReportFormat(value: string): ReportFormat {
  switch (value.toLowerCase()) {
    case 'markdown':
    case 'md':
      return 'markdown';
    case 'json':
      return 'json';
    case 'html':
      return 'html';
    default:
      throw new ConfigError(`Unsupported report format "${value}" (expected markdown, json or html)`);
  }
}

export function renderReport(suite: ComparisonSuite, format: ReportFormat): string {
  switch (format) {
    case 'json':
      return renderJson(suite);
    case 'html':
      return renderHtml(suite);
    default:
      return renderMarkdown(suite);
  }
}

export { renderHtml, renderJson, renderMarkdown };
