import { summarizeSuite } from '../comparator.js';
import { ComparisonSuite } from '../types.js';

/** The saved suite plus its derived cross-scenario summary, which loading discards. */
export function renderJson(suite: ComparisonSuite): string {
  return JSON.stringify({ ...suite, overall: summarizeSuite(suite) }, null, 2);
}
