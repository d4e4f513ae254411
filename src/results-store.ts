import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { ReportIOError } from './errors.js';
import { renderJson } from './report/json.js';
import { ComparisonSuite } from './types.js';
import { parseComparisonSuite } from './validation.js';

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content.endsWith('\n') ? content : `${content}\n`, 'utf8');
  } catch (error) {
    throw new ReportIOError(`Failed to write ${path}: ${reason(error)}`, path);
  }
}

export async function saveSuite(path: string, suite: ComparisonSuite): Promise<void> {
  await writeTextFile(path, renderJson(suite));
}

export async function loadSuite(path: string): Promise<ComparisonSuite> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ReportIOError(`Failed to read results file ${path}: ${reason(error)}`, path);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ReportIOError(`Results file ${path} is not valid JSON: ${reason(error)}`, path);
  }

  const parsed = parseComparisonSuite(data);
  if (!parsed.ok) {
    throw new ReportIOError(`Results file ${path} is not a benchmark comparison: ${parsed.problem}`, path);
  }
  return parsed.suite;
}
