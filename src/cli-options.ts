import { ConfigError } from './errors.js';
import { SCENARIO_KINDS, ScenarioKind } from './types.js';

function isScenarioKind(value: string): value is ScenarioKind {
  return SCENARIO_KINDS.some(kind => kind === value);
}

/** Parses a comma-separated scenario list; `all` expands to every scenario. */
export function parseScenarios(value: string): ScenarioKind[] {
  const names = value.split(',').map(s => s.trim().toLowerCase()).filter(s => s.length > 0);
  if (names.length === 0) {
    throw new ConfigError('At least one scenario is required');
  }
  if (names.includes('all')) {
    return [...SCENARIO_KINDS];
  }

  const kinds: ScenarioKind[] = [];
  for (const name of names) {
    if (!isScenarioKind(name)) {
      throw new ConfigError(`Unknown scenario "${name}" (expected ${SCENARIO_KINDS.join(', ')} or all)`);
    }
    if (!kinds.includes(name)) {
      kinds.push(name);
    }
  }
  return kinds;
}

export function parsePositiveInt(flag: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`${flag} must be a positive integer, got "${value}"`);
  }
  return n;
}

export function parseDurationSeconds(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new ConfigError(`--duration must be a positive number of seconds, got "${value}"`);
  }
  return n;
}

export function parseNonNegative(flag: string, value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) {
    throw new ConfigError(`${flag} must be zero or a positive number, got "${value}"`);
  }
  return n;
}
