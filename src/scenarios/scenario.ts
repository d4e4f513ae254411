import { HttpRequest } from '../http-client.js';
import { ScenarioKind } from '../types.js';

/** Per-worker state carried across passes; only its own worker touches it. */
export interface VirtualUserSession {
  readonly workerId: number;
  readonly runId: string;
  iteration: number;
  token?: string;
}

export interface ScenarioContext {
  webhookSecret: string;
  random: () => number;
}

export interface RequestStep {
  tag: string;
  build(session: VirtualUserSession): HttpRequest;
  /** Called with the parsed body of a successful response. */
  capture?(payload: unknown, session: VirtualUserSession): void;
}

export interface Scenario {
  kind: ScenarioKind;
  title: string;
  description: string;
  /** The requests one virtual user issues in one pass, in order. */
  nextPass(session: VirtualUserSession, ctx: ScenarioContext): RequestStep[];
}

export const JSON_HEADERS: Readonly<Record<string, string>> = { 'Content-Type': 'application/json' };

export interface Weighted<T> {
  weight: number;
  item: T;
}

export function pickWeighted<T>(entries: readonly Weighted<T>[], random: () => number): T {
  if (entries.length === 0) {
    throw new Error('Cannot pick from an empty weighted list');
  }

  const total = entries.reduce((sum, e) => sum + e.weight, 0);
  let remaining = random() * total;

  for (const entry of entries) {
    remaining -= entry.weight;
    if (remaining <= 0) {
      return entry.item;
    }
  }

  // Float drift can leave a sliver past the last entry.
  return entries[entries.length - 1].item;
}
