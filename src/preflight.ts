import { TargetUnreachableError } from './errors.js';
import { executeRequest } from './http-client.js';
import { TargetInfo } from './types.js';

export interface ProbeResult {
  target: TargetInfo;
  healthy: boolean;
  status?: number;
  latencyMs: number;
}

/**
 * Checks that a target answers on /health before load is generated.
 * Throws TargetUnreachableError when nothing answers at all; a non-2xx
 * answer is reported as unhealthy but still counts as reachable.
 */
export async function probeTarget(
  target: TargetInfo,
  timeoutMs: number,
  fetchImpl?: typeof fetch
): Promise<ProbeResult> {
  const result = await executeRequest(
    target.url,
    { method: 'GET', path: '/health', expect: 'any' },
    { timeoutMs, fetchImpl }
  );

  if (result.kind === 'cancelled') {
    throw new TargetUnreachableError(target.url, 'probe was cancelled');
  }
  if (result.category === 'connection' || result.category === 'timeout') {
    throw new TargetUnreachableError(target.url, result.errorCode ?? result.category);
  }

  return { target, healthy: result.success, status: result.status, latencyMs: result.latencyMs };
}
