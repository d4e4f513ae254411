import { FailureCategory } from './types.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** What the response body must look like for the exchange to count as a success. */
export type ResponseExpectation = 'any' | 'json' | 'graphql';

export interface HttpRequest {
  method: HttpMethod;
  path: string;
  headers?: Record<string, string>;
  body?: string;
  expect: ResponseExpectation;
}

export interface ExchangeOptions {
  timeoutMs: number;
  /** When given and aborted, the in-flight request is cancelled. */
  cancelSignal?: AbortSignal;
  fetchImpl?: typeof fetch;
}

export type ExchangeResult =
  | {
      kind: 'completed';
      success: boolean;
      latencyMs: number;
      status?: number;
      category?: FailureCategory;
      errorCode?: string;
      bytes: number;
      payload?: unknown;
    }
  | { kind: 'cancelled'; latencyMs: number };

export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${path.startsWith('/') ? path : `/${path}`}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Finds the system error code (ECONNREFUSED, ENOTFOUND, ...) undici wraps in `cause`. */
export function connectionErrorCode(error: unknown): string {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && isRecord(current); depth++) {
    if (typeof current.code === 'string' && /^E[A-Z]+$/.test(current.code)) {
      return current.code;
    }
    current = current.cause;
  }
  return 'CONNECTION_ERROR';
}

interface PayloadCheck {
  ok: boolean;
  errorCode?: string;
  payload?: unknown;
}

export function checkPayload(text: string, expect: ResponseExpectation): PayloadCheck {
  if (expect === 'any') {
    return { ok: true };
  }

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    return { ok: false, errorCode: 'INVALID_JSON' };
  }

  if (expect === 'json') {
    if (isRecord(payload) && payload.success === false) {
      return { ok: false, errorCode: 'API_ERROR', payload };
    }
    return { ok: true, payload };
  }

  if (!isRecord(payload) || !('data' in payload)) {
    return { ok: false, errorCode: 'MISSING_DATA', payload };
  }
  if (Array.isArray(payload.errors) && payload.errors.length > 0) {
    return { ok: false, errorCode: 'GRAPHQL_ERRORS', payload };
  }
  return { ok: true, payload };
}

/**
 * Performs one HTTP exchange against a target and classifies it.
 * Never throws: transport failures become failed results.
 */
export async function executeRequest(
  baseUrl: string,
  request: HttpRequest,
  options: ExchangeOptions
): Promise<ExchangeResult> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  let timedOut = false;
  let cancelled = false;

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);

  const onCancel = (): void => {
    cancelled = true;
    controller.abort();
  };
  if (options.cancelSignal?.aborted) {
    onCancel();
  } else {
    options.cancelSignal?.addEventListener('abort', onCancel, { once: true });
  }

  const start = performance.now();

  try {
    const response = await fetchImpl(joinUrl(baseUrl, request.path), {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: controller.signal,
    });
    const body = await response.arrayBuffer();
    const latencyMs = performance.now() - start;
    const bytes = body.byteLength;
    const text = new TextDecoder().decode(body);

    if (!response.ok) {
      return {
        kind: 'completed',
        success: false,
        latencyMs,
        status: response.status,
        category: 'status',
        errorCode: `HTTP_${response.status}`,
        bytes,
      };
    }

    const check = checkPayload(text, request.expect);
    if (!check.ok) {
      return {
        kind: 'completed',
        success: false,
        latencyMs,
        status: response.status,
        category: 'body',
        errorCode: check.errorCode,
        bytes,
        payload: check.payload,
      };
    }

    return { kind: 'completed', success: true, latencyMs, status: response.status, bytes, payload: check.payload };
  } catch (error) {
    const latencyMs = performance.now() - start;

    if (timedOut) {
      return { kind: 'completed', success: false, latencyMs, category: 'timeout', errorCode: 'TIMEOUT', bytes: 0 };
    }
    if (cancelled) {
      return { kind: 'cancelled', latencyMs };
    }
    return {
      kind: 'completed',
      success: false,
      latencyMs,
      category: 'connection',
      errorCode: connectionErrorCode(error),
      bytes: 0,
    };
  } finally {
    clearTimeout(timer);
    options.cancelSignal?.removeEventListener('abort', onCancel);
  }
}
