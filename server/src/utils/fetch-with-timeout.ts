/**
 * Fetch with Timeout Utility
 *
 * Wraps native fetch with an AbortController so upstream calls cannot hang.
 * A request-scoped signal cancels the call as well.
 */

import { logger } from '../lib/logger/structured-logger.js';

export type FetchErrorKind = 'TIMEOUT' | 'ABORT' | 'HTTP_ERROR' | 'NETWORK_ERROR';

export interface FetchWithTimeoutConfig {
  timeoutMs: number;
  provider: string;
  requestId?: string;
  /** Request-scoped abort signal; when aborted, the fetch is cancelled */
  signal?: AbortSignal;
}

export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly errorKind: FetchErrorKind,
    public readonly host: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'UpstreamError';
  }
}

export async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  config: FetchWithTimeoutConfig
): Promise<Response> {
  const controller = new AbortController();
  const host = new URL(url).host;
  const startTime = Date.now();
  let timedOut = false;

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.timeoutMs);

  const onAbort = () => controller.abort();
  if (config.signal?.aborted) {
    controller.abort();
  } else {
    config.signal?.addEventListener('abort', onAbort, { once: true });
  }

  try {
    const response = await fetch(url, { ...options, signal: controller.signal });
    logger.debug({
      event: 'upstream_response',
      provider: config.provider,
      host,
      status: response.status,
      durationMs: Date.now() - startTime,
      requestId: config.requestId
    }, '[Fetch] Upstream response');
    return response;
  } catch (err) {
    const errorKind: FetchErrorKind = timedOut ? 'TIMEOUT' : controller.signal.aborted ? 'ABORT' : 'NETWORK_ERROR';
    const durationMs = Date.now() - startTime;

    logger.warn({
      event: 'upstream_failed',
      provider: config.provider,
      host,
      errorKind,
      durationMs,
      requestId: config.requestId,
      error: err instanceof Error ? err.message : String(err)
    }, '[Fetch] Upstream call failed');

    throw new UpstreamError(
      `${config.provider} ${errorKind.toLowerCase().replace('_', ' ')} after ${durationMs}ms`,
      config.provider,
      errorKind,
      host
    );
  } finally {
    clearTimeout(timeoutId);
    config.signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Throw UpstreamError(HTTP_ERROR) for non-2xx responses
 */
export async function ensureOk(response: Response, provider: string): Promise<Response> {
  if (response.ok) return response;
  const body = await response.text().catch(() => '');
  throw new UpstreamError(
    `${provider} responded ${response.status}${body ? `: ${body.slice(0, 200)}` : ''}`,
    provider,
    'HTTP_ERROR',
    new URL(response.url || 'http://unknown').host,
    response.status
  );
}
