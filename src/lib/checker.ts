import type { Logger } from './logger';
import type { CallOutcome } from '../types';

export interface CallEndpointOptions {
  logger: Logger;
  fetch?: typeof fetch;
  // 0 or undefined leaves the request unbounded
  timeoutMs?: number;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function formatStatus(response: Response): string {
  return `${response.status} ${response.statusText}`.trim();
}

/**
 * Issues a single GET against `url` and reports how it went.
 *
 * Resolves exactly once on every path (network error, body read error or
 * success) and never rejects, so a round can always join on it.
 */
export async function callEndpoint(
  url: string,
  options: CallEndpointOptions
): Promise<CallOutcome> {
  const { logger: log, fetch: fetchFn = fetch, timeoutMs = 0 } = options;
  const requestLogger = log.child({ url });

  requestLogger.info('Calling endpoint');

  const start = Date.now();
  const controller = new AbortController();
  const timeoutId =
    timeoutMs > 0 ? setTimeout(() => controller.abort(), timeoutMs) : null;

  try {
    let response: Response;
    try {
      response = await fetchFn(url, {
        method: 'GET',
        redirect: 'follow',
        signal: controller.signal,
      });
    } catch (error) {
      const durationMs = Date.now() - start;
      const errorMessage = describeError(error);
      requestLogger.warn(
        { error: errorMessage, durationMs, isTimeout: controller.signal.aborted },
        'Error calling endpoint'
      );
      return { ok: false, url, stage: 'request', errorMessage, durationMs };
    }

    const durationMs = Date.now() - start;

    let body: ArrayBuffer;
    try {
      body = await response.arrayBuffer();
    } catch (error) {
      const errorMessage = describeError(error);
      requestLogger.warn(
        { error: errorMessage, durationMs, isTimeout: controller.signal.aborted },
        'Error reading response'
      );
      return { ok: false, url, stage: 'read', errorMessage, durationMs };
    }

    const status = formatStatus(response);
    requestLogger.info(
      { status, bodyBytes: body.byteLength, durationMs },
      `Response from ${url} - Status: ${status}, Body size: ${body.byteLength} Bytes, Duration: ${durationMs}ms`
    );

    return {
      ok: true,
      url,
      status,
      statusCode: response.status,
      bodyBytes: body.byteLength,
      durationMs,
    };
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}
