import { afterEach, describe, expect, it, vi } from 'vitest';
import { callEndpoint } from '../lib/checker';
import { createCaptureLogger, okResponse } from './helpers';

afterEach(() => {
  vi.useRealTimers();
});

describe('callEndpoint', () => {
  it('reports status, body size and duration on success', async () => {
    const { logger, lines } = createCaptureLogger();
    const fetch = vi.fn<typeof globalThis.fetch>().mockResolvedValue(
      okResponse('hello world')
    );

    const outcome = await callEndpoint('http://a.com', { logger, fetch });

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch.mock.calls[0][0]).toBe('http://a.com');
    expect(fetch.mock.calls[0][1]).toMatchObject({ method: 'GET' });
    expect(outcome).toMatchObject({
      ok: true,
      url: 'http://a.com',
      status: '200 OK',
      statusCode: 200,
      bodyBytes: 11,
    });
    expect(outcome.durationMs).toBeGreaterThanOrEqual(0);

    expect(lines.at(-1)).toMatchObject({
      level: 30,
      url: 'http://a.com',
      status: '200 OK',
      bodyBytes: 11,
    });
  });

  it('treats non-2xx responses as completed calls', async () => {
    const { logger } = createCaptureLogger();
    const fetch = vi.fn<typeof globalThis.fetch>().mockResolvedValue(
      new Response('missing', { status: 404, statusText: 'Not Found' })
    );

    const outcome = await callEndpoint('http://a.com/gone', { logger, fetch });

    expect(outcome).toMatchObject({
      ok: true,
      status: '404 Not Found',
      statusCode: 404,
      bodyBytes: 7,
    });
  });

  it('logs the attempt at info level', async () => {
    const { logger, lines } = createCaptureLogger();
    const fetch = vi.fn<typeof globalThis.fetch>().mockResolvedValue(
      okResponse('')
    );

    await callEndpoint('http://a.com', { logger, fetch });

    expect(lines[0]).toMatchObject({
      level: 30,
      msg: 'Calling endpoint',
      url: 'http://a.com',
    });
  });

  it('resolves with a request failure when the network call fails', async () => {
    const { logger, lines } = createCaptureLogger();
    const fetch = vi
      .fn<typeof globalThis.fetch>()
      .mockRejectedValue(new TypeError('fetch failed'));

    const outcome = await callEndpoint('http://down.test', { logger, fetch });

    expect(outcome).toMatchObject({
      ok: false,
      url: 'http://down.test',
      stage: 'request',
      errorMessage: 'fetch failed',
    });
    expect(lines.at(-1)).toMatchObject({
      level: 40,
      msg: 'Error calling endpoint',
      error: 'fetch failed',
      isTimeout: false,
    });
  });

  it('resolves with a read failure when the body cannot be read', async () => {
    const { logger, lines } = createCaptureLogger();
    const response = okResponse('partial');
    vi.spyOn(response, 'arrayBuffer').mockRejectedValue(
      new Error('connection reset')
    );
    const fetch = vi.fn<typeof globalThis.fetch>().mockResolvedValue(response);

    const outcome = await callEndpoint('http://flaky.test', { logger, fetch });

    expect(outcome).toMatchObject({
      ok: false,
      url: 'http://flaky.test',
      stage: 'read',
      errorMessage: 'connection reset',
    });
    expect(lines.at(-1)).toMatchObject({
      level: 40,
      msg: 'Error reading response',
      error: 'connection reset',
    });
  });

  it('aborts the request once the timeout elapses', async () => {
    vi.useFakeTimers();
    const { logger, lines } = createCaptureLogger();
    const fetch = vi.fn<typeof globalThis.fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () =>
            reject(new Error('This operation was aborted'))
          );
        })
    );

    const pending = callEndpoint('http://slow.test', {
      logger,
      fetch,
      timeoutMs: 5_000,
    });
    await vi.advanceTimersByTimeAsync(5_000);
    const outcome = await pending;

    expect(outcome).toMatchObject({
      ok: false,
      stage: 'request',
      errorMessage: 'This operation was aborted',
    });
    expect(lines.at(-1)).toMatchObject({ isTimeout: true });
  });
});
