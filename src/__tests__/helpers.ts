import pino from 'pino';

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

// pino logger that keeps every line in memory instead of writing to stdout
export function createCaptureLogger() {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: 'debug', base: null },
    {
      write(chunk: string) {
        lines.push(JSON.parse(chunk));
      },
    }
  );
  return { logger, lines };
}

export function okResponse(body: string, init: ResponseInit = {}): Response {
  return new Response(body, { status: 200, statusText: 'OK', ...init });
}
