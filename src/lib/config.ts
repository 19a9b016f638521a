import type { Logger } from './logger';
import { DEFAULT_INTERVAL_SECONDS, MAX_INTERVAL_SECONDS } from './constants';
import type { Configuration } from '../types';

export class ConfigError extends Error {
  constructor(
    public variable: string,
    message: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type IntervalParseResult =
  | { seconds: number; fallback: false }
  | { seconds: number; fallback: true; reason: string };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const SCHEME_PATTERN = /^https?:\/\//i;

export function parseIntervalSeconds(raw: string | undefined): IntervalParseResult {
  if (raw === undefined || raw === '') {
    return {
      seconds: DEFAULT_INTERVAL_SECONDS,
      fallback: true,
      reason: 'INTERVAL_SECONDS is not set',
    };
  }

  if (!INTEGER_PATTERN.test(raw)) {
    return {
      seconds: DEFAULT_INTERVAL_SECONDS,
      fallback: true,
      reason: `"${raw}" is not an integer`,
    };
  }

  const seconds = Number(raw);
  if (!Number.isSafeInteger(seconds) || seconds <= 0) {
    return {
      seconds: DEFAULT_INTERVAL_SECONDS,
      fallback: true,
      reason: `"${raw}" is not a positive integer`,
    };
  }

  if (seconds > MAX_INTERVAL_SECONDS) {
    return {
      seconds: DEFAULT_INTERVAL_SECONDS,
      fallback: true,
      reason: `"${raw}" exceeds the maximum of ${MAX_INTERVAL_SECONDS} seconds`,
    };
  }

  return { seconds, fallback: false };
}

// Bare hostnames get http://, anything already carrying a scheme is kept.
export function normalizeEndpoint(raw: string): string {
  const endpoint = raw.trim();
  return SCHEME_PATTERN.test(endpoint) ? endpoint : `http://${endpoint}`;
}

export function parseEndpoints(raw: string): string[] {
  return raw
    .split(',')
    .map(piece => piece.trim())
    .filter(piece => piece.length > 0)
    .map(normalizeEndpoint);
}

export function loadConfig(
  env: NodeJS.ProcessEnv,
  log: Logger
): Configuration {
  const interval = parseIntervalSeconds(env.INTERVAL_SECONDS);
  if (interval.fallback) {
    log.warn(
      { defaultSeconds: DEFAULT_INTERVAL_SECONDS, error: interval.reason },
      `Invalid or missing INTERVAL_SECONDS, defaulting to ${DEFAULT_INTERVAL_SECONDS} seconds`
    );
  }

  const rawEndpoints = env.ENDPOINTS;
  if (rawEndpoints === undefined) {
    throw new ConfigError(
      'ENDPOINTS',
      'No endpoints configured: set the ENDPOINTS env var'
    );
  }

  const endpoints = parseEndpoints(rawEndpoints);
  if (endpoints.length === 0) {
    throw new ConfigError(
      'ENDPOINTS',
      'ENDPOINTS is empty: set it to a comma-separated list of URLs'
    );
  }

  const config: Configuration = Object.freeze({
    intervalMs: interval.seconds * 1000,
    endpoints: Object.freeze(endpoints),
  });

  log.info({ intervalSeconds: interval.seconds }, 'Configured interval');
  log.info({ endpoints: config.endpoints }, 'Configured endpoints');

  return config;
}
