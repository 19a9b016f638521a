// Polling configuration
export const DEFAULT_INTERVAL_SECONDS = 30;
// Longest wait a Node timer can hold (2^31 - 1 ms), in whole seconds
export const MAX_INTERVAL_SECONDS = Math.floor((2 ** 31 - 1) / 1000);

export function parsePort(raw: string | undefined, fallback: number): number {
  const port = parseInt(raw || '');
  return Number.isInteger(port) && port >= 0 && port <= 65535 ? port : fallback;
}

// Health responder configuration
export const DEFAULT_HEALTH_PORT = 8080;
export const HEALTH_PORT = parsePort(process.env.HEALTH_PORT, DEFAULT_HEALTH_PORT);
export const HEALTH_RESPONSE_BODY = 'Healthy';

// Endpoint call configuration (0 = no timeout, wait for the target indefinitely)
export const REQUEST_TIMEOUT_MS = parseInt(
  process.env.REQUEST_TIMEOUT_MS || '0'
);
