import * as Sentry from '@sentry/node';

// Error reporting stays off unless a DSN is configured
export function initSentry(): boolean {
  const dsn = process.env.SENTRY_DSN;
  if (!dsn) return false;

  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV,
    tracesSampleRate: 0.1, // Sample 10% of transactions
  });
  return true;
}
