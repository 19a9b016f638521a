import pino from 'pino';

const isDev = process.env.NODE_ENV !== 'production';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: isDev
    ? { target: 'pino-pretty', options: { colorize: true } }
    : undefined,
  base: { service: 'endpoint-poller' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;

export type Component = 'config' | 'scheduler' | 'health';

// Child logger factory, one per long-lived component
export const createComponentLogger = (
  component: Component,
  extra?: Record<string, unknown>
): Logger => logger.child({ component, ...extra });
