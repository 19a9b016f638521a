import { ConfigError, loadConfig } from './lib/config';
import type { Component, Logger } from './lib/logger';
import type { PollerOptions } from './scheduler';
import type { Configuration } from './types';

export interface MainDeps {
  createLogger: (component: Component) => Logger;
  startHealthServer: (port: number, log: Logger) => unknown;
  runPollingLoop: (config: Configuration, options: PollerOptions) => Promise<void>;
  fetch?: typeof fetch;
  healthPort: number;
  requestTimeoutMs: number;
}

/**
 * Loads configuration, then starts the health responder and the polling loop.
 *
 * Returns the running loop, or `null` with `process.exitCode` set to 1 when
 * the configuration is unusable; in that case nothing is started.
 */
export function main(env: NodeJS.ProcessEnv, deps: MainDeps): Promise<void> | null {
  const configLogger = deps.createLogger('config');

  let config: Configuration;
  try {
    config = loadConfig(env, configLogger);
  } catch (error) {
    if (error instanceof ConfigError) {
      configLogger.fatal({ variable: error.variable }, error.message);
      process.exitCode = 1;
      return null;
    }
    throw error;
  }

  deps.startHealthServer(deps.healthPort, deps.createLogger('health'));

  return deps.runPollingLoop(config, {
    logger: deps.createLogger('scheduler'),
    fetch: deps.fetch,
    timeoutMs: deps.requestTimeoutMs,
  });
}
