import * as Sentry from '@sentry/node';
import { HEALTH_PORT, REQUEST_TIMEOUT_MS } from './lib/constants';
import { createComponentLogger, logger } from './lib/logger';
import { initSentry } from './lib/sentry';
import { startHealthServer } from './health';
import { main } from './main';
import { runPollingLoop } from './scheduler';

const sentryEnabled = initSentry();
logger.info({ sentryEnabled }, 'Starting endpoint poller');

// A null result means bad configuration: exitCode is already 1 and the
// process ends once the logs flush.
const loop = main(process.env, {
  createLogger: createComponentLogger,
  startHealthServer,
  runPollingLoop,
  healthPort: HEALTH_PORT,
  requestTimeoutMs: REQUEST_TIMEOUT_MS,
});

loop?.catch(async error => {
  logger.fatal(
    { error: error instanceof Error ? error.message : 'Unknown' },
    'Polling loop failed'
  );
  Sentry.captureException(error);
  await Sentry.flush(2000);
  process.exit(1);
});
