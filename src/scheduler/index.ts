import { setTimeout as delay } from 'node:timers/promises';
import { callEndpoint } from '../lib/checker';
import type { Logger } from '../lib/logger';
import type { Configuration, RoundSummary } from '../types';

export interface RoundOptions {
  logger: Logger;
  fetch?: typeof fetch;
  timeoutMs?: number;
}

export interface PollerOptions extends RoundOptions {
  sleep?: (ms: number) => Promise<unknown>;
  random?: () => number;
  // Stop after this many rounds instead of polling forever
  maxRounds?: number;
}

// Uniform integer in [0, intervalMs)
export function randomDelayMs(
  intervalMs: number,
  random: () => number = Math.random
): number {
  const delayMs = Math.floor(random() * intervalMs);
  return Math.min(Math.max(delayMs, 0), intervalMs - 1);
}

export async function runRound(
  endpoints: readonly string[],
  round: number,
  options: RoundOptions
): Promise<RoundSummary> {
  const log = options.logger.child({ round });
  const roundStart = Date.now();

  log.info({ endpoints: endpoints.length }, '--- Starting new round of API calls ---');

  // One call per endpoint; callEndpoint never rejects, so this joins only once
  // every call has settled.
  const outcomes = await Promise.all(
    endpoints.map(url =>
      callEndpoint(url, {
        logger: log,
        fetch: options.fetch,
        timeoutMs: options.timeoutMs,
      })
    )
  );

  const succeeded = outcomes.filter(outcome => outcome.ok).length;
  const failed = outcomes.length - succeeded;
  const durationMs = Date.now() - roundStart;

  log.info(
    { succeeded, failed, durationMs },
    '--- All API calls for this round completed ---'
  );

  return { round, outcomes, succeeded, failed, durationMs };
}

export async function runPollingLoop(
  config: Configuration,
  options: PollerOptions
): Promise<void> {
  const { sleep = delay, random = Math.random, maxRounds } = options;

  options.logger.info(
    { intervalMs: config.intervalMs, endpoints: config.endpoints.length },
    'Starting polling loop'
  );

  for (let round = 1; maxRounds === undefined || round <= maxRounds; round++) {
    await runRound(config.endpoints, round, options);

    if (round === maxRounds) break;

    const waitMs = randomDelayMs(config.intervalMs, random);
    options.logger.info(
      { round, waitMs },
      `--- Waiting for a randomized interval of ${waitMs}ms ---`
    );
    await sleep(waitMs);
  }
}
