import { logger, loggerPrefix } from './application-logger';
import { DEFAULT_POLL_RETRIES, POLL_JITTER_PCT } from './constants';

export interface IPoller {
  start: () => void;
  stop: () => void;
}

export default function initPoller(
  intervalMs: number,
  callback: () => Promise<void>,
  options?: {
    maxPollRetries?: number;
  },
): IPoller {
  let stopped = false;
  let failedAttempts = 0;
  let nextPollMs = intervalMs;
  let previousPollFailed = false;
  let nextTimer: NodeJS.Timeout | undefined = undefined;

  // the first refresh is the caller's init(); start() only schedules the next one
  const start = () => {
    stopped = false;
    nextPollMs = intervalMs;
    nextTimer = setTimeout(poll, intervalMs);
  };

  const stop = () => {
    if (!stopped) {
      stopped = true;
      if (nextTimer) {
        clearTimeout(nextTimer);
      }
      logger.info(`${loggerPrefix} Configuration polling stopped`);
    }
  };

  async function poll() {
    if (stopped) {
      return;
    }

    try {
      await callback();
      // If no error, reset any retrying
      failedAttempts = 0;
      nextPollMs = intervalMs;
      if (previousPollFailed) {
        previousPollFailed = false;
        logger.info(`${loggerPrefix} Configuration refresh successful; resuming normal polling`);
      }
    } catch (error) {
      previousPollFailed = true;
      const maxTries = 1 + (options?.maxPollRetries ?? DEFAULT_POLL_RETRIES);
      if (++failedAttempts < maxTries) {
        const failureWaitMultiplier = Math.pow(2, failedAttempts);
        nextPollMs = failureWaitMultiplier * intervalMs + randomJitterMs(intervalMs);
        logger.warn(
          { err: error },
          `${loggerPrefix} Configuration refresh failed; retrying in ${nextPollMs} ms (${
            maxTries - failedAttempts
          } attempts remaining)`,
        );
      } else {
        logger.error(
          `${loggerPrefix} Reached maximum of ${failedAttempts} failed refresh attempts. Stopping polling`,
        );
        stop();
      }
    }

    if (!stopped) {
      nextTimer = setTimeout(poll, nextPollMs);
    }
  }

  return {
    start,
    stop,
  };
}

/**
 * Compute a random jitter as a percentage of the polling interval.
 * Will be (5%,10%) of the interval assuming POLL_JITTER_PCT = 0.1
 */
function randomJitterMs(intervalMs: number) {
  const halfPossibleJitter = (intervalMs * POLL_JITTER_PCT) / 2;
  const randomOtherHalfJitter = Math.max(
    Math.floor((Math.random() * intervalMs * POLL_JITTER_PCT) / 2),
    1,
  );
  return halfPossibleJitter + randomOtherHalfJitter;
}
