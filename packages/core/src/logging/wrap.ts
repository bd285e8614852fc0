import type { DiagnosticsLogger } from '../types/logger.js';

import { errorMessage } from '../errors.js';
import { defaultTimer, type NowFn } from '../utils/time.js';

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    value !== null &&
    (typeof value === 'object' || typeof value === 'function') &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Wrap `fn` so each call logs its arguments and result at debug level, and a
 * thrown or rejected error at error level before it is rethrown.
 *
 * Arguments, return value (including the original promise for async
 * functions) and failures pass through unchanged.
 */
export function withCallLogging<A extends unknown[], R>(
  name: string,
  fn: (...args: A) => R,
  logger: DiagnosticsLogger,
): (...args: A) => R {
  return (...args: A): R => {
    logger.debug(`Calling function: ${name}`, { args });

    let result: R;
    try {
      result = fn(...args);
    } catch (error) {
      logger.error(`Function ${name} raised an exception: ${errorMessage(error)}`);
      throw error;
    }

    if (isPromiseLike(result)) {
      void result.then(
        (value) => logger.debug(`Function ${name} returned`, { result: value }),
        (error: unknown) =>
          logger.error(`Function ${name} raised an exception: ${errorMessage(error)}`),
      );
      return result;
    }

    logger.debug(`Function ${name} returned`, { result });
    return result;
  };
}

/**
 * Wrap `fn` so each successful call logs its duration in seconds at info
 * level. Failures pass through without a timing line.
 */
export function withTiming<A extends unknown[], R>(
  name: string,
  fn: (...args: A) => R,
  logger: DiagnosticsLogger,
  timer: NowFn = defaultTimer,
): (...args: A) => R {
  const report = (startedAt: number): void => {
    const elapsed = (timer() - startedAt) / 1000;
    logger.info(`Function ${name} took ${elapsed.toFixed(2)} seconds`);
  };

  return (...args: A): R => {
    const startedAt = timer();
    const result = fn(...args);

    if (isPromiseLike(result)) {
      void result.then(
        () => report(startedAt),
        () => undefined,
      );
      return result;
    }

    report(startedAt);
    return result;
  };
}
