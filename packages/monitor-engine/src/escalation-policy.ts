import { ConfigurationError } from './errors.js';

/**
 * The first notification fires on the `notifyAfter`-th consecutive failure.
 * Later ones fire whenever `failureCount + notifyAfter` is a multiple of
 * `notifyEvery`.
 */
export function shouldNotify(
  failureCount: number,
  notifyAfter: number,
  notifyEvery: number,
): boolean {
  if (failureCount < notifyAfter) {
    return false;
  }

  return failureCount === notifyAfter || (failureCount + notifyAfter) % notifyEvery === 0;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export function assertEscalationThresholds(
  monitor: string,
  notifyAfter: number,
  notifyEvery: number,
): void {
  if (!isPositiveInteger(notifyAfter)) {
    throw new ConfigurationError(
      `Monitor ${monitor}: notifyAfter must be a positive integer (got ${notifyAfter})`,
    );
  }

  if (!isPositiveInteger(notifyEvery)) {
    throw new ConfigurationError(
      `Monitor ${monitor}: thenNotifyEvery must be a positive integer (got ${notifyEvery})`,
    );
  }
}
