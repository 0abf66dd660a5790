import { Logger, describeError } from '@vigil/shared';

import { Outcome } from './outcome.js';
import { FailureTrackerResult, MonitorStore } from './types.js';

const countPattern = /^\d+$/;

export function failureCountKey(monitor: string): string {
  return `${monitor}_failures`;
}

/**
 * Parses a persisted counter. Anything other than a non-negative decimal
 * integer reads as `null` so callers can tell corruption from absence.
 */
export function parseFailureCount(raw: string | null): number | null {
  if (raw === null) {
    return 0;
  }

  const trimmed = raw.trim();
  if (!countPattern.test(trimmed)) {
    return null;
  }

  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export class FailureTracker {
  constructor(
    private readonly store: MonitorStore,
    private readonly monitor: string,
    private readonly logger: Logger,
  ) {}

  async failureCount(environment?: string): Promise<number> {
    const raw = await this.store.read(failureCountKey(this.monitor), environment);
    const parsed = parseFailureCount(raw);
    if (parsed === null) {
      this.logger.warn('failure counter is malformed, treating as zero', {
        monitor: this.monitor,
        environment: environment ?? null,
        value: raw,
      });
      return 0;
    }

    return parsed;
  }

  async recordOutcome(outcome: Outcome, environment?: string): Promise<FailureTrackerResult> {
    if (outcome.isDisabled()) {
      return { kind: 'untouched' };
    }

    if (outcome.isSuccess()) {
      await this.store.write(failureCountKey(this.monitor), '0', environment);
      return { kind: 'reset', failureCount: 0 };
    }

    const failureCount = (await this.failureCount(environment)) + 1;
    try {
      await this.store.write(failureCountKey(this.monitor), String(failureCount), environment);
    } catch (error) {
      this.logger.error('could not update failure counter', {
        monitor: this.monitor,
        environment: environment ?? null,
        failureCount,
        error: describeError(error),
      });
      return { kind: 'unsaved', failureCount };
    }

    return { kind: 'incremented', failureCount };
  }
}
