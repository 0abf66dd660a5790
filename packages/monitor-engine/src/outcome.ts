import { OutcomeLike, OutcomeRecord, OutcomeStatus } from './types.js';

function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Result of a single monitor run. Instances are frozen on construction.
 */
export class Outcome implements OutcomeLike {
  readonly status: OutcomeStatus;
  readonly occurredAt: string;
  readonly diagnostic?: string;

  private constructor(status: OutcomeStatus, diagnostic?: string) {
    this.status = status;
    this.occurredAt = nowIso();
    if (diagnostic !== undefined) {
      this.diagnostic = diagnostic;
    }
    Object.freeze(this);
  }

  static success(): Outcome {
    return new Outcome('success');
  }

  /** `diagnostic` carries the text of an error raised by the assertion. */
  static failure(diagnostic?: string): Outcome {
    return new Outcome('failure', diagnostic);
  }

  static disabled(): Outcome {
    return new Outcome('disabled');
  }

  static fromBoolean(passed: boolean): Outcome {
    return passed ? Outcome.success() : Outcome.failure();
  }

  isSuccess(): boolean {
    return this.status === 'success';
  }

  isFailure(): boolean {
    return this.status === 'failure';
  }

  isDisabled(): boolean {
    return this.status === 'disabled';
  }
}

export function toOutcomeRecord(
  name: string,
  outcome: OutcomeLike,
  environment?: string,
): OutcomeRecord {
  return {
    monitor: name,
    status: outcome.status,
    occurredAt: outcome.occurredAt,
    ...(environment === undefined ? {} : { environment }),
    ...(outcome.diagnostic === undefined ? {} : { diagnostic: outcome.diagnostic }),
  };
}
