import type { MonitorRunResult } from './monitor-runner.js';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface MonitorRunError {
  monitor: string;
  environment?: string;
  error: ConfigurationError;
}

/**
 * Raised by `runAll` after every run has been attempted when one or more runs
 * hit a configuration error. `results` holds the runs that completed.
 */
export class MonitorBatchError extends ConfigurationError {
  constructor(
    public readonly results: MonitorRunResult[],
    public readonly errors: MonitorRunError[],
  ) {
    super(errors.map((entry) => entry.error.message).join('; '));
    this.name = 'MonitorBatchError';
  }
}

export class AssertionRuntimeError extends Error {
  constructor(
    public readonly monitor: string,
    public readonly thrown: unknown,
  ) {
    super(`Uncaught error running ${monitor}: ${describeCause(thrown)}`);
    this.name = 'AssertionRuntimeError';
  }

  /** Text appended to failure notifications, including the stack when one exists. */
  diagnostic(): string {
    if (this.thrown instanceof Error && this.thrown.stack !== undefined) {
      return `${this.message}\n${this.thrown.stack}`;
    }

    return this.message;
  }
}

export class MonitorNotFoundError extends Error {
  constructor(public readonly monitor: string) {
    super(`Monitor not found: ${monitor}`);
    this.name = 'MonitorNotFoundError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }

  return String(cause);
}
