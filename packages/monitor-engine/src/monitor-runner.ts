import { Logger, describeError } from '@vigil/shared';

import { AssertionRuntimeError, ConfigurationError, MonitorBatchError, MonitorRunError } from './errors.js';
import { shouldNotify } from './escalation-policy.js';
import { FailureTracker } from './failure-tracker.js';
import { Monitor } from './monitor.js';
import { buildFailureNotification } from './notification.js';
import { Outcome } from './outcome.js';
import { RunPhaseTracker } from './run-state-machine.js';
import {
  FailureHook,
  FailureTrackerResult,
  MonitorStore,
  Notifier,
  RunContext,
} from './types.js';

export interface MonitorRunnerOptions {
  store: MonitorStore;
  notifier: Notifier;
  logger: Logger;
  /** Recipient address per criticality level. */
  recipients: Record<string, string>;
}

export interface MonitorRunResult {
  monitor: string;
  environment?: string;
  outcome: Outcome;
}

function runKey(monitor: string, environment?: string): string {
  return environment === undefined ? monitor : `${monitor}@${environment}`;
}

function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  if (Array.isArray(value)) {
    return 'array';
  }

  return typeof value;
}

/**
 * Executes monitors one run at a time: disabled check, assertion, failure
 * counting, escalation, failure hook and outcome recording.
 */
export class MonitorRunner {
  private readonly store: MonitorStore;
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  private readonly recipients: Map<string, string>;
  private readonly inFlight = new Map<string, Promise<void>>();

  constructor(options: MonitorRunnerOptions) {
    this.store = options.store;
    this.notifier = options.notifier;
    this.logger = options.logger;
    this.recipients = new Map(Object.entries(options.recipients));
  }

  /**
   * Runs `monitor` once for `environment`. Only a {@link ConfigurationError}
   * escapes; every other problem is logged and folded into the outcome.
   */
  async run(monitor: Monitor, environment?: string): Promise<Outcome> {
    return this.serialize(runKey(monitor.name, environment), () =>
      this.execute(monitor, environment),
    );
  }

  /**
   * Runs every monitor once per environment. A misconfigured run does not stop
   * the others; their errors are raised together as a {@link MonitorBatchError}
   * once the batch is over.
   */
  async runAll(monitors: Iterable<Monitor>): Promise<MonitorRunResult[]> {
    const results: MonitorRunResult[] = [];
    const errors: MonitorRunError[] = [];

    for (const monitor of monitors) {
      const environments = monitor.environments.length > 0 ? monitor.environments : [undefined];
      for (const environment of environments) {
        const scope = { monitor: monitor.name, ...(environment === undefined ? {} : { environment }) };
        try {
          results.push({ ...scope, outcome: await this.run(monitor, environment) });
        } catch (error) {
          if (!(error instanceof ConfigurationError)) {
            throw error;
          }
          errors.push({ ...scope, error });
        }
      }
    }

    if (errors.length > 0) {
      throw new MonitorBatchError(results, errors);
    }

    return results;
  }

  async disable(monitor: Monitor, environment?: string): Promise<void> {
    await this.store.disable(monitor.name, environment);
    this.logger.info('monitor disabled', {
      monitor: monitor.name,
      environment: environment ?? null,
    });
  }

  async enable(monitor: Monitor, environment?: string): Promise<void> {
    await this.store.enable(monitor.name, environment);
    this.logger.info('monitor enabled', {
      monitor: monitor.name,
      environment: environment ?? null,
    });
  }

  async isDisabled(monitor: Monitor, environment?: string): Promise<boolean> {
    return this.store.isDisabled(monitor.name, environment);
  }

  async failureCount(monitor: Monitor, environment?: string): Promise<number> {
    return this.trackerFor(monitor).failureCount(environment);
  }

  levelFor(monitor: Monitor, environment?: string): string {
    return monitor.level(environment);
  }

  recipientFor(monitor: Monitor, environment?: string): string | null {
    return this.recipients.get(monitor.level(environment)) ?? null;
  }

  private async serialize<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.inFlight.get(key) ?? Promise.resolve();
    const current = previous.then(task);
    const settled = current.then(
      () => undefined,
      () => undefined,
    );
    this.inFlight.set(key, settled);

    try {
      return await current;
    } finally {
      if (this.inFlight.get(key) === settled) {
        this.inFlight.delete(key);
      }
    }
  }

  private async execute(monitor: Monitor, environment?: string): Promise<Outcome> {
    const phases = new RunPhaseTracker();
    const context = monitor.contextFor(environment);
    const logger = this.logger.child({
      monitor: monitor.name,
      environment: environment ?? null,
    });

    let outcome: Outcome;
    if (await this.checkDisabled(monitor, environment, logger)) {
      phases.advance('disabled');
      outcome = Outcome.disabled();
      logger.info('monitor is disabled, assertion skipped');
    } else {
      phases.advance('asserting');
      outcome = await this.evaluate(monitor, context, logger);
      phases.advance('outcome_built');

      phases.advance('counting');
      const tracked = await this.track(monitor, outcome, environment, logger);
      if (tracked.kind === 'incremented') {
        phases.advance('escalating');
        await this.escalate(monitor, tracked.failureCount, outcome, environment, logger);
      }

      if (tracked.kind === 'incremented' || tracked.kind === 'unsaved') {
        if (monitor.ifFailing !== undefined) {
          phases.advance('hooking');
          await this.runFailureHook(monitor.ifFailing, tracked.failureCount, context, logger);
        }
      }
    }

    phases.advance('persisting');
    await this.persist(monitor, outcome, environment, logger);
    phases.advance('done');

    logger.debug('monitor run finished', { status: outcome.status, phases: [...phases.path] });
    return outcome;
  }

  private async checkDisabled(
    monitor: Monitor,
    environment: string | undefined,
    logger: Logger,
  ): Promise<boolean> {
    try {
      return await this.store.isDisabled(monitor.name, environment);
    } catch (error) {
      logger.error('could not read disabled flag, running monitor', {
        error: describeError(error),
      });
      return false;
    }
  }

  private async evaluate(monitor: Monitor, context: RunContext, logger: Logger): Promise<Outcome> {
    let result: unknown;
    try {
      result = await monitor.assertion(context);
    } catch (error) {
      const failure = new AssertionRuntimeError(monitor.name, error);
      logger.error(failure.message, { error: describeError(error) });
      return Outcome.failure(failure.diagnostic());
    }

    if (typeof result !== 'boolean') {
      throw new ConfigurationError(
        `Assertions must return a boolean value. Monitor ${monitor.name} returned ${String(result)} (${describeType(result)}).`,
      );
    }

    return Outcome.fromBoolean(result);
  }

  /**
   * An unsaved count skips escalation but still reaches the failure hook. A
   * counter that cannot be read yields no count, so both are skipped.
   */
  private async track(
    monitor: Monitor,
    outcome: Outcome,
    environment: string | undefined,
    logger: Logger,
  ): Promise<FailureTrackerResult> {
    try {
      return await this.trackerFor(monitor).recordOutcome(outcome, environment);
    } catch (error) {
      logger.error('could not update failure counter', {
        status: outcome.status,
        error: describeError(error),
      });
      return { kind: 'untouched' };
    }
  }

  private async escalate(
    monitor: Monitor,
    failureCount: number,
    outcome: Outcome,
    environment: string | undefined,
    logger: Logger,
  ): Promise<void> {
    if (!shouldNotify(failureCount, monitor.notifyAfter, monitor.thenNotifyEvery)) {
      logger.debug('escalation not due', { failureCount });
      return;
    }

    const level = monitor.level(environment);
    const recipient = this.recipients.get(level);
    if (recipient === undefined) {
      logger.info('not notifying because there is no recipient', {
        criticality: level,
        failureCount,
      });
      return;
    }

    const notification = buildFailureNotification(
      monitor.name,
      failureCount,
      environment,
      outcome.diagnostic,
    );

    try {
      const receipt = await this.notifier.deliver(recipient, notification.subject, notification.body);
      if (receipt.status === 'failed') {
        logger.warn('failure notification was not delivered', {
          criticality: level,
          failureCount,
          reason: receipt.reason,
        });
        return;
      }

      logger.info('failure notification delivered', {
        criticality: level,
        recipient,
        failureCount,
      });
    } catch (error) {
      logger.error('failure notification transport raised', {
        criticality: level,
        failureCount,
        error: describeError(error),
      });
    }
  }

  private async runFailureHook(
    hook: FailureHook,
    failureCount: number,
    context: RunContext,
    logger: Logger,
  ): Promise<void> {
    try {
      await hook(failureCount, context);
    } catch (error) {
      logger.error('failure hook raised', { failureCount, error: describeError(error) });
    }
  }

  private async persist(
    monitor: Monitor,
    outcome: Outcome,
    environment: string | undefined,
    logger: Logger,
  ): Promise<void> {
    try {
      await this.store.writeOutcome(monitor.name, outcome, environment);
    } catch (error) {
      logger.error('could not record outcome', {
        status: outcome.status,
        error: describeError(error),
      });
    }
  }

  private trackerFor(monitor: Monitor): FailureTracker {
    return new FailureTracker(this.store, monitor.name, this.logger);
  }
}
