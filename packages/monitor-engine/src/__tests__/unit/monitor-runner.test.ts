import { createLogger } from '@vigil/shared';
import { describe, expect, it, vi } from 'vitest';

import {
  ConfigurationError,
  type DeliveryReceipt,
  MonitorBatchError,
  InMemoryMonitorStore,
  type MonitorDefinition,
  MonitorRunner,
  type Notifier,
  defineMonitor,
} from '../../index.js';

interface Delivery {
  recipient: string;
  subject: string;
  body: string;
}

class RecordingNotifier implements Notifier {
  readonly deliveries: Delivery[] = [];
  receipt: DeliveryReceipt = { status: 'delivered' };

  async deliver(recipient: string, subject: string, body: string): Promise<DeliveryReceipt> {
    this.deliveries.push({ recipient, subject, body });
    return this.receipt;
  }
}

const RECIPIENTS = { default: 'oncall@example.com', critical: 'pager@example.com' };

function createHarness(recipients: Record<string, string> = RECIPIENTS) {
  const store = new InMemoryMonitorStore();
  const notifier = new RecordingNotifier();
  const entries: Array<Record<string, unknown>> = [];
  const logger = createLogger({
    service: 'monitor-engine-test',
    level: 'trace',
    sink: (_level, line) => {
      entries.push(JSON.parse(line) as Record<string, unknown>);
    },
  });
  const runner = new MonitorRunner({
    store,
    notifier,
    logger,
    recipients,
  });

  return { store, notifier, runner, entries };
}

function failing(overrides: Partial<MonitorDefinition> = {}) {
  return defineMonitor({ name: 'homepage', assert: () => false, ...overrides });
}

function logged(entries: Array<Record<string, unknown>>, message: string) {
  return entries.filter((entry) => entry['message'] === message);
}

describe('MonitorRunner.run', () => {
  it('resets the counter and records a passing run', async () => {
    const { store, notifier, runner } = createHarness();
    await store.write('homepage_failures', '4');

    const outcome = await runner.run(defineMonitor({ name: 'homepage', assert: () => true }));

    expect(outcome.status).toBe('success');
    expect(await store.read('homepage_failures')).toBe('0');
    expect(notifier.deliveries).toEqual([]);
    expect((await store.lastOutcome('homepage'))?.status).toBe('success');
  });

  it('skips everything but recording when disabled', async () => {
    const { store, notifier, runner, entries } = createHarness();
    const assertion = vi.fn(() => false);
    const hook = vi.fn();
    const monitor = failing({ assert: assertion, ifFailing: hook, environments: ['prod'] });
    await store.write('homepage_failures', '2', 'prod');
    await runner.disable(monitor, 'prod');

    const outcome = await runner.run(monitor, 'prod');

    expect(outcome.status).toBe('disabled');
    expect(assertion).not.toHaveBeenCalled();
    expect(hook).not.toHaveBeenCalled();
    expect(notifier.deliveries).toEqual([]);
    expect(await store.read('homepage_failures', 'prod')).toBe('2');
    expect(await store.lastOutcome('homepage', 'prod')).toEqual({
      monitor: 'homepage',
      status: 'disabled',
      occurredAt: outcome.occurredAt,
      environment: 'prod',
    });
    expect(logged(entries, 'monitor run finished')[0]?.['phases']).toEqual([
      'start',
      'disabled',
      'persisting',
      'done',
    ]);
  });

  it('only honours the disabled flag of the active environment', async () => {
    const { runner } = createHarness();
    const assertion = vi.fn(() => true);
    const monitor = defineMonitor({ name: 'homepage', assert: assertion, environments: ['prod', 'staging'] });
    await runner.disable(monitor, 'prod');

    expect((await runner.run(monitor, 'staging')).status).toBe('success');
    expect(assertion).toHaveBeenCalledTimes(1);

    await runner.enable(monitor, 'prod');
    expect(await runner.isDisabled(monitor, 'prod')).toBe(false);
    expect((await runner.run(monitor, 'prod')).status).toBe('success');
  });

  it('escalates at notifyAfter and then on the repeat cadence', async () => {
    const { notifier, runner } = createHarness();
    const monitor = failing({ notifyAfter: 3, thenNotifyEvery: 2 });

    for (let run = 0; run < 7; run += 1) {
      await runner.run(monitor);
    }

    expect(notifier.deliveries.map((delivery) => delivery.body)).toEqual([
      'Monitor failure: homepage. Failure count: 3',
      'Monitor failure: homepage. Failure count: 5',
      'Monitor failure: homepage. Failure count: 7',
    ]);
    expect(notifier.deliveries[0]).toMatchObject({
      recipient: 'oncall@example.com',
      subject: 'Monitor failure: homepage',
    });
    expect(await runner.failureCount(monitor)).toBe(7);
  });

  it('tags the subject with the environment and uses its level', async () => {
    const { notifier, runner } = createHarness();
    const monitor = failing({
      environments: ['prod', 'staging'],
      levels: [{ level: 'critical', environment: 'prod' }],
    });

    await runner.run(monitor, 'prod');
    await runner.run(monitor, 'staging');

    expect(notifier.deliveries).toEqual([
      {
        recipient: 'pager@example.com',
        subject: '[PROD] Monitor failure: homepage',
        body: 'Monitor failure: homepage. Failure count: 1',
      },
      {
        recipient: 'oncall@example.com',
        subject: '[STAGING] Monitor failure: homepage',
        body: 'Monitor failure: homepage. Failure count: 1',
      },
    ]);
    expect(runner.levelFor(monitor, 'prod')).toBe('critical');
    expect(runner.recipientFor(monitor, 'staging')).toBe('oncall@example.com');
  });

  it('turns a thrown assertion into a failure with diagnostic text', async () => {
    const { store, notifier, runner, entries } = createHarness();
    const monitor = failing({
      assert: () => {
        throw new Error('connection refused');
      },
    });

    const outcome = await runner.run(monitor);

    expect(outcome.status).toBe('failure');
    expect(outcome.diagnostic).toContain('connection refused');
    expect(outcome.diagnostic?.startsWith('Uncaught error running homepage: connection refused')).toBe(
      true,
    );
    expect(await store.read('homepage_failures')).toBe('1');
    expect(notifier.deliveries[0]?.body.startsWith(
      'Monitor failure: homepage. Failure count: 1\nUncaught error running homepage: connection refused',
    )).toBe(true);
    expect(logged(entries, 'Uncaught error running homepage: connection refused')[0]?.['level']).toBe(
      'error',
    );
  });

  it('treats a rejected async assertion like a thrown one', async () => {
    const { runner } = createHarness();
    const monitor = failing({ assert: async () => Promise.reject(new Error('timed out')) });

    const outcome = await runner.run(monitor);

    expect(outcome.status).toBe('failure');
    expect(outcome.diagnostic).toContain('timed out');
  });

  it('rejects a non-boolean assertion result as a configuration error', async () => {
    const { store, notifier, runner } = createHarness();
    const notBoolean = (): boolean => JSON.parse('"yes"');
    const monitor = failing({ assert: notBoolean });

    await expect(runner.run(monitor)).rejects.toThrow(ConfigurationError);
    await expect(runner.run(monitor)).rejects.toThrowError(
      'Assertions must return a boolean value. Monitor homepage returned yes (string).',
    );
    expect(await store.read('homepage_failures')).toBeNull();
    expect(await store.lastOutcome('homepage')).toBeNull();
    expect(notifier.deliveries).toEqual([]);
  });

  it('starts counting again after a success', async () => {
    const { runner } = createHarness();
    let healthy = false;
    const monitor = defineMonitor({ name: 'homepage', assert: () => healthy });

    await runner.run(monitor);
    await runner.run(monitor);
    healthy = true;
    await runner.run(monitor);
    expect(await runner.failureCount(monitor)).toBe(0);

    healthy = false;
    await runner.run(monitor);
    expect(await runner.failureCount(monitor)).toBe(1);
  });

  it('calls the failure hook on every failing run', async () => {
    const { notifier, runner, entries } = createHarness();
    const seen: Array<{ count: number; prod: boolean }> = [];
    const monitor = failing({
      notifyAfter: 3,
      environments: ['prod'],
      ifFailing: (count, context) => {
        seen.push({ count, prod: context.isEnvironment('prod') });
      },
    });

    await runner.run(monitor, 'prod');
    await runner.run(monitor, 'prod');

    expect(seen).toEqual([
      { count: 1, prod: true },
      { count: 2, prod: true },
    ]);
    expect(notifier.deliveries).toEqual([]);
    expect(logged(entries, 'monitor run finished')[0]?.['phases']).toEqual([
      'start',
      'asserting',
      'outcome_built',
      'counting',
      'escalating',
      'hooking',
      'persisting',
      'done',
    ]);
  });

  it('still calls the failure hook when the counter cannot be saved', async () => {
    const { store, notifier, runner, entries } = createHarness();
    vi.spyOn(store, 'write').mockRejectedValue(new Error('disk full'));
    const counts: number[] = [];
    const monitor = failing({
      ifFailing: (count) => {
        counts.push(count);
      },
    });

    const outcome = await runner.run(monitor);

    expect(outcome.status).toBe('failure');
    expect(counts).toEqual([1]);
    expect(notifier.deliveries).toEqual([]);
    expect(logged(entries, 'could not update failure counter')[0]).toMatchObject({
      level: 'error',
      failureCount: 1,
      error: 'disk full',
    });
    expect(logged(entries, 'monitor run finished')[0]?.['phases']).toEqual([
      'start',
      'asserting',
      'outcome_built',
      'counting',
      'hooking',
      'persisting',
      'done',
    ]);
    expect(await store.lastOutcome('homepage')).toMatchObject({ status: 'failure' });
  });

  it('keeps the outcome when the failure hook throws', async () => {
    const { runner, entries } = createHarness();
    const monitor = failing({
      ifFailing: () => {
        throw new Error('hook broke');
      },
    });

    const outcome = await runner.run(monitor);

    expect(outcome.status).toBe('failure');
    expect(logged(entries, 'failure hook raised')[0]).toMatchObject({
      level: 'error',
      failureCount: 1,
      error: 'hook broke',
    });
  });

  it('logs a failed delivery without changing the outcome', async () => {
    const { notifier, runner, entries } = createHarness();
    notifier.receipt = { status: 'failed', reason: 'mailbox full', retryable: false };

    const outcome = await runner.run(failing());

    expect(outcome.status).toBe('failure');
    expect(logged(entries, 'failure notification was not delivered')[0]).toMatchObject({
      level: 'warn',
      reason: 'mailbox full',
    });
  });

  it('logs a throwing transport without changing the outcome', async () => {
    const entries: Array<Record<string, unknown>> = [];
    const runner = new MonitorRunner({
      store: new InMemoryMonitorStore(),
      notifier: {
        deliver: async () => Promise.reject(new Error('smtp down')),
      },
      logger: createLogger({
        service: 'monitor-engine-test',
        level: 'error',
        sink: (_level, line) => {
          entries.push(JSON.parse(line) as Record<string, unknown>);
        },
      }),
      recipients: { default: 'oncall@example.com' },
    });

    const outcome = await runner.run(failing());

    expect(outcome.status).toBe('failure');
    expect(logged(entries, 'failure notification transport raised')[0]).toMatchObject({
      criticality: 'default',
      error: 'smtp down',
    });
  });

  it('does not notify when no recipient is configured for the level', async () => {
    const { notifier, runner, entries } = createHarness({});

    await runner.run(failing());

    expect(notifier.deliveries).toEqual([]);
    expect(logged(entries, 'not notifying because there is no recipient')[0]).toMatchObject({
      level: 'info',
      criticality: 'default',
      failureCount: 1,
    });
    expect(runner.recipientFor(failing())).toBeNull();
  });

  it('recovers from a malformed counter', async () => {
    const { store, runner } = createHarness();
    await store.write('homepage_failures', 'oops');

    await runner.run(failing());

    expect(await store.read('homepage_failures')).toBe('1');
  });

  it('serialises concurrent runs of the same monitor and environment', async () => {
    const { runner } = createHarness();
    const monitor = failing({ notifyAfter: 5 });

    await Promise.all([runner.run(monitor), runner.run(monitor), runner.run(monitor)]);

    expect(await runner.failureCount(monitor)).toBe(3);
  });
});

describe('MonitorRunner.runAll', () => {
  it('runs each monitor once per environment, or once when it has none', async () => {
    const { runner } = createHarness();
    const api = defineMonitor({ name: 'api', assert: () => true, environments: ['prod', 'staging'] });
    const homepage = failing();

    const results = await runner.runAll([api, homepage]);

    expect(
      results.map((result) => ({
        monitor: result.monitor,
        environment: result.environment,
        status: result.outcome.status,
      })),
    ).toEqual([
      { monitor: 'api', environment: 'prod', status: 'success' },
      { monitor: 'api', environment: 'staging', status: 'success' },
      { monitor: 'homepage', environment: undefined, status: 'failure' },
    ]);
    expect(results[2]).not.toHaveProperty('environment');
  });

  it('runs the remaining monitors when one is misconfigured', async () => {
    const { runner, notifier } = createHarness();
    const notBoolean = (): boolean => JSON.parse('1');
    const odd = defineMonitor({ name: 'odd', assert: notBoolean, environments: ['prod', 'staging'] });
    const homepageAssertion = vi.fn(() => false);
    const homepage = failing({ assert: homepageAssertion });

    const error = await runner.runAll([odd, homepage]).then(
      () => null,
      (rejection: unknown) => rejection,
    );

    expect(error).toBeInstanceOf(MonitorBatchError);
    expect(error).toBeInstanceOf(ConfigurationError);
    if (!(error instanceof MonitorBatchError)) {
      return;
    }
    expect(error.message).toBe(
      'Assertions must return a boolean value. Monitor odd returned 1 (number).; ' +
        'Assertions must return a boolean value. Monitor odd returned 1 (number).',
    );
    expect(error.errors.map((entry) => [entry.monitor, entry.environment])).toEqual([
      ['odd', 'prod'],
      ['odd', 'staging'],
    ]);
    expect(error.results.map((result) => [result.monitor, result.outcome.status])).toEqual([
      ['homepage', 'failure'],
    ]);
    expect(homepageAssertion).toHaveBeenCalledTimes(1);
    expect(await runner.failureCount(homepage)).toBe(1);
    expect(notifier.deliveries).toHaveLength(1);
  });
});
