import type { RunContext } from '@vigil/monitor-engine';
import { createLogger } from '@vigil/shared';
import { describe, expect, it } from 'vitest';

import { type FetchLike, LoggingNotifier, assertOnline } from '../../index.js';

const context: RunContext = { monitor: 'homepage', isEnvironment: () => false };

function captureLogger() {
  const entries: Array<Record<string, unknown>> = [];
  const logger = createLogger({
    service: 'integrations-test',
    level: 'trace',
    sink: (_level, line) => {
      entries.push(JSON.parse(line) as Record<string, unknown>);
    },
  });

  return { logger, entries };
}

function respondWith(status: number, methods: string[] = []): FetchLike {
  return async (_url, init) => {
    methods.push(init?.method ?? 'unset');
    return new Response(null, { status });
  };
}

describe('assertOnline', () => {
  it('passes on 200 using GET by default', async () => {
    const methods: string[] = [];
    const assertion = assertOnline('https://example.test/', { fetch: respondWith(200, methods) });

    expect(await assertion(context)).toBe(true);
    expect(methods).toEqual(['GET']);
  });

  it('uses the configured method', async () => {
    const methods: string[] = [];
    const assertion = assertOnline('https://example.test/', {
      method: 'HEAD',
      fetch: respondWith(200, methods),
    });

    await assertion(context);

    expect(methods).toEqual(['HEAD']);
  });

  it('fails and logs any other status', async () => {
    const { logger, entries } = captureLogger();
    const assertion = assertOnline('https://example.test/', { fetch: respondWith(500), logger });

    expect(await assertion(context)).toBe(false);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'error',
      message: 'https://example.test/ returned status code 500',
      monitor: 'homepage',
      method: 'GET',
    });
  });

  it('accepts 502 only when ignore502 is set', async () => {
    expect(await assertOnline('https://example.test/', { fetch: respondWith(502) })(context)).toBe(false);
    expect(
      await assertOnline('https://example.test/', { fetch: respondWith(502), ignore502: true })(context),
    ).toBe(true);
  });

  it('treats a transport error as offline', async () => {
    const { logger, entries } = captureLogger();
    const assertion = assertOnline('https://example.test/', {
      fetch: async () => Promise.reject(new TypeError('fetch failed')),
      logger,
    });

    expect(await assertion(context)).toBe(false);
    expect(entries[0]).toMatchObject({
      level: 'error',
      message: 'online check request failed',
      url: 'https://example.test/',
      error: 'fetch failed',
    });
  });
});

describe('LoggingNotifier', () => {
  it('logs the notification and reports it delivered', async () => {
    const { logger, entries } = captureLogger();

    const receipt = await new LoggingNotifier(logger).deliver(
      'oncall@example.com',
      'Monitor failure: homepage',
      'Monitor failure: homepage. Failure count: 2',
    );

    expect(receipt).toEqual({ status: 'delivered' });
    expect(entries[0]).toMatchObject({
      level: 'warn',
      message: 'Monitor failure: homepage',
      recipient: 'oncall@example.com',
      body: 'Monitor failure: homepage. Failure count: 2',
    });
  });
});
