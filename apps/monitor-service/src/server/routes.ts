import { randomUUID } from 'node:crypto';

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
  Monitor,
  MonitorRegistry,
  MonitorRunner,
  MonitorStore,
  OutcomeRecord,
  toOutcomeRecord,
} from '@vigil/monitor-engine';
import type { Logger } from '@vigil/shared';
import { z } from 'zod';

import { ERROR_CODES, VigilError } from './errors.js';
import type { ReadinessCheck } from './readiness.js';

declare module 'fastify' {
  interface FastifyRequest {
    correlationId: string;
  }
}

export function getCorrelationId(request: FastifyRequest): string {
  const headerValue = request.headers['x-correlation-id'];
  if (typeof headerValue === 'string' && headerValue.length > 0) {
    return headerValue;
  }

  return randomUUID();
}

export async function registerHealthRoutes(
  app: FastifyInstance,
  serviceName: string,
  readinessChecks: ReadinessCheck[],
): Promise<void> {
  app.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const memoryUsage = process.memoryUsage();
    return reply.status(200).send({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: serviceName,
      metrics: {
        uptime: process.uptime(),
        memoryUsage: {
          rss: memoryUsage.rss,
          heapUsed: memoryUsage.heapUsed,
          heapTotal: memoryUsage.heapTotal,
        },
      },
    });
  });

  app.get('/ready', async (_request: FastifyRequest, reply: FastifyReply) => {
    const checks = await Promise.all(
      readinessChecks.map(async (check) => ({ name: check.name, status: await check.run() })),
    );

    const services = Object.fromEntries(checks.map((check) => [check.name, check.status]));
    const allChecksUp = checks.every((check) => check.status === 'up');

    return reply.status(allChecksUp ? 200 : 503).send({
      status: allChecksUp ? 'ready' : 'not_ready',
      timestamp: new Date().toISOString(),
      services,
    });
  });
}

const monitorParamsSchema = z.object({
  name: z.string().min(1),
});

const environmentBodySchema = z
  .object({
    environment: z.string().trim().min(1).optional(),
  })
  .strict();

interface MonitorRouteDependencies {
  registry: MonitorRegistry;
  runner: MonitorRunner;
  store: MonitorStore;
}

interface EnvironmentState {
  environment: string | null;
  level: string;
  disabled: boolean;
  failureCount: number;
  lastOutcome: OutcomeRecord | null;
}

function requireEnvironment(monitor: Monitor, environment: string | undefined): string | undefined {
  if (environment !== undefined && !monitor.hasEnvironment(environment)) {
    throw new VigilError(
      ERROR_CODES.ENVIRONMENT_NOT_CONFIGURED,
      400,
      `Monitor ${monitor.name} is not configured for environment ${environment}`,
      { monitor: monitor.name, environment },
    );
  }

  return environment;
}

function environmentsOf(monitor: Monitor): Array<string | undefined> {
  return monitor.environments.length > 0 ? [...monitor.environments] : [undefined];
}

export async function registerMonitorRoutes(
  app: FastifyInstance,
  logger: Logger,
  dependencies: MonitorRouteDependencies,
): Promise<void> {
  const { registry, runner, store } = dependencies;

  const parseTarget = (request: FastifyRequest): { monitor: Monitor; environment?: string } => {
    const params = monitorParamsSchema.parse(request.params);
    const body = environmentBodySchema.parse(request.body ?? {});
    const monitor = registry.require(params.name);
    const environment = requireEnvironment(monitor, body.environment);

    return environment === undefined ? { monitor } : { monitor, environment };
  };

  const describeEnvironment = async (
    monitor: Monitor,
    environment: string | undefined,
  ): Promise<EnvironmentState> => ({
    environment: environment ?? null,
    level: runner.levelFor(monitor, environment),
    disabled: await runner.isDisabled(monitor, environment),
    failureCount: await runner.failureCount(monitor, environment),
    lastOutcome: await store.lastOutcome(monitor.name, environment),
  });

  app.get('/v1/monitors', async () => {
    const monitors = await Promise.all(
      registry.list().map(async (monitor) => ({
        ...monitor.toSettings(),
        states: await Promise.all(
          environmentsOf(monitor).map((environment) => describeEnvironment(monitor, environment)),
        ),
      })),
    );

    return { monitors };
  });

  app.post('/v1/monitors/run', async () => {
    const results = await runner.runAll(registry.list());
    return {
      results: results.map((result) =>
        toOutcomeRecord(result.monitor, result.outcome, result.environment),
      ),
    };
  });

  app.post('/v1/monitors/:name/run', async (request) => {
    const { monitor, environment } = parseTarget(request);
    const outcome = await runner.run(monitor, environment);

    logger.info('monitor run requested', {
      correlationId: request.correlationId,
      monitor: monitor.name,
      environment: environment ?? null,
      status: outcome.status,
    });

    return { outcome: toOutcomeRecord(monitor.name, outcome, environment) };
  });

  app.post('/v1/monitors/:name/disable', async (request) => {
    const { monitor, environment } = parseTarget(request);
    await runner.disable(monitor, environment);
    return describeEnvironment(monitor, environment);
  });

  app.post('/v1/monitors/:name/enable', async (request) => {
    const { monitor, environment } = parseTarget(request);
    await runner.enable(monitor, environment);
    return describeEnvironment(monitor, environment);
  });
}
