import Fastify from 'fastify';
import type { MonitorRegistry, MonitorRunner, MonitorStore } from '@vigil/monitor-engine';
import type { Logger } from '@vigil/shared';

import type { MonitorServiceConfig } from './config.js';
import { ERROR_CODES, VigilError, toErrorResponse } from './errors.js';
import type { ReadinessCheck } from './readiness.js';
import { getCorrelationId, registerHealthRoutes, registerMonitorRoutes } from './routes.js';
import type { MonitorTickWorker } from './tick-worker.js';

export interface MonitorServiceAppDependencies {
  serviceName: string;
  config: Pick<MonitorServiceConfig, 'VIGIL_SERVICE_TOKEN'>;
  logger: Logger;
  readinessChecks: ReadinessCheck[];
  registry: MonitorRegistry;
  runner: MonitorRunner;
  store: MonitorStore;
  tickWorker: MonitorTickWorker;
}

export function buildMonitorServiceApp(dependencies: MonitorServiceAppDependencies) {
  const app = Fastify({ logger: false });

  app.decorateRequest('correlationId', '');

  app.addHook('onRequest', async (request, reply) => {
    request.correlationId = getCorrelationId(request);
    reply.header('x-correlation-id', request.correlationId);

    if (request.url.startsWith('/v1/')) {
      const authorizationHeader = request.headers.authorization;
      const expectedToken = `Bearer ${dependencies.config.VIGIL_SERVICE_TOKEN}`;
      if (authorizationHeader !== expectedToken) {
        const mapped = toErrorResponse(
          new VigilError(ERROR_CODES.UNAUTHORIZED, 401, 'Invalid or missing service bearer token'),
        );
        await reply.status(mapped.statusCode).send(mapped.body);
        return;
      }
    }
  });

  app.addHook('onResponse', async (request, reply) => {
    dependencies.logger.info('request complete', {
      correlationId: request.correlationId,
      method: request.method,
      path: request.url,
      statusCode: reply.statusCode,
    });
  });

  app.register(async (instance) => {
    await registerHealthRoutes(instance, dependencies.serviceName, dependencies.readinessChecks);
    await registerMonitorRoutes(instance, dependencies.logger, {
      registry: dependencies.registry,
      runner: dependencies.runner,
      store: dependencies.store,
    });
  });

  app.addHook('onClose', async () => {
    dependencies.tickWorker.stop();
  });

  app.setNotFoundHandler((_request, reply) => {
    const error = new VigilError(ERROR_CODES.ROUTE_NOT_FOUND, 404, 'Route not found');
    const mapped = toErrorResponse(error);
    return reply.status(mapped.statusCode).send(mapped.body);
  });

  app.setErrorHandler((error, request, reply) => {
    const mapped = toErrorResponse(error);

    dependencies.logger.error('request failed', {
      correlationId: request.correlationId,
      method: request.method,
      path: request.url,
      statusCode: mapped.statusCode,
      code: mapped.body.error.code,
      errorMessage: mapped.body.error.message,
    });

    return reply.status(mapped.statusCode).send(mapped.body);
  });

  return app;
}
