import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  FileBackedMonitorStore,
  LoggingNotifier,
  RetryingNotifier,
  WebhookNotifier,
} from '@vigil/integrations';
import { MonitorRegistry, MonitorRunner, type Notifier } from '@vigil/monitor-engine';
import { type Logger, createLogger, describeError } from '@vigil/shared';

import { buildMonitorServiceApp } from './server/app.js';
import { type MonitorServiceConfig, loadMonitorServiceConfig } from './server/config.js';
import { loadMonitorCatalog } from './server/monitor-catalog.js';
import { createDefaultReadinessChecks } from './server/readiness.js';
import { MonitorTickWorker } from './server/tick-worker.js';

export function monitorServiceName(): string {
  return 'monitor-service';
}

export function createNotifier(config: MonitorServiceConfig, logger: Logger): Notifier {
  if (config.VIGIL_NOTIFY_WEBHOOK_URL !== undefined && config.VIGIL_NOTIFY_WEBHOOK_SECRET !== undefined) {
    return new RetryingNotifier(
      new WebhookNotifier({
        url: config.VIGIL_NOTIFY_WEBHOOK_URL,
        secret: config.VIGIL_NOTIFY_WEBHOOK_SECRET,
      }),
    );
  }

  return new LoggingNotifier(logger.child({ component: 'notifier' }));
}

export async function createMonitorService(source: NodeJS.ProcessEnv = process.env) {
  const config = loadMonitorServiceConfig(source);
  const logger = createLogger({ service: monitorServiceName(), level: config.LOG_LEVEL });

  const catalog = loadMonitorCatalog(config.VIGIL_MONITORS_FILE, {
    logger: logger.child({ component: 'assertion' }),
  });
  const store = new FileBackedMonitorStore(config.VIGIL_STATE_FILE);
  const registry = new MonitorRegistry(store);
  for (const monitor of catalog.monitors) {
    await registry.register(monitor);
  }

  const runner = new MonitorRunner({
    store,
    notifier: createNotifier(config, logger),
    logger,
    recipients: catalog.engine.recipients,
  });
  const tickWorker = new MonitorTickWorker({ runner, registry, logger });

  const app = buildMonitorServiceApp({
    serviceName: monitorServiceName(),
    config,
    logger,
    readinessChecks: createDefaultReadinessChecks(registry, store),
    registry,
    runner,
    store,
    tickWorker,
  });

  return { app, config, logger, registry, runner, tickWorker };
}

export async function startMonitorService(): Promise<void> {
  const { app, config, logger, registry, tickWorker } = await createMonitorService();

  await app.listen({ host: config.HOST, port: config.PORT });
  tickWorker.start(config.VIGIL_TICK_INTERVAL_MS);
  logger.info('monitor-service started', {
    host: config.HOST,
    port: config.PORT,
    env: config.NODE_ENV,
    monitors: registry.size,
    tickIntervalMs: config.VIGIL_TICK_INTERVAL_MS,
  });

  const shutdown = (signal: string) => {
    logger.info('monitor-service stopping', { signal });
    void app.close().then(
      () => logger.info('monitor-service stopped'),
      (error: unknown) => {
        logger.error('monitor-service failed to stop cleanly', { error: describeError(error) });
        process.exitCode = 1;
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

const executedDirectly =
  process.argv[1] !== undefined && fileURLToPath(import.meta.url) === resolve(process.argv[1]);

if (executedDirectly) {
  startMonitorService().catch((error: unknown) => {
    createLogger({ service: monitorServiceName(), level: 'fatal' }).fatal(
      'monitor-service failed to start',
      { error: describeError(error) },
    );
    process.exitCode = 1;
  });
}
