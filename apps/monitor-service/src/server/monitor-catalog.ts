import { readFileSync } from 'node:fs';

import { FetchLike, HTTP_METHODS, assertOnline } from '@vigil/integrations';
import {
  ConfigurationError,
  Monitor,
  MonitorDefaults,
  MonitorDefinition,
  MonitorEngineOptions,
  defineMonitor,
  levelEntry,
} from '@vigil/monitor-engine';
import { Logger, describeError } from '@vigil/shared';
import { z } from 'zod';

const levelEntrySchema = z.object({
  level: z.string().trim().min(1),
  environment: z.string().trim().min(1).optional(),
});

const thresholdSchema = z.number().int().positive();

const httpMonitorSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().trim().optional(),
  url: z.string().url(),
  /** Per-environment overrides of `url`. */
  urls: z.record(z.string().url()).default({}),
  method: z.enum(HTTP_METHODS).default('GET'),
  ignore502: z.boolean().default(false),
  notifyAfter: thresholdSchema.optional(),
  thenNotifyEvery: thresholdSchema.optional(),
  environments: z.array(z.string().trim().min(1)).default([]),
  levels: z.array(levelEntrySchema).default([]),
});

const monitorCatalogSchema = z.object({
  defaults: z
    .object({
      notifyAfter: thresholdSchema.optional(),
      thenNotifyEvery: thresholdSchema.optional(),
      levels: z.array(levelEntrySchema).optional(),
    })
    .default({}),
  recipients: z.record(z.string().trim().min(1)).default({}),
  monitors: z.array(httpMonitorSchema).default([]),
});

type HttpMonitorEntry = z.infer<typeof httpMonitorSchema>;
type CatalogDefaults = z.infer<typeof monitorCatalogSchema>['defaults'];

export interface MonitorCatalog {
  engine: MonitorEngineOptions;
  monitors: Monitor[];
}

export interface MonitorCatalogOptions {
  logger: Logger;
  fetch?: FetchLike;
}

function toDefaults(defaults: CatalogDefaults): Partial<MonitorDefaults> {
  return {
    ...(defaults.notifyAfter === undefined ? {} : { notifyAfter: defaults.notifyAfter }),
    ...(defaults.thenNotifyEvery === undefined ? {} : { thenNotifyEvery: defaults.thenNotifyEvery }),
    ...(defaults.levels === undefined
      ? {}
      : { levels: defaults.levels.map((entry) => levelEntry(entry.level, entry.environment)) }),
  };
}

function toDefinition(entry: HttpMonitorEntry, options: MonitorCatalogOptions): MonitorDefinition {
  const probeOptions = {
    method: entry.method,
    ignore502: entry.ignore502,
    logger: options.logger,
    ...(options.fetch === undefined ? {} : { fetch: options.fetch }),
  };

  return {
    name: entry.name,
    ...(entry.description === undefined ? {} : { description: entry.description }),
    assert: (context) => {
      const url =
        context.environment === undefined ? entry.url : entry.urls[context.environment] ?? entry.url;
      return assertOnline(url, probeOptions)(context);
    },
    ...(entry.notifyAfter === undefined ? {} : { notifyAfter: entry.notifyAfter }),
    ...(entry.thenNotifyEvery === undefined ? {} : { thenNotifyEvery: entry.thenNotifyEvery }),
    environments: entry.environments,
    levels: entry.levels.map((level) => levelEntry(level.level, level.environment)),
  };
}

/** Validates a catalog document and builds its monitors against the catalog defaults. */
export function parseMonitorCatalog(input: unknown, options: MonitorCatalogOptions): MonitorCatalog {
  const result = monitorCatalogSchema.safeParse(input);
  if (!result.success) {
    const issueText = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid monitor catalog: ${issueText}`);
  }

  const defaults = toDefaults(result.data.defaults);
  const engine: MonitorEngineOptions = { recipients: result.data.recipients, defaults };

  return {
    engine,
    monitors: result.data.monitors.map((entry) => defineMonitor(toDefinition(entry, options), defaults)),
  };
}

export function loadMonitorCatalog(filePath: string, options: MonitorCatalogOptions): MonitorCatalog {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Could not read monitor catalog ${filePath}: ${describeError(error)}`);
  }

  return parseMonitorCatalog(document, options);
}
