import { z } from 'zod';

import { ConfigurationError } from './errors.js';
import { assertEscalationThresholds } from './escalation-policy.js';
import { UNSCOPED_ENVIRONMENT } from './in-memory-store.js';
import { DEFAULT_LEVELS, levelEntry, registerLevel, registerLevels, resolveLevel } from './level-resolver.js';
import {
  FailureHook,
  LevelEntry,
  MonitorAssertion,
  MonitorDefaults,
  MonitorDefinition,
  MonitorSettings,
  RunContext,
} from './types.js';

export const DEFAULT_MONITOR_DEFAULTS: MonitorDefaults = {
  notifyAfter: 1,
  thenNotifyEvery: 1,
  levels: [...DEFAULT_LEVELS],
};

const environmentTagSchema = z
  .string()
  .trim()
  .min(1)
  .refine((tag) => tag !== UNSCOPED_ENVIRONMENT, {
    message: `${UNSCOPED_ENVIRONMENT} is reserved for runs without an environment`,
  });

const levelEntrySchema = z.object({
  level: z.string().trim().min(1),
  environment: environmentTagSchema.optional(),
});

const monitorDefinitionSchema = z.object({
  name: z
    .string({ required_error: 'name is required for all monitors' })
    .trim()
    .min(1, 'name is required for all monitors'),
  description: z.string().trim().optional(),
  assert: z.custom<MonitorAssertion>((value) => typeof value === 'function', {
    message: 'assert is required for all monitors',
  }),
  notifyAfter: z.number().optional(),
  thenNotifyEvery: z.number().optional(),
  environments: z.array(environmentTagSchema).optional(),
  levels: z.array(levelEntrySchema).optional(),
  ifFailing: z
    .custom<FailureHook>((value) => typeof value === 'function', {
      message: 'ifFailing must be a function',
    })
    .optional(),
});

export function resolveMonitorDefaults(defaults: Partial<MonitorDefaults> = {}): MonitorDefaults {
  return {
    notifyAfter: defaults.notifyAfter ?? DEFAULT_MONITOR_DEFAULTS.notifyAfter,
    thenNotifyEvery: defaults.thenNotifyEvery ?? DEFAULT_MONITOR_DEFAULTS.thenNotifyEvery,
    levels: registerLevels([], defaults.levels ?? DEFAULT_MONITOR_DEFAULTS.levels),
  };
}

export type ParsedMonitorDefinition = z.infer<typeof monitorDefinitionSchema>;

/** Validates an untyped definition, e.g. one assembled from a catalog file. */
export function parseMonitorDefinition(input: unknown): ParsedMonitorDefinition {
  const result = monitorDefinitionSchema.safeParse(input);
  if (!result.success) {
    const issueText = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ConfigurationError(`Invalid monitor definition: ${issueText}`);
  }

  return result.data;
}

export class Monitor {
  readonly name: string;
  readonly description?: string;
  readonly notifyAfter: number;
  readonly thenNotifyEvery: number;
  readonly environments: readonly string[];
  readonly assertion: MonitorAssertion;
  readonly ifFailing?: FailureHook;
  private levelEntries: LevelEntry[];

  constructor(definition: MonitorDefinition, defaults: Partial<MonitorDefaults> = {}) {
    const parsed = parseMonitorDefinition(definition);
    const resolvedDefaults = resolveMonitorDefaults(defaults);

    this.name = parsed.name;
    if (parsed.description !== undefined && parsed.description.length > 0) {
      this.description = parsed.description;
    }
    this.notifyAfter = parsed.notifyAfter ?? resolvedDefaults.notifyAfter;
    this.thenNotifyEvery = parsed.thenNotifyEvery ?? resolvedDefaults.thenNotifyEvery;
    assertEscalationThresholds(this.name, this.notifyAfter, this.thenNotifyEvery);

    this.environments = Array.from(new Set(parsed.environments ?? []));
    this.assertion = parsed.assert;
    if (parsed.ifFailing !== undefined) {
      this.ifFailing = parsed.ifFailing;
    }
    this.levelEntries = registerLevels(
      resolvedDefaults.levels,
      (parsed.levels ?? []).map((entry) => levelEntry(entry.level, entry.environment)),
    );
  }

  get levels(): readonly LevelEntry[] {
    return this.levelEntries.map((entry) => ({ ...entry }));
  }

  /** Registers `level`, for one environment when `options.in` is given. */
  setLevel(level: string, options: { in?: string } = {}): void {
    this.levelEntries = registerLevel(this.levelEntries, level, options.in);
  }

  level(environment?: string): string {
    return resolveLevel(this.levelEntries, environment);
  }

  hasEnvironment(tag: string): boolean {
    return this.environments.includes(tag);
  }

  contextFor(environment?: string): RunContext {
    return {
      monitor: this.name,
      ...(environment === undefined ? {} : { environment }),
      isEnvironment: (tag) => environment !== undefined && tag === environment,
    };
  }

  toSettings(): MonitorSettings {
    return {
      name: this.name,
      ...(this.description === undefined ? {} : { description: this.description }),
      notifyAfter: this.notifyAfter,
      thenNotifyEvery: this.thenNotifyEvery,
      environments: [...this.environments],
      levels: this.levels.map((entry) => ({ ...entry })),
    };
  }
}

export function defineMonitor(
  definition: MonitorDefinition,
  defaults: Partial<MonitorDefaults> = {},
): Monitor {
  return new Monitor(definition, defaults);
}
