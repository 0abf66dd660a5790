import { mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import {
  ConfigurationError,
  MonitorSettings,
  MonitorStore,
  OutcomeLike,
  OutcomeRecord,
  environmentScope,
  levelEntry,
  toOutcomeRecord,
} from '@vigil/monitor-engine';
import { describeError } from '@vigil/shared';
import { z } from 'zod';

const levelEntrySchema = z.object({
  level: z.string().min(1),
  environment: z.string().min(1).optional(),
});

const outcomeRecordSchema = z.object({
  monitor: z.string().min(1),
  status: z.enum(['success', 'failure', 'disabled']),
  occurredAt: z.string().datetime(),
  environment: z.string().min(1).optional(),
  diagnostic: z.string().optional(),
});

const settingsSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  notifyAfter: z.number().int().positive(),
  thenNotifyEvery: z.number().int().positive(),
  environments: z.array(z.string().min(1)),
  levels: z.array(levelEntrySchema),
});

const scopeStateSchema = z.object({
  values: z.record(z.string()).default({}),
  disabled: z.array(z.string()).default([]),
  outcomes: z.record(outcomeRecordSchema).default({}),
});

const stateFileSchema = z.object({
  version: z.literal(1),
  scopes: z.record(scopeStateSchema).default({}),
  settings: z.record(settingsSchema).default({}),
});

type StateFile = z.infer<typeof stateFileSchema>;

interface ScopeState {
  values: Map<string, string>;
  disabled: Set<string>;
  outcomes: Map<string, OutcomeRecord>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function toOutcome(record: z.infer<typeof outcomeRecordSchema>): OutcomeRecord {
  return {
    monitor: record.monitor,
    status: record.status,
    occurredAt: record.occurredAt,
    ...(record.environment === undefined ? {} : { environment: record.environment }),
    ...(record.diagnostic === undefined ? {} : { diagnostic: record.diagnostic }),
  };
}

function toSettings(settings: z.infer<typeof settingsSchema>): MonitorSettings {
  return {
    name: settings.name,
    ...(settings.description === undefined ? {} : { description: settings.description }),
    notifyAfter: settings.notifyAfter,
    thenNotifyEvery: settings.thenNotifyEvery,
    environments: [...settings.environments],
    levels: settings.levels.map((entry) => levelEntry(entry.level, entry.environment)),
  };
}

/**
 * Monitor state kept in memory and written through to a single JSON file
 * after every change. A missing file starts empty; a file that fails the
 * state schema raises a {@link ConfigurationError} from the constructor.
 */
export class FileBackedMonitorStore implements MonitorStore {
  private readonly scopes = new Map<string, ScopeState>();
  private readonly settings = new Map<string, MonitorSettings>();

  constructor(private readonly filePath: string) {
    this.load();
  }

  async read(key: string, environment?: string): Promise<string | null> {
    return this.scopes.get(environmentScope(environment))?.values.get(key) ?? null;
  }

  async write(key: string, value: string, environment?: string): Promise<void> {
    this.scope(environment).values.set(key, value);
    this.flush();
  }

  async delete(key: string, environment?: string): Promise<void> {
    const scope = this.scopes.get(environmentScope(environment));
    if (scope !== undefined && scope.values.delete(key)) {
      this.flush();
    }
  }

  async disable(name: string, environment?: string): Promise<void> {
    this.scope(environment).disabled.add(name);
    this.flush();
  }

  async enable(name: string, environment?: string): Promise<void> {
    const scope = this.scopes.get(environmentScope(environment));
    if (scope !== undefined && scope.disabled.delete(name)) {
      this.flush();
    }
  }

  async isDisabled(name: string, environment?: string): Promise<boolean> {
    return this.scopes.get(environmentScope(environment))?.disabled.has(name) ?? false;
  }

  async writeOutcome(name: string, outcome: OutcomeLike, environment?: string): Promise<void> {
    this.scope(environment).outcomes.set(name, toOutcomeRecord(name, outcome, environment));
    this.flush();
  }

  async lastOutcome(name: string, environment?: string): Promise<OutcomeRecord | null> {
    return this.scopes.get(environmentScope(environment))?.outcomes.get(name) ?? null;
  }

  async saveSettings(settings: MonitorSettings): Promise<void> {
    this.settings.set(settings.name, settings);
    this.flush();
  }

  getSettings(name: string): MonitorSettings | null {
    return this.settings.get(name) ?? null;
  }

  private scope(environment?: string): ScopeState {
    const key = environmentScope(environment);
    const existing = this.scopes.get(key);
    if (existing !== undefined) {
      return existing;
    }

    const created: ScopeState = { values: new Map(), disabled: new Set(), outcomes: new Map() };
    this.scopes.set(key, created);
    return created;
  }

  private load(): void {
    let raw: string;
    try {
      raw = readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError(
        `Monitor state file ${this.filePath} is not valid JSON: ${describeError(error)}`,
      );
    }

    const parsed = stateFileSchema.safeParse(json);
    if (!parsed.success) {
      const issueText = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Monitor state file ${this.filePath} is invalid: ${issueText}`);
    }

    for (const [key, state] of Object.entries(parsed.data.scopes)) {
      this.scopes.set(key, {
        values: new Map(Object.entries(state.values)),
        disabled: new Set(state.disabled),
        outcomes: new Map(
          Object.entries(state.outcomes).map(([name, record]): [string, OutcomeRecord] => [
            name,
            toOutcome(record),
          ]),
        ),
      });
    }

    for (const [name, settings] of Object.entries(parsed.data.settings)) {
      this.settings.set(name, toSettings(settings));
    }
  }

  private flush(): void {
    mkdirSync(dirname(this.filePath), { recursive: true });

    const payload: StateFile = { version: 1, scopes: {}, settings: {} };
    for (const [key, state] of this.scopes.entries()) {
      payload.scopes[key] = {
        values: Object.fromEntries(state.values),
        disabled: Array.from(state.disabled),
        outcomes: Object.fromEntries(state.outcomes),
      };
    }
    for (const [name, settings] of this.settings.entries()) {
      payload.settings[name] = settings;
    }

    const temporaryFile = `${this.filePath}.tmp`;
    writeFileSync(temporaryFile, JSON.stringify(payload, null, 2), 'utf8');
    renameSync(temporaryFile, this.filePath);
  }
}
