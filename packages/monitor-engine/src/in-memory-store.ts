import { toOutcomeRecord } from './outcome.js';
import { MonitorSettings, MonitorStore, OutcomeLike, OutcomeRecord } from './types.js';

export const UNSCOPED_ENVIRONMENT = '*';

export function environmentScope(environment?: string): string {
  return environment ?? UNSCOPED_ENVIRONMENT;
}

export class InMemoryMonitorStore implements MonitorStore {
  private readonly values = new Map<string, Map<string, string>>();
  private readonly disabled = new Map<string, Set<string>>();
  private readonly outcomes = new Map<string, Map<string, OutcomeRecord>>();
  private readonly settings = new Map<string, MonitorSettings>();

  async read(key: string, environment?: string): Promise<string | null> {
    return this.values.get(environmentScope(environment))?.get(key) ?? null;
  }

  async write(key: string, value: string, environment?: string): Promise<void> {
    const scope = environmentScope(environment);
    const scoped = this.values.get(scope) ?? new Map<string, string>();
    scoped.set(key, value);
    this.values.set(scope, scoped);
  }

  async delete(key: string, environment?: string): Promise<void> {
    this.values.get(environmentScope(environment))?.delete(key);
  }

  async disable(name: string, environment?: string): Promise<void> {
    const scope = environmentScope(environment);
    const names = this.disabled.get(scope) ?? new Set<string>();
    names.add(name);
    this.disabled.set(scope, names);
  }

  async enable(name: string, environment?: string): Promise<void> {
    this.disabled.get(environmentScope(environment))?.delete(name);
  }

  async isDisabled(name: string, environment?: string): Promise<boolean> {
    return this.disabled.get(environmentScope(environment))?.has(name) ?? false;
  }

  async writeOutcome(name: string, outcome: OutcomeLike, environment?: string): Promise<void> {
    const scope = environmentScope(environment);
    const scoped = this.outcomes.get(scope) ?? new Map<string, OutcomeRecord>();
    scoped.set(name, toOutcomeRecord(name, outcome, environment));
    this.outcomes.set(scope, scoped);
  }

  async lastOutcome(name: string, environment?: string): Promise<OutcomeRecord | null> {
    return this.outcomes.get(environmentScope(environment))?.get(name) ?? null;
  }

  async saveSettings(settings: MonitorSettings): Promise<void> {
    this.settings.set(settings.name, settings);
  }

  getSettings(name: string): MonitorSettings | null {
    return this.settings.get(name) ?? null;
  }
}
