import { ConfigurationError, MonitorNotFoundError } from './errors.js';
import { Monitor } from './monitor.js';
import { MonitorStore } from './types.js';

/**
 * The set of monitors a process runs. Owned by the entry point and handed to
 * whatever needs to look monitors up by name.
 */
export class MonitorRegistry {
  private readonly byName = new Map<string, Monitor>();

  constructor(private readonly store: MonitorStore) {}

  get size(): number {
    return this.byName.size;
  }

  async register(monitor: Monitor): Promise<Monitor> {
    if (this.byName.has(monitor.name)) {
      throw new ConfigurationError(`Monitor already registered: ${monitor.name}`);
    }

    await this.store.saveSettings(monitor.toSettings());
    this.byName.set(monitor.name, monitor);
    return monitor;
  }

  get(name: string): Monitor | null {
    return this.byName.get(name) ?? null;
  }

  require(name: string): Monitor {
    const monitor = this.byName.get(name);
    if (monitor === undefined) {
      throw new MonitorNotFoundError(name);
    }

    return monitor;
  }

  list(): Monitor[] {
    return Array.from(this.byName.values());
  }
}
