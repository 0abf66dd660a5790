import type { MonitorRegistry, MonitorStore } from '@vigil/monitor-engine';

export interface ReadinessCheck {
  name: string;
  run(): Promise<'up' | 'down'>;
}

const READINESS_PROBE_KEY = 'readiness_probe';

export function createDefaultReadinessChecks(
  registry: MonitorRegistry,
  store: MonitorStore,
): ReadinessCheck[] {
  return [
    {
      name: 'monitors',
      async run() {
        return registry.size > 0 ? 'up' : 'down';
      },
    },
    {
      name: 'state',
      async run() {
        try {
          await store.read(READINESS_PROBE_KEY);
          return 'up';
        } catch {
          return 'down';
        }
      },
    },
  ];
}
