export function monitorEnginePackageName(): string {
  return 'monitor-engine';
}

export * from './types.js';
export * from './errors.js';
export * from './outcome.js';
export * from './level-resolver.js';
export * from './escalation-policy.js';
export * from './failure-tracker.js';
export * from './run-state-machine.js';
export * from './notification.js';
export * from './monitor.js';
export * from './in-memory-store.js';
export * from './monitor-runner.js';
export * from './registry.js';
