export function integrationsPackageName(): string {
  return 'integrations';
}

export * from './file-monitor-store.js';
export * from './http.js';
export * from './logging-notifier.js';
export * from './online-assertion.js';
export * from './retrying-notifier.js';
export * from './webhook-notifier.js';
export * from './webhook-utils.js';
