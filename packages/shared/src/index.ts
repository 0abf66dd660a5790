export function sharedPackageName(): string {
  return 'shared';
}

export * from './logging/logger.js';
