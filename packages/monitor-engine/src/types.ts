export type OutcomeStatus = 'success' | 'failure' | 'disabled';

export type RunPhase =
  | 'start'
  | 'disabled'
  | 'asserting'
  | 'outcome_built'
  | 'counting'
  | 'escalating'
  | 'hooking'
  | 'persisting'
  | 'done';

export interface LevelEntry {
  level: string;
  environment?: string;
}

export interface RunContext {
  monitor: string;
  environment?: string;
  isEnvironment(tag: string): boolean;
}

export type MonitorAssertion = (context: RunContext) => boolean | Promise<boolean>;

export type FailureHook = (failureCount: number, context: RunContext) => void | Promise<void>;

export interface MonitorDefinition {
  name: string;
  description?: string;
  assert: MonitorAssertion;
  notifyAfter?: number;
  thenNotifyEvery?: number;
  environments?: string[];
  levels?: LevelEntry[];
  ifFailing?: FailureHook;
}

export interface MonitorDefaults {
  notifyAfter: number;
  thenNotifyEvery: number;
  levels: LevelEntry[];
}

export interface MonitorSettings {
  name: string;
  description?: string;
  notifyAfter: number;
  thenNotifyEvery: number;
  environments: string[];
  levels: LevelEntry[];
}

export interface OutcomeRecord {
  monitor: string;
  status: OutcomeStatus;
  occurredAt: string;
  environment?: string;
  diagnostic?: string;
}

export interface OutcomeLike {
  readonly status: OutcomeStatus;
  readonly occurredAt: string;
  readonly diagnostic?: string;
}

/**
 * Durable key/value storage scoped by monitor environment. An absent
 * environment is its own scope, shared by environment-agnostic monitors.
 */
export interface MonitorStore {
  read(key: string, environment?: string): Promise<string | null>;
  write(key: string, value: string, environment?: string): Promise<void>;
  delete(key: string, environment?: string): Promise<void>;
  disable(name: string, environment?: string): Promise<void>;
  enable(name: string, environment?: string): Promise<void>;
  isDisabled(name: string, environment?: string): Promise<boolean>;
  writeOutcome(name: string, outcome: OutcomeLike, environment?: string): Promise<void>;
  lastOutcome(name: string, environment?: string): Promise<OutcomeRecord | null>;
  saveSettings(settings: MonitorSettings): Promise<void>;
}

export type DeliveryReceipt =
  | { status: 'delivered' }
  | { status: 'failed'; reason: string; retryable: boolean };

export interface Notifier {
  deliver(recipient: string, subject: string, body: string): Promise<DeliveryReceipt>;
}

export interface MonitorEngineOptions {
  recipients: Record<string, string>;
  defaults?: Partial<MonitorDefaults>;
}

export type FailureTrackerResult =
  | { kind: 'reset'; failureCount: 0 }
  | { kind: 'incremented'; failureCount: number }
  | { kind: 'unsaved'; failureCount: number }
  | { kind: 'untouched' };
