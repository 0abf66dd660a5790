import { RunPhase } from './types.js';

export const RUN_PHASE_TRANSITIONS: Record<RunPhase, RunPhase[]> = {
  start: ['disabled', 'asserting'],
  disabled: ['persisting'],
  asserting: ['outcome_built'],
  outcome_built: ['counting'],
  counting: ['escalating', 'hooking', 'persisting'],
  escalating: ['hooking', 'persisting'],
  hooking: ['persisting'],
  persisting: ['done'],
  done: [],
};

export class InvalidRunPhaseTransitionError extends Error {
  constructor(from: RunPhase, to: RunPhase) {
    super(`Invalid run phase transition: ${from} -> ${to}`);
    this.name = 'InvalidRunPhaseTransitionError';
  }
}

export function canTransitionRunPhase(from: RunPhase, to: RunPhase): boolean {
  return RUN_PHASE_TRANSITIONS[from].includes(to);
}

export function assertValidRunPhaseTransition(from: RunPhase, to: RunPhase): void {
  if (!canTransitionRunPhase(from, to)) {
    throw new InvalidRunPhaseTransitionError(from, to);
  }
}

/** Tracks the phase of one run and records the path it took. */
export class RunPhaseTracker {
  private current: RunPhase = 'start';
  private readonly visited: RunPhase[] = ['start'];

  get phase(): RunPhase {
    return this.current;
  }

  get path(): readonly RunPhase[] {
    return this.visited;
  }

  advance(to: RunPhase): void {
    assertValidRunPhaseTransition(this.current, to);
    this.current = to;
    this.visited.push(to);
  }
}
