import type { TAction } from '@shared/schemas';

// Caller asked for an action the hand cannot take (split on a non-pair, ...)
export class ActionUnavailableError extends Error {
  constructor(readonly action: TAction, reason: string) {
    super(`Action '${action}' is not available: ${reason}`);
    this.name = 'ActionUnavailableError';
  }
}

// Composition tracker and shoe disagree; every EV computed afterwards is wrong
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

// Orchestrator called in the wrong phase or with an illegal amount
export class TableError extends Error {
  constructor(message: string, readonly status: 400 | 409 = 409) {
    super(message);
    this.name = 'TableError';
  }
}
