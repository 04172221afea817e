import type { WorkflowState } from "./state.js";

/** Raised when a dispatch or iteration budget runs out; carries the last state. */
export class BudgetExceededError extends Error {
  readonly state: WorkflowState;
  readonly limit: number;

  constructor(message: string, state: WorkflowState, limit: number) {
    super(message);
    this.name = "BudgetExceededError";
    this.state = state;
    this.limit = limit;
  }
}

export class DeadlineExceededError extends Error {
  constructor(deadlineMs: number) {
    super(`Run exceeded its deadline of ${deadlineMs}ms`);
    this.name = "DeadlineExceededError";
  }
}

/** A similarity, schema, table or PII backend call failed. */
export class BackendUnavailableError extends Error {
  readonly backend: string;

  constructor(backend: string, message: string, options?: { cause?: unknown }) {
    super(`${backend}: ${message}`, options);
    this.name = "BackendUnavailableError";
    this.backend = backend;
  }
}

export class StateInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StateInvariantError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
