import { StateInvariantError } from "./errors.js";
import type {
  DispatchDecision,
  ExecutionResult,
  GuardrailResult,
  IntakeResult,
  Plan,
  RefinementResult,
  ReportResult,
  RetrievalResult,
  Session,
  StageName,
  ValidationResult,
} from "./types.js";

export type WorkflowMessage = {
  role: "user" | "assistant" | "system";
  source: StageName | "dispatcher";
  content: string;
  timestamp: string;
  /** "Next agent" a reasoning unit suggested alongside this output. */
  advisedNext?: string;
};

export type RunStatus = "running" | "blocked" | "completed";

export type WorkflowState = {
  session: Session;
  ticket: string;
  startedAt: string;
  messages: WorkflowMessage[];
  guardrail?: GuardrailResult;
  intake?: IntakeResult;
  refinement?: RefinementResult;
  plan?: Plan;
  retrievals: RetrievalResult[];
  executions: ExecutionResult[];
  validations: ValidationResult[];
  report?: ReportResult;
  dispatches: DispatchDecision[];
  status: RunStatus;
};

/** What a stage hands back to the engine; merged by {@link applyDelta}. */
export type StateDelta = {
  messages?: WorkflowMessage[];
  guardrail?: GuardrailResult;
  intake?: IntakeResult;
  refinement?: RefinementResult;
  plan?: Plan;
  retrieval?: RetrievalResult;
  execution?: ExecutionResult;
  validation?: ValidationResult;
  report?: ReportResult;
  dispatch?: DispatchDecision;
  status?: RunStatus;
};

const WRITE_ONCE = [
  "guardrail",
  "intake",
  "refinement",
  "plan",
  "report",
] as const;

export function createWorkflowState(
  session: Session,
  ticket: string,
): WorkflowState {
  return {
    session,
    ticket,
    startedAt: session.createdAt,
    messages: [message("user", "guardrail", ticket)],
    retrievals: [],
    executions: [],
    validations: [],
    dispatches: [],
    status: "running",
  };
}

export function message(
  role: WorkflowMessage["role"],
  source: WorkflowMessage["source"],
  content: string,
  advisedNext?: string,
): WorkflowMessage {
  const msg: WorkflowMessage = {
    role,
    source,
    content,
    timestamp: new Date().toISOString(),
  };
  if (advisedNext) msg.advisedNext = advisedNext;
  return msg;
}

export function applyDelta(
  state: WorkflowState,
  delta: StateDelta,
): WorkflowState {
  for (const slot of WRITE_ONCE) {
    if (delta[slot] !== undefined && state[slot] !== undefined) {
      throw new StateInvariantError(
        `Slot "${slot}" is already set for session ${state.session.id}`,
      );
    }
  }
  if (state.status !== "running") {
    throw new StateInvariantError(
      `Session ${state.session.id} is ${state.status}; no further updates`,
    );
  }
  if (delta.status === "completed" && !(delta.report ?? state.report)) {
    throw new StateInvariantError(
      "Only the report stage may complete a run",
    );
  }

  return {
    ...state,
    messages: delta.messages
      ? [...state.messages, ...delta.messages]
      : state.messages,
    guardrail: delta.guardrail ?? state.guardrail,
    intake: delta.intake ?? state.intake,
    refinement: delta.refinement ?? state.refinement,
    plan: delta.plan ?? state.plan,
    report: delta.report ?? state.report,
    retrievals: delta.retrieval
      ? [...state.retrievals, delta.retrieval]
      : state.retrievals,
    executions: delta.execution
      ? [...state.executions, delta.execution]
      : state.executions,
    validations: delta.validation
      ? [...state.validations, delta.validation]
      : state.validations,
    dispatches: delta.dispatch
      ? [...state.dispatches, delta.dispatch]
      : state.dispatches,
    status: delta.status ?? state.status,
  };
}

/** Plan ordinals covered by any retrieval, execution or validation output. */
export function completedOrdinals(state: WorkflowState): Set<number> {
  const done = new Set<number>();
  for (const out of [
    ...state.retrievals,
    ...state.executions,
    ...state.validations,
  ]) {
    for (const ordinal of out.ordinals) done.add(ordinal);
  }
  return done;
}

/** Refined text wins over the intake rewrite, which wins over the raw ticket. */
export function bestTicketText(state: WorkflowState): string {
  const refined = state.refinement?.refinedText?.trim();
  if (refined) return refined;
  const rewritten = state.intake?.refinedText?.trim();
  if (rewritten) return rewritten;
  return state.ticket;
}
