import { executionStage } from "../stages/execution.js";
import { guardrailStage } from "../stages/guardrail.js";
import { intakeStage } from "../stages/intake.js";
import { planningStage } from "../stages/planning.js";
import { refineStage } from "../stages/refine.js";
import { reportStage } from "../stages/report.js";
import { retrievalStage } from "../stages/retrieval.js";
import { baseFields, persist, type StageExecutor } from "../stages/shared.js";
import { validationStage } from "../stages/validation.js";
import type { EngineContext, ResolverServices } from "./context.js";
import {
  BudgetExceededError,
  DeadlineExceededError,
  StateInvariantError,
} from "./errors.js";
import { emitEngineEvent, type EngineEventListener } from "./events.js";
import { logDebug } from "./logger.js";
import {
  dispatchBound,
  latestAdvice,
  nextDispatch,
  routeAfterGuardrail,
  routeAfterIntake,
  visitBudget,
} from "./router.js";
import type { ResolverSettings } from "./settings.js";
import {
  applyDelta,
  completedOrdinals,
  createWorkflowState,
  message,
  type WorkflowState,
} from "./state.js";
import type { DispatchDecision, Session, StageName } from "./types.js";

export type NodeName = StageName;
type Next = NodeName | "end";

export type ResolverGraph = {
  entry: NodeName;
  nodes: Record<NodeName, StageExecutor>;
  edges: Record<NodeName, (state: WorkflowState) => Next>;
};

/**
 * Records the next step to run. The choice comes from plan ordinals alone;
 * whatever a reasoning unit suggested is stored as advice and not followed.
 */
export const dispatchStage: StageExecutor = async (state, ctx) => {
  if (!state.plan) throw new StateInvariantError("Dispatch reached before planning");
  const bound = dispatchBound(state.plan);
  if (state.dispatches.length >= bound) {
    throw new BudgetExceededError(
      `Dispatch bound of ${bound} reached for a ${state.plan.steps.length}-step plan`,
      state,
      bound,
    );
  }

  const next = nextDispatch(state);
  const decision: DispatchDecision = {
    ...baseFields(state, 1),
    sequence: state.dispatches.length + 1,
    ...next,
  };
  const advice = latestAdvice(state);
  if (advice) {
    decision.advisedStage = advice;
    if (advice !== next.stage) {
      logDebug(
        ctx.settings.debug,
        `Ignoring suggested next agent "${advice}"; dispatching ${next.stage}`,
      );
    }
  }

  emitEngineEvent(
    {
      type: "dispatch",
      sessionId: state.session.id,
      stage: decision.stage,
      data: { sequence: decision.sequence, ordinals: decision.ordinals },
    },
    ctx.onEvent,
  );
  await persist(state, ctx, "dispatch", decision);
  return {
    dispatch: decision,
    messages: [message("system", "dispatcher", decision.justification)],
  };
};

function afterDispatch(state: WorkflowState): Next {
  const last = state.dispatches[state.dispatches.length - 1];
  if (!last) throw new StateInvariantError("No dispatch decision recorded");
  return last.stage;
}

export function buildResolverGraph(): ResolverGraph {
  return {
    entry: "guardrail",
    nodes: {
      guardrail: guardrailStage,
      intake: intakeStage,
      refinement: refineStage,
      planning: planningStage,
      dispatch: dispatchStage,
      retrieval: retrievalStage,
      execution: executionStage,
      validation: validationStage,
      report: reportStage,
    },
    edges: {
      guardrail: routeAfterGuardrail,
      intake: routeAfterIntake,
      refinement: () => "planning",
      planning: () => "dispatch",
      dispatch: afterDispatch,
      retrieval: () => "dispatch",
      execution: () => "dispatch",
      validation: () => "dispatch",
      report: () => "end",
    },
  };
}

const LOOP_STAGES: ReadonlySet<NodeName> = new Set(["retrieval", "execution", "validation"]);

function assertNotRedispatched(state: WorkflowState, node: NodeName) {
  if (!LOOP_STAGES.has(node)) return;
  const last = state.dispatches[state.dispatches.length - 1];
  const done = completedOrdinals(state);
  const repeated = last?.ordinals.filter((o) => done.has(o)) ?? [];
  if (repeated.length) {
    throw new StateInvariantError(`Ordinal(s) ${repeated.join(", ")} already completed`);
  }
}

export type RunOptions = {
  ticket: string;
  sessionId?: string;
  maxIterations?: number;
  deadlineMs?: number;
  signal?: AbortSignal;
  onEvent?: EngineEventListener;
};

export type RunResult = {
  status: "completed" | "blocked";
  state: WorkflowState;
  session: Session;
};

/** The reason a run was aborted, as an Error worth rethrowing. */
function abortReason(signal: AbortSignal, fallback: unknown): unknown {
  return signal.reason instanceof Error ? signal.reason : fallback;
}

/**
 * Settles with `work`, or rejects with the abort reason as soon as `signal`
 * fires, whichever comes first. A backend that ignores the signal cannot hold
 * the run past its deadline.
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Walks the stage graph from the guardrail to a terminal node. Throws
 * BudgetExceededError when the dispatch bound or the visit budget is hit
 * (`maxIterations`, raised to what the plan needs once there is one) and
 * DeadlineExceededError when `deadlineMs` elapses.
 */
export async function runResolver(
  services: ResolverServices,
  settings: ResolverSettings,
  opts: RunOptions,
): Promise<RunResult> {
  const graph = buildResolverGraph();
  const session = await services.sessions.createSession(opts.sessionId);
  const maxIterations = opts.maxIterations ?? settings.maxIterations;
  const deadlineMs = opts.deadlineMs ?? settings.deadlineMs;

  const controller = new AbortController();
  const timer = deadlineMs
    ? setTimeout(() => controller.abort(new DeadlineExceededError(deadlineMs)), deadlineMs)
    : undefined;
  const forwardAbort = () => controller.abort(opts.signal?.reason);
  if (opts.signal?.aborted) forwardAbort();
  else opts.signal?.addEventListener("abort", forwardAbort, { once: true });

  const ctx: EngineContext = {
    ...services,
    settings,
    onEvent: opts.onEvent,
    signal: controller.signal,
  };
  const emit = (event: Parameters<typeof emitEngineEvent>[0]) =>
    emitEngineEvent({ sessionId: session.id, ...event }, opts.onEvent);

  let state = createWorkflowState(session, opts.ticket);
  let node: Next = graph.entry;
  let visits = 0;
  emit({ type: "run-start", data: { maxIterations, deadlineMs } });

  try {
    while (node !== "end") {
      controller.signal.throwIfAborted();
      const budget = visitBudget(state, maxIterations);
      if (visits >= budget) {
        throw new BudgetExceededError(
          `Iteration budget of ${budget} stage visits exhausted`,
          state,
          budget,
        );
      }
      visits++;
      assertNotRedispatched(state, node);

      const current: NodeName = node;
      emit({ type: "stage-start", stage: current });
      const delta = await untilAborted(graph.nodes[current](state, ctx), controller.signal);
      state = applyDelta(state, delta);
      emit({ type: "stage-end", stage: current, success: true });
      node = graph.edges[current](state);
    }
  } catch (err) {
    emit({ type: "run-end", success: false, data: { status: "failed", visits } });
    if (controller.signal.aborted) throw abortReason(controller.signal, err);
    throw err;
  } finally {
    if (timer) clearTimeout(timer);
    opts.signal?.removeEventListener("abort", forwardAbort);
  }

  const status = state.status;
  if (status === "running") {
    throw new StateInvariantError(`Session ${session.id} stopped without a report`);
  }
  emit({ type: "run-end", success: true, data: { status, visits } });
  return { status, state, session };
}
