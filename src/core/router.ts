import { completedOrdinals, type WorkflowState } from "./state.js";
import type { DispatchDecision, DispatchTarget, Plan, PlanStep } from "./types.js";

/** Intake confidence below this goes through refinement first. */
export const INTAKE_CONFIDENCE_THRESHOLD = 0.5;

export type GuardrailRoute = "intake" | "end";
export type IntakeRoute = "refinement" | "planning";

export function routeAfterGuardrail(state: WorkflowState): GuardrailRoute {
  return state.guardrail?.blocked ? "end" : "intake";
}

export function routeAfterIntake(state: WorkflowState): IntakeRoute {
  const confidence = state.intake?.confidence ?? 0;
  return confidence < INTAKE_CONFIDENCE_THRESHOLD ? "refinement" : "planning";
}

export function stageForStep(step: PlanStep): Exclude<DispatchTarget, "report"> {
  if (step.needsContext) return "retrieval";
  if (step.action === "VERIFY") return "validation";
  return "execution";
}

/** Most dispatch decisions a plan may produce: one per step plus the report. */
export function dispatchBound(plan: Plan): number {
  return plan.steps.length + 1;
}

/**
 * Stage visits a plan needs at most: guardrail, intake, refinement and
 * planning, one dispatch per step plus the report's, each step's stage and
 * the report itself.
 */
export function planVisitBound(plan: Plan): number {
  return 2 * plan.steps.length + 6;
}

/** The configured visit budget, widened once a plan needs more. */
export function visitBudget(state: WorkflowState, maxIterations: number): number {
  return state.plan ? Math.max(maxIterations, planVisitBound(state.plan)) : maxIterations;
}

export type NextDispatch = Pick<DispatchDecision, "stage" | "ordinals" | "justification">;

/**
 * Lowest uncompleted ordinal in plan order, or the report once every step has
 * an output. Deterministic: the same state always yields the same decision.
 */
export function nextDispatch(state: WorkflowState): NextDispatch {
  const steps = state.plan?.steps ?? [];
  const done = completedOrdinals(state);
  const next = steps
    .filter((s) => !done.has(s.ordinal))
    .sort((a, b) => a.ordinal - b.ordinal)[0];

  if (!next) {
    return {
      stage: "report",
      ordinals: [],
      justification: `All ${steps.length} plan step(s) have an output`,
    };
  }
  const stage = stageForStep(next);
  return {
    stage,
    ordinals: [next.ordinal],
    justification: `Step ${next.ordinal} (${next.action}${
      next.needsContext ? ", needs context" : ""
    }) goes to ${stage}; lowest uncompleted ordinal`,
  };
}

/** "Next agent" suggested by the latest reasoning output, if any. */
export function latestAdvice(state: WorkflowState): string | undefined {
  for (let i = state.messages.length - 1; i >= 0; i--) {
    const msg = state.messages[i];
    if (msg?.source === "dispatcher") return undefined;
    if (msg?.advisedNext) return msg.advisedNext;
  }
  return undefined;
}
