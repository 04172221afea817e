import { bestTicketText, message } from "../core/state.js";
import { PlanPayloadSchema, type Plan, type PlanStep } from "../core/types.js";
import { baseFields, noteFallback, persist, reason, type StageExecutor } from "./shared.js";

/**
 * Drops repeated ordinals (first occurrence wins) and renumbers 1..n when the
 * remaining ordinals are not strictly increasing in plan order.
 */
export function normalizeSteps(steps: PlanStep[]): PlanStep[] {
  const seen = new Set<number>();
  const unique = steps.filter((s) => {
    if (seen.has(s.ordinal)) return false;
    seen.add(s.ordinal);
    return true;
  });
  const increasing = unique.every(
    (s, i) => i === 0 || s.ordinal > (unique[i - 1]?.ordinal ?? 0),
  );
  if (increasing) return unique;
  return unique.map((s, i) => ({ ...s, ordinal: i + 1 }));
}

export function fallbackPlan(
  base: Pick<Plan, "sessionId" | "createdAt">,
  failure: string,
): Plan {
  return {
    ...base,
    confidence: 0,
    summary: "Planning failed; verify the ticket manually",
    steps: [
      {
        ordinal: 1,
        action: "VERIFY",
        description: `Verify the reported issue by hand (planning failed: ${failure})`,
        target: "",
        parameters: "",
        needsContext: false,
      },
    ],
    complexity: "unknown",
    estimatedDuration: "unknown",
    fallback: true,
  };
}

export const planningStage: StageExecutor = async (state, ctx) => {
  const res = await reason(state, ctx, PlanPayloadSchema, {
    stage: "planning",
    prompt: "planning.md",
    input: `Support ticket:\n${bestTicketText(state)}`,
  });

  let plan: Plan;
  const steps = res.ok ? normalizeSteps(res.data.steps) : [];
  if (res.ok && steps.length) {
    plan = {
      ...baseFields(state, res.data.confidence),
      summary: res.data.summary,
      steps,
      complexity: res.data.complexity,
      estimatedDuration: res.data.estimatedDuration,
      fallback: false,
    };
  } else {
    const failure = res.ok ? "the plan had no steps" : res.reason;
    noteFallback(state, ctx, "planning", failure);
    plan = fallbackPlan(baseFields(state, 0), failure);
  }

  await persist(state, ctx, "planning", plan);
  return {
    plan,
    messages: [
      message(
        "assistant",
        "planning",
        `Plan with ${plan.steps.length} step(s): ${plan.summary}`,
        res.ok ? res.advisedNext : undefined,
      ),
    ],
  };
};
