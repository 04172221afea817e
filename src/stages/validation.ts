import type { TableRow } from "../backends/types.js";
import type { EngineContext } from "../core/context.js";
import { errorMessage } from "../core/errors.js";
import { bestTicketText, message, type WorkflowState } from "../core/state.js";
import {
  ValidationPayloadSchema,
  type PlanStep,
  type StageStatus,
  type ValidationIssue,
  type ValidationResult,
} from "../core/types.js";
import {
  baseFields,
  dispatchedSteps,
  noteFallback,
  parseParameters,
  persist,
  reason,
  retrievedContext,
  type StageExecutor,
} from "./shared.js";

type StepVerdict = {
  status: StageStatus;
  isValid: boolean;
  confidence: number;
  issues: ValidationIssue[];
  recommendations: string[];
  evidence: TableRow[];
  fallback: boolean;
  advisedNext?: string;
};

/** Ordinals executed since the previous validation dispatch. */
function executedSinceLastValidation(state: WorkflowState): Set<number> {
  const earlier = state.dispatches.slice(0, -1);
  let from = 0;
  earlier.forEach((d, i) => {
    if (d.stage === "validation") from = i + 1;
  });
  return new Set(
    earlier
      .slice(from)
      .filter((d) => d.stage === "execution")
      .flatMap((d) => d.ordinals),
  );
}

/**
 * Low-severity issues for inserts that found the key already present. Each
 * duplicate is reported once, by the first validation after it.
 */
export function duplicateIssues(state: WorkflowState): ValidationIssue[] {
  const fresh = executedSinceLastValidation(state);
  return state.executions.flatMap((e) =>
    e.steps
      .filter((s) => s.outcome === "duplicate" && fresh.has(s.ordinal))
      .map((s) => ({
        severity: "low" as const,
        message: `Step ${s.ordinal}: ${s.message}`,
      })),
  );
}

function executionSummary(state: WorkflowState): string {
  return state.executions
    .flatMap((e) => e.steps)
    .map((s) => `- step ${s.ordinal} ${s.action} ${s.outcome}: ${s.message}`)
    .join("\n");
}

async function validateStep(
  state: WorkflowState,
  ctx: EngineContext,
  step: PlanStep,
): Promise<StepVerdict> {
  let evidence: TableRow[] = [];
  const [key] = Object.entries(parseParameters(step.parameters));
  if (step.target && key) {
    try {
      evidence = await ctx.tables.get(step.target, key[0], key[1], ctx.signal);
    } catch (err) {
      if (ctx.signal?.aborted) throw err;
      return {
        status: "error",
        isValid: false,
        confidence: 0,
        issues: [
          {
            severity: "high",
            message: `Could not read ${step.target} for ${key[0]}=${key[1]}: ${errorMessage(err)}`,
          },
        ],
        recommendations: [],
        evidence: [],
        fallback: false,
      };
    }
  }

  const executed = executionSummary(state);
  const context = retrievedContext(state);
  const res = await reason(state, ctx, ValidationPayloadSchema, {
    stage: "validation",
    prompt: "validation.md",
    input: [
      `Ticket:\n${bestTicketText(state)}`,
      `Step to verify:\n${JSON.stringify(step, null, 2)}`,
      step.target ? `Rows found in ${step.target}:\n${JSON.stringify(evidence, null, 2)}` : "",
      executed ? `Executed so far:\n${executed}` : "",
      context ? `Context:\n${context}` : "",
    ]
      .filter(Boolean)
      .join("\n\n"),
  });

  if (!res.ok) {
    noteFallback(state, ctx, "validation", res.reason);
    return {
      status: "ok",
      isValid: false,
      confidence: 0,
      issues: [{ severity: "medium", message: `Validation could not be judged: ${res.reason}` }],
      recommendations: ["Review this step by hand"],
      evidence,
      fallback: true,
    };
  }
  return {
    status: "ok",
    isValid: res.data.isValid,
    confidence: res.data.confidence,
    issues: res.data.issues,
    recommendations: res.data.recommendations,
    evidence,
    fallback: false,
    advisedNext: res.advisedNext,
  };
}

export const validationStage: StageExecutor = async (state, ctx) => {
  const steps = dispatchedSteps(state);
  const verdicts: StepVerdict[] = [];
  for (const step of steps) verdicts.push(await validateStep(state, ctx, step));

  const issues = [...verdicts.flatMap((v) => v.issues), ...duplicateIssues(state)];
  const confidence = verdicts.length
    ? verdicts.reduce((acc, v) => acc + v.confidence, 0) / verdicts.length
    : 0;
  const result: ValidationResult = {
    ...baseFields(state, confidence),
    ordinals: steps.map((s) => s.ordinal),
    status: verdicts.every((v) => v.status === "ok") ? "ok" : "error",
    isValid: verdicts.length > 0 && verdicts.every((v) => v.isValid),
    issues,
    recommendations: verdicts.flatMap((v) => v.recommendations),
    evidence: verdicts.flatMap((v) => v.evidence),
    fallback: verdicts.some((v) => v.fallback),
  };

  await persist(state, ctx, "validation", result);
  const advisedNext = verdicts.map((v) => v.advisedNext).find(Boolean);
  return {
    validation: result,
    messages: [
      message(
        "assistant",
        "validation",
        `${result.isValid ? "Valid" : "Not valid"} with ${issues.length} issue(s)`,
        advisedNext,
      ),
    ],
  };
};
