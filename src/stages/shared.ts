import type { z } from "zod";
import type { EngineContext } from "../core/context.js";
import { errorMessage } from "../core/errors.js";
import { emitEngineEvent } from "../core/events.js";
import { logDebug, logWarn } from "../core/logger.js";
import type { StateDelta, WorkflowState } from "../core/state.js";
import { parseStageOutput, type ParseOutcome } from "../core/structured.js";
import type { PlanStep, StageName, StageOutputBase } from "../core/types.js";

/** A stage reads the state and hands back the slots it fills. */
export type StageExecutor = (
  state: WorkflowState,
  ctx: EngineContext,
) => Promise<StateDelta>;

export function baseFields(
  state: WorkflowState,
  confidence: number,
): StageOutputBase {
  return {
    confidence,
    sessionId: state.session.id,
    createdAt: new Date().toISOString(),
  };
}

function isAbort(err: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return true;
  return err instanceof Error && err.name === "AbortError";
}

type ReasonOpts = {
  stage: StageName;
  prompt: string;
  input: string;
};

export type ReasonResult<T> = ParseOutcome<T> & { advisedNext?: string };

/**
 * Loads the stage prompt, calls the reasoning unit and validates its reply.
 * A failed call is reported as a parse failure so the stage can fall back;
 * an aborted call is rethrown.
 */
export async function reason<S extends z.ZodTypeAny>(
  state: WorkflowState,
  ctx: EngineContext,
  schema: S,
  opts: ReasonOpts,
): Promise<ReasonResult<z.output<S>>> {
  let outcome: ParseOutcome<z.output<S>>;
  try {
    const prompt = await ctx.prompts(opts.prompt);
    const response = await ctx.reasoning.invoke({
      stage: opts.stage,
      prompt,
      input: opts.input,
      sessionId: state.session.id,
      usageDir: state.session.dir,
      signal: ctx.signal,
      onEvent: ctx.onEvent,
    });
    outcome = parseStageOutput(schema, response);
  } catch (err) {
    if (isAbort(err, ctx.signal)) throw err;
    outcome = { ok: false, reason: `Reasoning call failed: ${errorMessage(err)}` };
  }

  if (!outcome.ok) return outcome;
  const advisedNext = advisedNextOf(outcome.data);
  if (advisedNext) {
    logDebug(
      ctx.settings.debug,
      `${opts.stage} suggested next agent "${advisedNext}" (advisory only)`,
    );
  }
  return { ...outcome, advisedNext };
}

function advisedNextOf(data: unknown): string | undefined {
  if (typeof data !== "object" || data === null || !("nextAgent" in data)) {
    return undefined;
  }
  const next = data.nextAgent;
  return typeof next === "string" && next.trim() ? next.trim() : undefined;
}

export function noteFallback(
  state: WorkflowState,
  ctx: EngineContext,
  stage: StageName,
  reason: string,
) {
  logWarn(`${stage} fell back for session ${state.session.id}: ${reason}`);
  emitEngineEvent(
    {
      type: "fallback",
      sessionId: state.session.id,
      stage,
      data: { reason },
    },
    ctx.onEvent,
  );
}

export async function persist(
  state: WorkflowState,
  ctx: EngineContext,
  stage: StageName,
  payload: unknown,
) {
  await ctx.sessions.writeStageOutput(state.session, stage, payload, ctx.onEvent);
}

/** `key=value; key=value` or a JSON object, as planners write step parameters. */
export function parseParameters(raw: string): Record<string, string> {
  const text = raw.trim();
  if (!text) return {};
  if (text.startsWith("{")) {
    try {
      const parsed: unknown = JSON.parse(text);
      if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
        const out: Record<string, string> = {};
        for (const [k, v] of Object.entries(parsed)) {
          if (v !== null && v !== undefined) out[k] = String(v);
        }
        return out;
      }
    } catch {
      // not JSON; read as key=value pairs below
    }
  }
  const out: Record<string, string> = {};
  for (const part of text.split(/[;,\n]/)) {
    const idx = part.indexOf("=");
    if (idx <= 0) continue;
    const key = part.slice(0, idx).trim();
    const value = part.slice(idx + 1).trim();
    if (key) out[key] = value;
  }
  return out;
}

/** Plan steps named by the most recent dispatch decision. */
export function dispatchedSteps(state: WorkflowState): PlanStep[] {
  const last = state.dispatches[state.dispatches.length - 1];
  if (!last || !state.plan) return [];
  const wanted = new Set(last.ordinals);
  return state.plan.steps.filter((s) => wanted.has(s.ordinal));
}

/** Similar tickets and schemas gathered so far, as prompt context. */
export function retrievedContext(state: WorkflowState): string {
  const lines: string[] = [];
  for (const r of state.retrievals) {
    if (r.status !== "ok") continue;
    for (const t of r.similarTickets) lines.push(`- similar ${t.id} (${t.score}): ${t.content}`);
    for (const s of r.schemas) {
      lines.push(`- table ${s.tableName} [${s.columns.join(", ")}]: ${s.description}`);
      for (const rule of s.businessRules) lines.push(`  rule: ${rule}`);
    }
  }
  return lines.join("\n");
}
