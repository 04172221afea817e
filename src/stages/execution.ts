import type { TableRow, TableStore } from "../backends/types.js";
import type { EngineContext } from "../core/context.js";
import { errorMessage } from "../core/errors.js";
import { bestTicketText, message, type WorkflowState } from "../core/state.js";
import {
  TableOperationSchema,
  type ExecutedStep,
  type ExecutionResult,
  type PlanStep,
  type TableOperation,
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

function noOperation(step: PlanStep): TableOperation {
  return { kind: "none", table: step.target, keyColumn: "", keyValue: "", confidence: 0 };
}

/**
 * Table operation read straight off a step's target and parameters. The first
 * parameter is the key; for UPDATE the second is the column to change.
 * Returns null when the step does not carry enough to act on.
 */
export function deriveOperation(step: PlanStep): TableOperation | null {
  if (!step.target) return null;
  const params = Object.entries(parseParameters(step.parameters));
  const [key, second] = params;
  if (!key) return null;
  const [keyColumn, keyValue] = key;
  const base = { table: step.target, keyColumn, keyValue, confidence: 0 };

  switch (step.action) {
    case "INSERT":
      return { ...base, kind: "insert", row: Object.fromEntries(params) };
    case "UPDATE":
      if (!second) return null;
      return { ...base, kind: "update", updateColumn: second[0], newValue: second[1] };
    case "DELETE":
      return { ...base, kind: "delete" };
    default:
      return null;
  }
}

type RunOutcome = Pick<ExecutedStep, "outcome" | "status" | "affectedRows" | "message">;

export async function runOperation(
  tables: TableStore,
  op: TableOperation,
  signal?: AbortSignal,
): Promise<RunOutcome> {
  const where = `${op.table}.${op.keyColumn}=${op.keyValue}`;
  switch (op.kind) {
    case "none":
      return { outcome: "skipped", status: "ok", affectedRows: 0, message: "No table change required" };
    case "insert": {
      const row: TableRow = { ...(op.row ?? {}), [op.keyColumn]: op.keyValue };
      const res = await tables.insert(op.table, row, op.keyColumn, signal);
      if (res.outcome === "inserted") {
        return { outcome: "inserted", status: "ok", affectedRows: 1, message: `Inserted ${where}` };
      }
      if (res.outcome === "duplicate") {
        return {
          outcome: "duplicate",
          status: "ok",
          affectedRows: 0,
          message: `Row ${where} already exists; nothing inserted`,
        };
      }
      return { outcome: "error", status: "error", affectedRows: 0, message: res.message };
    }
    case "update": {
      if (!op.updateColumn || op.newValue === undefined || op.newValue === null) {
        return {
          outcome: "error",
          status: "error",
          affectedRows: 0,
          message: "Update needs updateColumn and newValue",
        };
      }
      const n = await tables.update(
        op.table,
        op.keyColumn,
        op.keyValue,
        op.updateColumn,
        op.newValue,
        signal,
      );
      if (!n) {
        return { outcome: "not_found", status: "error", affectedRows: 0, message: `No row matches ${where}` };
      }
      return {
        outcome: "updated",
        status: "ok",
        affectedRows: n,
        message: `Set ${op.updateColumn}=${op.newValue} where ${where}`,
      };
    }
    case "delete": {
      const n = await tables.delete(op.table, op.keyColumn, op.keyValue, signal);
      if (!n) {
        return { outcome: "not_found", status: "error", affectedRows: 0, message: `No row matches ${where}` };
      }
      return { outcome: "deleted", status: "ok", affectedRows: n, message: `Deleted ${where}` };
    }
  }
}

async function executeStep(
  state: WorkflowState,
  ctx: EngineContext,
  step: PlanStep,
): Promise<{ executed: ExecutedStep; fallback: boolean; advisedNext?: string }> {
  const context = retrievedContext(state);
  const res = await reason(state, ctx, TableOperationSchema, {
    stage: "execution",
    prompt: "execution.md",
    input: [
      `Ticket:\n${bestTicketText(state)}`,
      `Step:\n${JSON.stringify(step, null, 2)}`,
      context ? `Context:\n${context}` : "",
    ]
      .filter(Boolean)
      .join("\n\n"),
  });

  let op: TableOperation;
  let fallback = false;
  if (res.ok) {
    op = res.data;
  } else {
    fallback = true;
    noteFallback(state, ctx, "execution", res.reason);
    const derived = deriveOperation(step);
    if (!derived) {
      const mutating = step.action !== "CONFIGURE" && step.action !== "VERIFY";
      return {
        fallback,
        executed: {
          ordinal: step.ordinal,
          action: step.action,
          operation: noOperation(step),
          outcome: "skipped",
          status: mutating ? "error" : "ok",
          affectedRows: 0,
          message: `No operation could be derived from the step (${res.reason})`,
        },
      };
    }
    op = derived;
  }

  let outcome: RunOutcome;
  try {
    outcome = await runOperation(ctx.tables, op, ctx.signal);
  } catch (err) {
    if (ctx.signal?.aborted) throw err;
    outcome = { outcome: "error", status: "error", affectedRows: 0, message: errorMessage(err) };
  }
  return {
    fallback,
    advisedNext: res.advisedNext,
    executed: { ordinal: step.ordinal, action: step.action, operation: op, ...outcome },
  };
}

export const executionStage: StageExecutor = async (state, ctx) => {
  const steps = dispatchedSteps(state);
  const executed: ExecutedStep[] = [];
  let fallback = false;
  let advisedNext: string | undefined;
  for (const step of steps) {
    const r = await executeStep(state, ctx, step);
    executed.push(r.executed);
    fallback ||= r.fallback;
    advisedNext = r.advisedNext ?? advisedNext;
  }

  const confidence = executed.length
    ? executed.reduce((acc, s) => acc + s.operation.confidence, 0) / executed.length
    : 0;
  const result: ExecutionResult = {
    ...baseFields(state, confidence),
    ordinals: steps.map((s) => s.ordinal),
    status: executed.every((s) => s.status === "ok") ? "ok" : "error",
    steps: executed,
    fallback,
  };

  await persist(state, ctx, "execution", result);
  return {
    execution: result,
    messages: [
      message(
        "assistant",
        "execution",
        executed.map((s) => `#${s.ordinal} ${s.outcome}: ${s.message}`).join("\n"),
        advisedNext,
      ),
    ],
  };
};
