import { bestTicketText, message, type WorkflowState } from "../core/state.js";
import {
  ReportPayloadSchema,
  type ReportResult,
  type ResolutionStatus,
  type StepTaken,
} from "../core/types.js";
import { baseFields, noteFallback, persist, reason, type StageExecutor } from "./shared.js";

export function collectStepsTaken(state: WorkflowState): StepTaken[] {
  const describe = (ordinal: number) =>
    state.plan?.steps.find((s) => s.ordinal === ordinal)?.description ?? "";
  const out: StepTaken[] = [];

  for (const r of state.retrievals) {
    for (const ordinal of r.ordinals) {
      out.push({
        ordinal,
        stage: "retrieval",
        description: describe(ordinal),
        status: r.status,
        detail:
          r.status === "ok"
            ? `${r.similarTickets.length} similar ticket(s), ${r.schemas.length} schema(s)`
            : r.error ?? "retrieval failed",
      });
    }
  }
  for (const e of state.executions) {
    for (const s of e.steps) {
      out.push({
        ordinal: s.ordinal,
        stage: "execution",
        description: describe(s.ordinal),
        status: s.status,
        detail: `${s.outcome}: ${s.message}`,
      });
    }
  }
  for (const v of state.validations) {
    for (const ordinal of v.ordinals) {
      const passed = v.status === "ok" && v.isValid;
      out.push({
        ordinal,
        stage: "validation",
        description: describe(ordinal),
        status: passed ? "ok" : "error",
        detail: passed
          ? "validated"
          : v.issues.map((i) => `[${i.severity}] ${i.message}`).join("; ") || "not valid",
      });
    }
  }
  return out.sort((a, b) => a.ordinal - b.ordinal);
}

export function resolutionStatus(steps: StepTaken[]): ResolutionStatus {
  const ok = steps.filter((s) => s.status === "ok").length;
  if (steps.length > 0 && ok === steps.length) return "RESOLVED";
  if (ok > 0) return "PARTIALLY_RESOLVED";
  return "FAILED";
}

function meanConfidence(state: WorkflowState): number {
  const values = [
    state.intake?.confidence,
    state.refinement?.confidence,
    state.plan?.confidence,
    ...state.retrievals.map((r) => r.confidence),
    ...state.executions.map((e) => e.confidence),
    ...state.validations.map((v) => v.confidence),
  ].filter((v): v is number => typeof v === "number");
  if (!values.length) return 0;
  return Math.round((values.reduce((a, b) => a + b, 0) / values.length) * 1000) / 1000;
}

export const reportStage: StageExecutor = async (state, ctx) => {
  const stepsTaken = collectStepsTaken(state);
  const status = resolutionStatus(stepsTaken);
  const okCount = stepsTaken.filter((s) => s.status === "ok").length;

  const res = await reason(state, ctx, ReportPayloadSchema, {
    stage: "report",
    prompt: "report.md",
    input: [
      `Ticket:\n${bestTicketText(state)}`,
      `Resolution status: ${status}`,
      `Steps taken:\n${stepsTaken
        .map((s) => `- ${s.ordinal} ${s.stage} ${s.status}: ${s.description} (${s.detail})`)
        .join("\n")}`,
    ].join("\n\n"),
  });

  const timeToResolutionMs = Math.max(0, Date.now() - Date.parse(state.startedAt));
  let report: ReportResult;
  if (res.ok) {
    report = {
      ...baseFields(state, res.data.confidence),
      resolutionStatus: status,
      summary: res.data.summary,
      stepsTaken,
      timeToResolutionMs,
      followUps: res.data.followUps,
      fallback: false,
    };
  } else {
    noteFallback(state, ctx, "report", res.reason);
    report = {
      ...baseFields(state, meanConfidence(state)),
      resolutionStatus: status,
      summary: `${status}: ${okCount}/${stepsTaken.length} plan steps succeeded`,
      stepsTaken,
      timeToResolutionMs,
      followUps: state.validations.flatMap((v) => v.recommendations),
      fallback: true,
    };
  }

  await persist(state, ctx, "report", report);
  return {
    report,
    status: "completed",
    messages: [message("assistant", "report", report.summary)],
  };
};
