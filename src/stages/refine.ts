import { message } from "../core/state.js";
import { RefinementPayloadSchema, type RefinementResult } from "../core/types.js";
import { baseFields, noteFallback, persist, reason, type StageExecutor } from "./shared.js";

export const refineStage: StageExecutor = async (state, ctx) => {
  const intakeReason = state.intake?.reason ?? "";
  const res = await reason(state, ctx, RefinementPayloadSchema, {
    stage: "refinement",
    prompt: "refinement.md",
    input: [
      `Support ticket:\n${state.ticket}`,
      intakeReason ? `Why it needs refinement:\n${intakeReason}` : "",
    ]
      .filter(Boolean)
      .join("\n\n"),
  });

  let result: RefinementResult;
  if (res.ok) {
    result = {
      ...baseFields(state, res.data.confidence),
      originalText: state.ticket,
      refinedText: res.data.refinedText.trim(),
      reason: res.data.reason,
      fallback: false,
    };
  } else {
    noteFallback(state, ctx, "refinement", res.reason);
    result = {
      ...baseFields(state, 0),
      originalText: state.ticket,
      refinedText: state.ticket,
      reason: `Refinement unavailable, keeping the original text: ${res.reason}`,
      fallback: true,
    };
  }

  await persist(state, ctx, "refinement", result);
  return {
    refinement: result,
    messages: [
      message(
        "assistant",
        "refinement",
        result.refinedText,
        res.ok ? res.advisedNext : undefined,
      ),
    ],
  };
};
