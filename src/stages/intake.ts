import { message } from "../core/state.js";
import { IntakePayloadSchema, type IntakeResult } from "../core/types.js";
import { baseFields, noteFallback, persist, reason, type StageExecutor } from "./shared.js";

export const intakeStage: StageExecutor = async (state, ctx) => {
  const res = await reason(state, ctx, IntakePayloadSchema, {
    stage: "intake",
    prompt: "intake.md",
    input: `Support ticket:\n${state.ticket}`,
  });

  let result: IntakeResult;
  if (res.ok) {
    const { confidence, incomplete, reason: why, routingHint } = res.data;
    result = {
      ...baseFields(state, confidence),
      incomplete,
      reason: why,
      routingHint,
      fallback: false,
    };
    const refined = res.data.refinedText?.trim();
    if (refined) result.refinedText = refined;
  } else {
    noteFallback(state, ctx, "intake", res.reason);
    result = {
      ...baseFields(state, 0),
      incomplete: true,
      reason: res.reason,
      routingHint: "needs_refinement",
      fallback: true,
    };
  }

  await persist(state, ctx, "intake", result);
  return {
    intake: result,
    messages: [
      message(
        "assistant",
        "intake",
        `Intake confidence ${result.confidence.toFixed(2)}: ${result.reason}`,
        res.ok ? res.advisedNext : undefined,
      ),
    ],
  };
};
