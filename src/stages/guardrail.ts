import { screenTicket } from "../gates/guardrail.js";
import { logWarn } from "../core/logger.js";
import { message } from "../core/state.js";
import { persist, type StageExecutor } from "./shared.js";

export const guardrailStage: StageExecutor = async (state, ctx) => {
  const result = await screenTicket(state.ticket, ctx.pii, state.session.id, ctx.signal);
  await persist(state, ctx, "guardrail", result);

  if (!result.blocked) {
    return {
      guardrail: result,
      messages: [message("system", "guardrail", "No PII detected; ticket admitted")],
    };
  }

  logWarn(
    `Ticket blocked for session ${state.session.id}: ${result.categories.join(", ")}`,
  );
  return {
    guardrail: result,
    status: "blocked",
    messages: [
      message(
        "system",
        "guardrail",
        `Ticket blocked: ${result.categories.join(", ")}. Remove personal data and resubmit.`,
      ),
    ],
  };
};
