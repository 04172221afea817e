import { errorMessage } from "../core/errors.js";
import { bestTicketText, message } from "../core/state.js";
import type { RetrievalResult } from "../core/types.js";
import { baseFields, dispatchedSteps, persist, type StageExecutor } from "./shared.js";

/**
 * Similar past tickets and relevant table schemas for the dispatched lookup
 * step. No reasoning call: both indexes are queried directly.
 */
export const retrievalStage: StageExecutor = async (state, ctx) => {
  const steps = dispatchedSteps(state);
  const ordinals = steps.map((s) => s.ordinal);
  const query = [bestTicketText(state), ...steps.map((s) => s.description)]
    .filter(Boolean)
    .join("\n");
  const target = steps.find((s) => s.target)?.target;

  let result: RetrievalResult;
  try {
    const { similarityK, schemaK } = ctx.settings;
    const similarTickets = await ctx.similarity.search(query, similarityK, ctx.signal);
    let schemas = await ctx.schemas.searchSchemas(query, schemaK, target, ctx.signal);
    if (target && !schemas.length) {
      schemas = await ctx.schemas.searchSchemas(query, schemaK, undefined, ctx.signal);
    }
    const best = similarTickets[0]?.score ?? 0;
    result = {
      ...baseFields(state, Math.min(1, best)),
      ordinals,
      status: "ok",
      query,
      similarTickets,
      schemas,
    };
  } catch (err) {
    if (ctx.signal?.aborted) throw err;
    result = {
      ...baseFields(state, 0),
      ordinals,
      status: "error",
      query,
      similarTickets: [],
      schemas: [],
      error: errorMessage(err),
    };
  }

  await persist(state, ctx, "retrieval", result);
  const summary =
    result.status === "ok"
      ? `Found ${result.similarTickets.length} similar ticket(s) and ${result.schemas.length} table schema(s)`
      : `Retrieval failed: ${result.error ?? "unknown error"}`;
  return {
    retrieval: result,
    messages: [message("assistant", "retrieval", summary)],
  };
};
