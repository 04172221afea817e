export * from "./core/types.js";
export * from "./core/errors.js";
export {
  applyDelta,
  bestTicketText,
  completedOrdinals,
  createWorkflowState,
  type RunStatus,
  type StateDelta,
  type WorkflowMessage,
  type WorkflowState,
} from "./core/state.js";
export { SessionStore, generateSessionId, type StageArtifact } from "./core/session.js";
export {
  INTAKE_CONFIDENCE_THRESHOLD,
  dispatchBound,
  nextDispatch,
  routeAfterGuardrail,
  routeAfterIntake,
  stageForStep,
} from "./core/router.js";
export {
  buildResolverGraph,
  runResolver,
  type ResolverGraph,
  type RunOptions,
  type RunResult,
} from "./core/orchestrator.js";
export {
  createDefaultServices,
  type EngineContext,
  type ResolverServices,
} from "./core/context.js";
export { loadSettings, type ResolverSettings } from "./core/settings.js";
export {
  OpenAIReasoningUnit,
  type ReasoningRequest,
  type ReasoningResponse,
  type ReasoningUnit,
} from "./core/llm.js";
export { loadPrompt, PromptLoader, type LoadedPrompt } from "./core/promptLoader.js";
export {
  setEngineEventListener,
  type EngineEvent,
  type EngineEventListener,
} from "./core/events.js";
export { summarizeUsage } from "./core/usage.js";
export { screenTicket, createExcerpt } from "./gates/guardrail.js";
export type {
  InsertResult,
  PiiBackend,
  PiiCheckResult,
  SchemaBackend,
  SimilarityBackend,
  TableRow,
  TableStore,
} from "./backends/types.js";
export { CsvTableStore } from "./backends/csvTable.js";
export { LexicalSchemaIndex, LexicalTicketIndex } from "./backends/lexicalIndex.js";
export { PatternPiiBackend, getEnabledPiiChecks } from "./backends/piiPatterns.js";
