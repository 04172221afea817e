// Typed records for every stage output, plus the zod schemas the stages use
// to validate what a reasoning unit returns.
import { z } from "zod";

export const PLAN_ACTIONS = [
  "INSERT",
  "UPDATE",
  "DELETE",
  "VERIFY",
  "CONFIGURE",
] as const;

export type PlanAction = (typeof PLAN_ACTIONS)[number];

export const STAGE_NAMES = [
  "guardrail",
  "intake",
  "refinement",
  "planning",
  "dispatch",
  "retrieval",
  "execution",
  "validation",
  "report",
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

/** Stages the dispatcher may select once a plan exists. */
export type DispatchTarget = "retrieval" | "execution" | "validation" | "report";

export type Session = {
  id: string;
  createdAt: string;
  dir: string;
};

export type StageOutputBase = {
  confidence: number;
  sessionId: string;
  createdAt: string;
};

const confidence = z.coerce.number().min(0).max(1);
const scalar = z.union([z.string(), z.number(), z.boolean()]).transform(String);

// ---------------------------------------------------------------------------
// Guardrail

export type GuardrailResult = {
  blocked: boolean;
  categories: string[];
  excerpt: string;
  sessionId: string;
  checkedAt: string;
};

// ---------------------------------------------------------------------------
// Intake / refinement

export const ROUTING_HINTS = ["proceed", "needs_refinement"] as const;
export type RoutingHint = (typeof ROUTING_HINTS)[number];

export const IntakePayloadSchema = z.object({
  incomplete: z.boolean(),
  reason: z.string(),
  confidence,
  refinedText: z.string().nullish(),
  routingHint: z.enum(ROUTING_HINTS).catch("needs_refinement"),
  nextAgent: z.string().nullish(),
});

export type IntakeResult = StageOutputBase & {
  incomplete: boolean;
  reason: string;
  refinedText?: string;
  routingHint: RoutingHint;
  fallback: boolean;
};

export const RefinementPayloadSchema = z.object({
  refinedText: z.string().min(1),
  reason: z.string(),
  confidence,
  nextAgent: z.string().nullish(),
});

export type RefinementResult = StageOutputBase & {
  originalText: string;
  refinedText: string;
  reason: string;
  fallback: boolean;
};

// ---------------------------------------------------------------------------
// Planning

export const PlanStepSchema = z.object({
  ordinal: z.coerce.number().int().positive(),
  action: z.preprocess(
    (v) => (typeof v === "string" ? v.trim().toUpperCase() : v),
    z.enum(PLAN_ACTIONS),
  ),
  description: z.string(),
  target: z.string().default(""),
  parameters: z.string().default(""),
  needsContext: z.boolean().default(false),
});

export type PlanStep = z.infer<typeof PlanStepSchema>;

export const PlanPayloadSchema = z.object({
  summary: z.string(),
  steps: z.array(PlanStepSchema),
  complexity: z.string().default("unknown"),
  estimatedDuration: z.string().default("unknown"),
  confidence,
  nextAgent: z.string().nullish(),
});

export type Plan = StageOutputBase & {
  summary: string;
  steps: PlanStep[];
  complexity: string;
  estimatedDuration: string;
  fallback: boolean;
};

// ---------------------------------------------------------------------------
// Dispatch loop stages

export type StageStatus = "ok" | "error";

export type SimilarTicket = {
  id: string;
  content: string;
  score: number;
};

export type TableSchemaInfo = {
  tableName: string;
  description: string;
  columns: string[];
  businessRules: string[];
  relationships: string[];
  relevanceScore: number;
};

export type RetrievalResult = StageOutputBase & {
  ordinals: number[];
  status: StageStatus;
  query: string;
  similarTickets: SimilarTicket[];
  schemas: TableSchemaInfo[];
  error?: string;
};

export const TABLE_OPERATIONS = ["insert", "update", "delete", "none"] as const;
export type TableOperationKind = (typeof TABLE_OPERATIONS)[number];

export const TableOperationSchema = z.object({
  kind: z.enum(TABLE_OPERATIONS),
  table: z.string().min(1),
  keyColumn: z.string().min(1),
  keyValue: scalar,
  row: z.record(scalar).nullish(),
  updateColumn: z.string().nullish(),
  newValue: scalar.nullish(),
  confidence: confidence.default(0.5),
  nextAgent: z.string().nullish(),
});

export type TableOperation = z.infer<typeof TableOperationSchema>;

export type ExecutionOutcome =
  | "inserted"
  | "updated"
  | "deleted"
  | "duplicate"
  | "not_found"
  | "skipped"
  | "error";

export type ExecutedStep = {
  ordinal: number;
  action: PlanAction;
  operation: TableOperation;
  outcome: ExecutionOutcome;
  status: StageStatus;
  affectedRows: number;
  message: string;
};

export type ExecutionResult = StageOutputBase & {
  ordinals: number[];
  status: StageStatus;
  steps: ExecutedStep[];
  fallback: boolean;
};

export const ISSUE_SEVERITIES = ["low", "medium", "high"] as const;
export type IssueSeverity = (typeof ISSUE_SEVERITIES)[number];

export const ValidationPayloadSchema = z.object({
  isValid: z.boolean(),
  confidence,
  issues: z
    .array(
      z.object({
        severity: z.enum(ISSUE_SEVERITIES).catch("medium"),
        message: z.string(),
      }),
    )
    .default([]),
  recommendations: z.array(z.string()).default([]),
  nextAgent: z.string().nullish(),
});

export type ValidationIssue = {
  severity: IssueSeverity;
  message: string;
};

export type ValidationResult = StageOutputBase & {
  ordinals: number[];
  status: StageStatus;
  isValid: boolean;
  issues: ValidationIssue[];
  recommendations: string[];
  evidence: Record<string, string>[];
  fallback: boolean;
};

// ---------------------------------------------------------------------------
// Report

export const RESOLUTION_STATUSES = [
  "RESOLVED",
  "PARTIALLY_RESOLVED",
  "FAILED",
] as const;
export type ResolutionStatus = (typeof RESOLUTION_STATUSES)[number];

export const ReportPayloadSchema = z.object({
  summary: z.string(),
  followUps: z.array(z.string()).default([]),
  confidence,
});

export type StepTaken = {
  ordinal: number;
  stage: DispatchTarget;
  description: string;
  status: StageStatus;
  detail: string;
};

export type ReportResult = StageOutputBase & {
  resolutionStatus: ResolutionStatus;
  summary: string;
  stepsTaken: StepTaken[];
  timeToResolutionMs: number;
  followUps: string[];
  fallback: boolean;
};

// ---------------------------------------------------------------------------
// Dispatch decisions

export type DispatchDecision = StageOutputBase & {
  sequence: number;
  stage: DispatchTarget;
  ordinals: number[];
  justification: string;
  /** Stage a reasoning unit suggested; logged only, never followed. */
  advisedStage?: string;
};
