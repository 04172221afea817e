import { config } from "dotenv";
import path from "node:path";
import { z } from "zod";

config();

const SettingsSchema = z.object({
  model: z.string().min(1),
  stageModels: z.record(z.string()),
  sessionsDir: z.string().min(1),
  dataDir: z.string().min(1),
  promptsDir: z.string().optional(),
  maxIterations: z.number().int().positive(),
  deadlineMs: z.number().int().positive().optional(),
  similarityK: z.number().int().positive(),
  schemaK: z.number().int().positive(),
  debug: z.boolean(),
});

export type ResolverSettings = z.infer<typeof SettingsSchema>;

export const DEFAULT_MODEL = "gpt-4.1-mini";
export const DEFAULT_MAX_ITERATIONS = 50;

function intFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) ? n : undefined;
}

/** RESOLVER_MODEL_<STAGE> entries, keyed by lower-case stage name. */
function stageModelsFromEnv(): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    const m = /^RESOLVER_MODEL_([A-Z]+)$/.exec(key);
    if (m?.[1] && value) out[m[1].toLowerCase()] = value;
  }
  return out;
}

export function loadSettings(
  overrides: Partial<ResolverSettings> = {},
): ResolverSettings {
  const cwd = process.cwd();
  const merged: Record<string, unknown> = {
    model: process.env.RESOLVER_MODEL ?? DEFAULT_MODEL,
    stageModels: stageModelsFromEnv(),
    sessionsDir: path.resolve(cwd, process.env.RESOLVER_SESSIONS_DIR ?? "sessions"),
    dataDir: path.resolve(cwd, process.env.RESOLVER_DATA_DIR ?? "data"),
    promptsDir: process.env.RESOLVER_PROMPTS_DIR,
    maxIterations: intFromEnv("RESOLVER_MAX_ITERATIONS") ?? DEFAULT_MAX_ITERATIONS,
    deadlineMs: intFromEnv("RESOLVER_DEADLINE_MS"),
    similarityK: intFromEnv("RESOLVER_SIMILARITY_K") ?? 5,
    schemaK: intFromEnv("RESOLVER_SCHEMA_K") ?? 3,
    debug: process.env.RESOLVER_DEBUG === "1",
  };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }
  return SettingsSchema.parse(merged);
}

export function modelForStage(settings: ResolverSettings, stage: string): string {
  return settings.stageModels[stage] ?? settings.model;
}
