import path from "node:path";
import { CsvTableStore } from "../backends/csvTable.js";
import { LexicalSchemaIndex, LexicalTicketIndex } from "../backends/lexicalIndex.js";
import { PatternPiiBackend } from "../backends/piiPatterns.js";
import type {
  PiiBackend,
  SchemaBackend,
  SimilarityBackend,
  TableStore,
} from "../backends/types.js";
import type { EngineEventListener } from "./events.js";
import { OpenAIReasoningUnit, type ReasoningUnit } from "./llm.js";
import { PromptLoader, type LoadedPrompt } from "./promptLoader.js";
import { SessionStore } from "./session.js";
import { modelForStage, type ResolverSettings } from "./settings.js";

/** Everything a run talks to. Built once by the caller and passed in. */
export type ResolverServices = {
  reasoning: ReasoningUnit;
  similarity: SimilarityBackend;
  schemas: SchemaBackend;
  tables: TableStore;
  pii: PiiBackend;
  sessions: SessionStore;
  prompts: (name: string) => Promise<LoadedPrompt>;
};

export type EngineContext = ResolverServices & {
  settings: ResolverSettings;
  onEvent?: EngineEventListener;
  signal?: AbortSignal;
};

export const DATA_FILES = {
  historicalTickets: "historical-tickets.json",
  tableSchemas: "table-schemas.json",
  tablesDir: "tables",
} as const;

/** File-backed services under `settings.dataDir`, OpenAI for reasoning. */
export async function createDefaultServices(
  settings: ResolverSettings,
  overrides: Partial<ResolverServices> = {},
): Promise<ResolverServices> {
  const dataDir = settings.dataDir;
  const prompts = new PromptLoader({ promptsDir: settings.promptsDir });
  return {
    reasoning:
      overrides.reasoning ??
      new OpenAIReasoningUnit({
        model: settings.model,
        modelForStage: (stage) => modelForStage(settings, stage),
        debug: settings.debug,
      }),
    similarity:
      overrides.similarity ??
      (await LexicalTicketIndex.fromFile(path.join(dataDir, DATA_FILES.historicalTickets))),
    schemas:
      overrides.schemas ??
      (await LexicalSchemaIndex.fromFile(path.join(dataDir, DATA_FILES.tableSchemas))),
    tables: overrides.tables ?? new CsvTableStore(path.join(dataDir, DATA_FILES.tablesDir)),
    pii: overrides.pii ?? new PatternPiiBackend(),
    sessions: overrides.sessions ?? new SessionStore(settings.sessionsDir),
    prompts: overrides.prompts ?? ((name) => prompts.load(name)),
  };
}
