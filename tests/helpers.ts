import fs from "fs-extra";
import path from "node:path";
import type {
  InsertResult,
  PiiBackend,
  PiiCheckResult,
  SchemaBackend,
  SimilarityBackend,
  TableRow,
  TableStore,
} from "../src/backends/types.js";
import { LexicalSchemaIndex, LexicalTicketIndex } from "../src/backends/lexicalIndex.js";
import type { EngineContext, ResolverServices } from "../src/core/context.js";
import type { ReasoningRequest, ReasoningResponse, ReasoningUnit } from "../src/core/llm.js";
import { SessionStore } from "../src/core/session.js";
import { loadSettings, type ResolverSettings } from "../src/core/settings.js";
import { createWorkflowState, type WorkflowState } from "../src/core/state.js";
import { STAGE_NAMES, type StageName } from "../src/core/types.js";

export async function tmpDir(name: string) {
  const dir = path.join(process.cwd(), `.tmp-${name}-test`);
  await fs.remove(dir);
  await fs.ensureDir(dir);
  return dir;
}

/**
 * Replies per stage in call order. Objects are returned as `structured`,
 * strings as raw text only, Errors are thrown.
 */
export class ScriptedReasoningUnit implements ReasoningUnit {
  readonly calls: ReasoningRequest[] = [];
  private readonly queues = new Map<StageName, unknown[]>();

  constructor(script: Partial<Record<StageName, unknown[]>> = {}) {
    for (const [stage, replies] of Object.entries(script)) {
      const name = STAGE_NAMES.find((s) => s === stage);
      if (name && replies) this.queues.set(name, [...replies]);
    }
  }

  callsFor(stage: StageName) {
    return this.calls.filter((c) => c.stage === stage);
  }

  async invoke(request: ReasoningRequest): Promise<ReasoningResponse> {
    this.calls.push(request);
    const reply = this.queues.get(request.stage)?.shift();
    if (reply instanceof Error) throw reply;
    if (reply === undefined) return { rawText: "" };
    if (typeof reply === "string") return { rawText: reply };
    return { rawText: JSON.stringify(reply), structured: reply };
  }
}

export class MemoryTableStore implements TableStore {
  readonly tables = new Map<string, { header: string[]; rows: TableRow[] }>();

  constructor(seed: Record<string, { header: string[]; rows: TableRow[] }> = {}) {
    for (const [name, t] of Object.entries(seed)) {
      this.tables.set(name, { header: [...t.header], rows: t.rows.map((r) => ({ ...r })) });
    }
  }

  private table(name: string) {
    const t = this.tables.get(name);
    if (!t) throw new Error(`No table "${name}"`);
    return t;
  }

  async get(table: string, column: string, value: string) {
    return this.table(table).rows.filter((r) => r[column] === value);
  }

  async insert(table: string, row: TableRow, keyColumn?: string): Promise<InsertResult> {
    const t = this.tables.get(table);
    if (!t) return { outcome: "error", message: `No table "${table}"` };
    const key = keyColumn ?? t.header[0] ?? "";
    const value = row[key] ?? "";
    const existing = t.rows.find((r) => r[key] === value);
    if (existing) return { outcome: "duplicate", key: value, existing };
    const full: TableRow = {};
    for (const h of t.header) full[h] = row[h] ?? "";
    t.rows.push(full);
    return { outcome: "inserted", row: full };
  }

  async update(
    table: string,
    searchColumn: string,
    searchValue: string,
    updateColumn: string,
    newValue: string,
  ) {
    let n = 0;
    for (const r of this.table(table).rows) {
      if (r[searchColumn] !== searchValue) continue;
      r[updateColumn] = newValue;
      n++;
    }
    return n;
  }

  async delete(table: string, column: string, value: string) {
    const t = this.table(table);
    const before = t.rows.length;
    t.rows = t.rows.filter((r) => r[column] !== value);
    return before - t.rows.length;
  }

  async count(table: string) {
    return this.table(table).rows.length;
  }
}

export class StaticPiiBackend implements PiiBackend {
  calls = 0;

  constructor(private readonly result: PiiCheckResult | Error = { blocked: false, categories: [], excerpt: "" }) {}

  async check(): Promise<PiiCheckResult> {
    this.calls++;
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

export function membersTable(): MemoryTableStore {
  return new MemoryTableStore({
    members: {
      header: ["member_id", "name", "email", "membership_type", "join_date"],
      rows: [
        { member_id: "1001", name: "Alice Example", email: "alice@example.com", membership_type: "Premium", join_date: "2023-01-15" },
        { member_id: "1002", name: "Bob Example", email: "bob@example.com", membership_type: "Basic", join_date: "2023-02-20" },
      ],
    },
  });
}

export function testSettings(dir: string, overrides: Partial<ResolverSettings> = {}): ResolverSettings {
  return loadSettings({
    sessionsDir: path.join(dir, "sessions"),
    dataDir: path.join(dir, "data"),
    maxIterations: 50,
    similarityK: 5,
    schemaK: 3,
    debug: false,
    ...overrides,
  });
}

export function testServices(
  dir: string,
  overrides: Partial<ResolverServices> = {},
): ResolverServices {
  const similarity: SimilarityBackend = LexicalTicketIndex.fromTickets([
    { id: "TICKET-1", content: "Login authentication failure - users unable to access system" },
    { id: "TICKET-2", content: "Database connection timeout errors in production environment" },
  ]);
  const schemas: SchemaBackend = LexicalSchemaIndex.fromSchemas([
    {
      tableName: "members",
      description: "Registered members",
      columns: ["member_id", "name", "email", "membership_type", "join_date"],
      businessRules: ["member_id is unique"],
      relationships: [],
    },
  ]);
  return {
    reasoning: new ScriptedReasoningUnit(),
    similarity,
    schemas,
    tables: membersTable(),
    pii: new StaticPiiBackend(),
    sessions: new SessionStore(path.join(dir, "sessions")),
    prompts: async (name) => ({ name, text: `prompt ${name}`, config: {}, source: "test" }),
    ...overrides,
  };
}

/** A running state with a session directory, for calling single stages. */
export async function testState(
  services: ResolverServices,
  ticket: string,
): Promise<WorkflowState> {
  const session = await services.sessions.createSession();
  return createWorkflowState(session, ticket);
}

export function testContext(
  services: ResolverServices,
  settings: ResolverSettings,
): EngineContext {
  return { ...services, settings };
}
