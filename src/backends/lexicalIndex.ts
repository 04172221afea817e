import fs from "fs-extra";
import { z } from "zod";
import { BackendUnavailableError, errorMessage } from "../core/errors.js";
import type { SimilarTicket, TableSchemaInfo } from "../core/types.js";
import type { SchemaBackend, SimilarityBackend } from "./types.js";

const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "for", "from", "in", "is",
  "it", "of", "on", "or", "the", "to", "with", "after", "cannot", "not",
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((t) => t.length > 1 && !STOPWORDS.has(t));
}

function termCounts(tokens: string[]) {
  const counts = new Map<string, number>();
  for (const t of tokens) counts.set(t, (counts.get(t) ?? 0) + 1);
  return counts;
}

/** Cosine similarity over raw term counts, in [0, 1]. */
export function cosine(a: string, b: string): number {
  const ca = termCounts(tokenize(a));
  const cb = termCounts(tokenize(b));
  if (!ca.size || !cb.size) return 0;
  let dot = 0;
  for (const [term, n] of ca) dot += n * (cb.get(term) ?? 0);
  const norm = (m: Map<string, number>) =>
    Math.sqrt([...m.values()].reduce((acc, n) => acc + n * n, 0));
  return dot / (norm(ca) * norm(cb));
}

const round = (n: number) => Math.round(n * 1000) / 1000;

const HistoricalTicketsSchema = z.array(
  z.object({ id: z.string(), content: z.string() }),
);

const TableSchemasSchema = z.array(
  z.object({
    tableName: z.string(),
    description: z.string(),
    columns: z.array(z.string()),
    businessRules: z.array(z.string()).default([]),
    relationships: z.array(z.string()).default([]),
  }),
);

async function readJsonFile<S extends z.ZodTypeAny>(
  backend: string,
  file: string,
  schema: S,
): Promise<z.output<S>> {
  try {
    return schema.parse(await fs.readJson(file));
  } catch (err) {
    throw new BackendUnavailableError(backend, `Cannot load ${file}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

/** Historical tickets scored by term overlap; read-only once loaded. */
export class LexicalTicketIndex implements SimilarityBackend {
  private constructor(private readonly tickets: { id: string; content: string }[]) {}

  static fromTickets(tickets: { id: string; content: string }[]) {
    return new LexicalTicketIndex(tickets);
  }

  static async fromFile(file: string) {
    return new LexicalTicketIndex(
      await readJsonFile("similarity-index", file, HistoricalTicketsSchema),
    );
  }

  async search(query: string, k: number, signal?: AbortSignal): Promise<SimilarTicket[]> {
    signal?.throwIfAborted();
    return this.tickets
      .map((t) => ({ id: t.id, content: t.content, score: round(cosine(query, t.content)) }))
      .filter((t) => t.score > 0)
      .sort((a, b) => b.score - a.score || a.id.localeCompare(b.id))
      .slice(0, Math.max(0, k));
  }
}

export class LexicalSchemaIndex implements SchemaBackend {
  private constructor(private readonly schemas: Omit<TableSchemaInfo, "relevanceScore">[]) {}

  static fromSchemas(schemas: Omit<TableSchemaInfo, "relevanceScore">[]) {
    return new LexicalSchemaIndex(schemas);
  }

  static async fromFile(file: string) {
    return new LexicalSchemaIndex(
      await readJsonFile("schema-index", file, TableSchemasSchema),
    );
  }

  async searchSchemas(
    query: string,
    k: number,
    tableFilter?: string,
    signal?: AbortSignal,
  ): Promise<TableSchemaInfo[]> {
    signal?.throwIfAborted();
    return this.schemas
      .filter((s) => !tableFilter || s.tableName === tableFilter)
      .map((s) => {
        const doc = [s.tableName, s.description, ...s.columns, ...s.businessRules].join(" ");
        return { ...s, relevanceScore: round(cosine(query, doc)) };
      })
      .sort((a, b) => b.relevanceScore - a.relevanceScore || a.tableName.localeCompare(b.tableName))
      .slice(0, Math.max(0, k));
  }
}
