import type { SimilarTicket, TableSchemaInfo } from "../core/types.js";

// Every backend call takes the run's abort signal as its last argument.

export interface SimilarityBackend {
  search(query: string, k: number, signal?: AbortSignal): Promise<SimilarTicket[]>;
}

export interface SchemaBackend {
  searchSchemas(
    query: string,
    k: number,
    tableFilter?: string,
    signal?: AbortSignal,
  ): Promise<TableSchemaInfo[]>;
}

export type TableRow = Record<string, string>;

export type InsertResult =
  | { outcome: "inserted"; row: TableRow }
  | { outcome: "duplicate"; key: string; existing: TableRow }
  | { outcome: "error"; message: string };

export interface TableStore {
  get(table: string, column: string, value: string, signal?: AbortSignal): Promise<TableRow[]>;
  insert(
    table: string,
    row: TableRow,
    keyColumn?: string,
    signal?: AbortSignal,
  ): Promise<InsertResult>;
  update(
    table: string,
    searchColumn: string,
    searchValue: string,
    updateColumn: string,
    newValue: string,
    signal?: AbortSignal,
  ): Promise<number>;
  delete(table: string, column: string, value: string, signal?: AbortSignal): Promise<number>;
  count(table: string, signal?: AbortSignal): Promise<number>;
}

export type PiiCheckResult = {
  blocked: boolean;
  categories: string[];
  excerpt: string;
};

export interface PiiBackend {
  check(text: string, signal?: AbortSignal): Promise<PiiCheckResult>;
}
