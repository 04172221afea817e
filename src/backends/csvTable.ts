import fs from "fs-extra";
import path from "node:path";
import { BackendUnavailableError, errorMessage } from "../core/errors.js";
import { KeyedMutex } from "./concurrency.js";
import type { InsertResult, TableRow, TableStore } from "./types.js";

type Table = { header: string[]; rows: TableRow[] };

export function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let field = "";
  let record: string[] = [];
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inQuotes) {
      if (c === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += c;
      }
      continue;
    }
    if (c === '"') inQuotes = true;
    else if (c === ",") {
      record.push(field);
      field = "";
    } else if (c === "\n" || c === "\r") {
      if (c === "\r" && text[i + 1] === "\n") i++;
      record.push(field);
      records.push(record);
      record = [];
      field = "";
    } else {
      field += c;
    }
  }
  if (field.length || record.length) {
    record.push(field);
    records.push(record);
  }
  return records.filter((r) => !(r.length === 1 && r[0] === ""));
}

function quote(value: string) {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsv(header: string[], rows: TableRow[]): string {
  const lines = [header.map(quote).join(",")];
  for (const row of rows) lines.push(header.map((h) => quote(row[h] ?? "")).join(","));
  return lines.join("\n") + "\n";
}

/**
 * Header-keyed CSV files under one directory, one file per table. Writers are
 * serialised per table so the duplicate check and the append happen as one step.
 */
export class CsvTableStore implements TableStore {
  private readonly mutex = new KeyedMutex();

  constructor(readonly dir: string) {}

  private fileFor(table: string) {
    if (!/^[A-Za-z0-9_-]+$/.test(table)) {
      throw new BackendUnavailableError("table-store", `Invalid table name "${table}"`);
    }
    return path.join(this.dir, `${table}.csv`);
  }

  private async load(table: string): Promise<Table> {
    const file = this.fileFor(table);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (err) {
      throw new BackendUnavailableError(
        "table-store",
        `Cannot read table "${table}": ${errorMessage(err)}`,
        { cause: err },
      );
    }
    const [header = [], ...records] = parseCsv(raw);
    const rows = records.map((values) => {
      const row: TableRow = {};
      header.forEach((h, idx) => {
        row[h] = values[idx] ?? "";
      });
      return row;
    });
    return { header, rows };
  }

  private async save(table: string, data: Table) {
    const file = this.fileFor(table);
    const tmp = `${file}.tmp`;
    await fs.writeFile(tmp, formatCsv(data.header, data.rows), "utf8");
    await fs.move(tmp, file, { overwrite: true });
  }

  private requireColumn(table: string, data: Table, column: string) {
    if (!data.header.includes(column)) {
      throw new BackendUnavailableError(
        "table-store",
        `Table "${table}" has no column "${column}"`,
      );
    }
  }

  async get(table: string, column: string, value: string, signal?: AbortSignal): Promise<TableRow[]> {
    signal?.throwIfAborted();
    const data = await this.load(table);
    this.requireColumn(table, data, column);
    return data.rows.filter((r) => r[column] === value);
  }

  async count(table: string, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    return (await this.load(table)).rows.length;
  }

  async insert(
    table: string,
    row: TableRow,
    keyColumn?: string,
    signal?: AbortSignal,
  ): Promise<InsertResult> {
    return this.mutex.run(table, async () => {
      signal?.throwIfAborted();
      let data: Table;
      try {
        data = await this.load(table);
      } catch (err) {
        return { outcome: "error", message: errorMessage(err) };
      }
      const key = keyColumn ?? data.header[0];
      if (!key || !data.header.includes(key)) {
        return { outcome: "error", message: `Table "${table}" has no key column "${key ?? ""}"` };
      }
      const unknown = Object.keys(row).filter((c) => !data.header.includes(c));
      if (unknown.length) {
        return { outcome: "error", message: `Unknown column(s) for "${table}": ${unknown.join(", ")}` };
      }
      const keyValue = row[key];
      if (!keyValue) {
        return { outcome: "error", message: `Missing value for key column "${key}"` };
      }
      const existing = data.rows.find((r) => r[key] === keyValue);
      if (existing) return { outcome: "duplicate", key: keyValue, existing };

      const full: TableRow = {};
      for (const h of data.header) full[h] = row[h] ?? "";
      data.rows.push(full);
      try {
        await this.save(table, data);
      } catch (err) {
        return { outcome: "error", message: errorMessage(err) };
      }
      return { outcome: "inserted", row: full };
    });
  }

  async update(
    table: string,
    searchColumn: string,
    searchValue: string,
    updateColumn: string,
    newValue: string,
    signal?: AbortSignal,
  ): Promise<number> {
    return this.mutex.run(table, async () => {
      signal?.throwIfAborted();
      const data = await this.load(table);
      this.requireColumn(table, data, searchColumn);
      this.requireColumn(table, data, updateColumn);
      let count = 0;
      for (const row of data.rows) {
        if (row[searchColumn] !== searchValue) continue;
        row[updateColumn] = newValue;
        count++;
      }
      if (count > 0) await this.save(table, data);
      return count;
    });
  }

  async delete(table: string, column: string, value: string, signal?: AbortSignal): Promise<number> {
    return this.mutex.run(table, async () => {
      signal?.throwIfAborted();
      const data = await this.load(table);
      this.requireColumn(table, data, column);
      const before = data.rows.length;
      data.rows = data.rows.filter((r) => r[column] !== value);
      const removed = before - data.rows.length;
      if (removed > 0) await this.save(table, data);
      return removed;
    });
  }
}
