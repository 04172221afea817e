import { afterAll, beforeEach, describe, expect, it } from "vitest";
import fs from "fs-extra";
import path from "node:path";
import { CsvTableStore, formatCsv, parseCsv } from "../src/backends/csvTable.js";
import { tmpDir } from "./helpers.js";

const MEMBERS = [
  "member_id,name,email,membership_type,join_date",
  "1001,Alice Example,alice@example.com,Premium,2023-01-15",
  "1002,Bob Example,bob@example.com,Basic,2023-02-20",
  "",
].join("\n");

describe("csv codec", () => {
  it("handles quoted commas, quotes and CRLF", () => {
    const rows = parseCsv('a,b\r\n"x, y","say ""hi"""\r\n');
    expect(rows).toEqual([
      ["a", "b"],
      ["x, y", 'say "hi"'],
    ]);
    expect(formatCsv(["a", "b"], [{ a: "x, y", b: 'say "hi"' }])).toBe('a,b\n"x, y","say ""hi"""\n');
  });
});

describe("CsvTableStore", () => {
  let dir = "";
  let store: CsvTableStore;

  beforeEach(async () => {
    dir = await tmpDir("csv-table");
    await fs.writeFile(path.join(dir, "members.csv"), MEMBERS, "utf8");
    store = new CsvTableStore(dir);
  });

  afterAll(async () => {
    if (dir) await fs.remove(dir);
  });

  it("reports a duplicate key without writing", async () => {
    const res = await store.insert("members", { member_id: "1001", name: "Someone Else" }, "member_id");
    expect(res.outcome).toBe("duplicate");
    expect(await store.count("members")).toBe(2);
    expect(await fs.readFile(path.join(dir, "members.csv"), "utf8")).toBe(MEMBERS);
  });

  it("inserts a new row, filling missing columns", async () => {
    const res = await store.insert("members", { member_id: "1003", name: "Carol, Example" });
    expect(res).toEqual({
      outcome: "inserted",
      row: { member_id: "1003", name: "Carol, Example", email: "", membership_type: "", join_date: "" },
    });
    expect(await store.count("members")).toBe(3);
    expect((await store.get("members", "member_id", "1003"))[0]?.name).toBe("Carol, Example");
  });

  it("rejects unknown columns and missing keys", async () => {
    const unknown = await store.insert("members", { member_id: "1004", nickname: "D" });
    expect(unknown).toEqual({ outcome: "error", message: 'Unknown column(s) for "members": nickname' });
    const noKey = await store.insert("members", { name: "Nobody" });
    expect(noKey).toEqual({ outcome: "error", message: 'Missing value for key column "member_id"' });
    const noTable = await store.insert("missing", { id: "1" });
    expect(noTable.outcome).toBe("error");
  });

  it("lets only one of two concurrent inserts of the same key through", async () => {
    const results = await Promise.all([
      store.insert("members", { member_id: "2000", name: "First" }),
      store.insert("members", { member_id: "2000", name: "Second" }),
    ]);
    expect(results.map((r) => r.outcome)).toEqual(["inserted", "duplicate"]);
    expect(await store.count("members")).toBe(3);
  });

  it("updates and deletes by column value", async () => {
    expect(await store.update("members", "member_id", "1002", "membership_type", "Gold")).toBe(1);
    expect((await store.get("members", "member_id", "1002"))[0]?.membership_type).toBe("Gold");
    expect(await store.update("members", "member_id", "9999", "membership_type", "Gold")).toBe(0);
    expect(await store.delete("members", "member_id", "1001")).toBe(1);
    expect(await store.count("members")).toBe(1);
  });

  it("refuses unknown columns on reads and invalid table names", async () => {
    await expect(store.get("members", "nickname", "x")).rejects.toThrow(
      'table-store: Table "members" has no column "nickname"',
    );
    await expect(store.count("../etc")).rejects.toThrow('table-store: Invalid table name "../etc"');
  });
});
