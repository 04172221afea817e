import { describe, expect, it } from "vitest";
import { z } from "zod";
import { extractJsonCandidates, jsonValuesFromText, parseStageOutput } from "../src/core/structured.js";
import { parseParameters } from "../src/stages/shared.js";

const Payload = z.object({ ok: z.boolean(), note: z.string().default("") });

describe("extractJsonCandidates", () => {
  it("ignores braces inside strings", () => {
    const text = 'before {"a":"}{","b":[1,2]} after [3]';
    expect(extractJsonCandidates(text)).toEqual(['{"a":"}{","b":[1,2]}', "[3]"]);
  });

  it("skips unbalanced segments", () => {
    expect(extractJsonCandidates('{"a": 1')).toEqual([]);
  });

  it("finds JSON inside fenced code blocks", () => {
    const values = jsonValuesFromText('```json\n{"ok": true}\n```');
    expect(values[0]).toEqual({ ok: true });
  });
});

describe("parseStageOutput", () => {
  it("prefers the structured payload", () => {
    const res = parseStageOutput(Payload, {
      rawText: '{"ok": false}',
      structured: { ok: true, note: "structured" },
    });
    expect(res).toEqual({ ok: true, data: { ok: true, note: "structured" }, source: "structured" });
  });

  it("falls back to JSON scanned from the text", () => {
    const res = parseStageOutput(Payload, {
      rawText: 'Result: {"ok": true} (done)',
      structured: { unrelated: 1 },
    });
    expect(res).toEqual({ ok: true, data: { ok: true, note: "" }, source: "text" });
  });

  it("names the schema mismatch", () => {
    const res = parseStageOutput(Payload, { rawText: '{"ok": "yes"}' });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.reason.startsWith("Output did not match schema (ok: ")).toBe(true);
  });

  it("reports replies without any JSON", () => {
    expect(parseStageOutput(Payload, { rawText: "no idea" })).toEqual({
      ok: false,
      reason: "No JSON object found in reasoning output",
    });
  });
});

describe("parseParameters", () => {
  it("reads key=value pairs in order", () => {
    expect(Object.entries(parseParameters("member_id=1003; name=Carol Example\nplan=Basic"))).toEqual([
      ["member_id", "1003"],
      ["name", "Carol Example"],
      ["plan", "Basic"],
    ]);
  });

  it("reads a JSON object and stringifies values", () => {
    expect(parseParameters('{"member_id": 1003, "active": true, "gone": null}')).toEqual({
      member_id: "1003",
      active: "true",
    });
  });

  it("ignores fragments without a key", () => {
    expect(parseParameters("=x; loose; a=1")).toEqual({ a: "1" });
  });
});
