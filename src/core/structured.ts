import type { z } from "zod";
import type { ReasoningResponse } from "./llm.js";

export type ParseOutcome<T> =
  | { ok: true; data: T; source: "structured" | "text" }
  | { ok: false; reason: string };

/**
 * Balanced `{...}` / `[...]` segments of a text, outermost first. Quotes and
 * escapes are tracked so braces inside strings do not close a segment.
 */
export function extractJsonCandidates(text: string): string[] {
  const out: string[] = [];
  const n = text.length;
  for (let i = 0; i < n; i++) {
    const start = text[i];
    if (start !== "{" && start !== "[") continue;
    const endCh = start === "{" ? "}" : "]";
    let depth = 0;
    let inStr = false;
    let esc = false;
    for (let j = i; j < n; j++) {
      const c = text[j];
      if (inStr) {
        if (esc) esc = false;
        else if (c === "\\") esc = true;
        else if (c === '"') inStr = false;
        continue;
      }
      if (c === '"') inStr = true;
      else if (c === start) depth++;
      else if (c === endCh) {
        depth--;
        if (depth === 0) {
          out.push(text.slice(i, j + 1));
          i = j;
          break;
        }
      }
    }
  }
  return out;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** Every JSON value a free-text reply might carry, in the order worth trying. */
export function jsonValuesFromText(raw: string): unknown[] {
  const values: unknown[] = [];
  const whole = tryParse(raw.trim());
  if (whole.ok) values.push(whole.value);

  for (const candidate of extractJsonCandidates(raw)) {
    const parsed = tryParse(candidate);
    if (parsed.ok) values.push(parsed.value);
  }

  const first = raw.indexOf("{");
  const last = raw.lastIndexOf("}");
  if (first >= 0 && last > first) {
    const parsed = tryParse(raw.slice(first, last + 1));
    if (parsed.ok) values.push(parsed.value);
  }
  return values;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}

/**
 * Validates a reasoning unit's reply against a stage schema: the structured
 * payload first, then JSON scanned out of the raw text.
 */
export function parseStageOutput<S extends z.ZodTypeAny>(
  schema: S,
  response: ReasoningResponse,
): ParseOutcome<z.output<S>> {
  let lastIssue = "";

  if (response.structured !== undefined && response.structured !== null) {
    const parsed = schema.safeParse(response.structured);
    if (parsed.success) return { ok: true, data: parsed.data, source: "structured" };
    lastIssue = describeIssues(parsed.error);
  }

  for (const value of jsonValuesFromText(response.rawText ?? "")) {
    const parsed = schema.safeParse(value);
    if (parsed.success) return { ok: true, data: parsed.data, source: "text" };
    lastIssue = describeIssues(parsed.error);
  }

  if (lastIssue) return { ok: false, reason: `Output did not match schema (${lastIssue})` };
  return { ok: false, reason: "No JSON object found in reasoning output" };
}
