import type { PiiBackend } from "../backends/types.js";
import type { GuardrailResult } from "../core/types.js";

export const EXCERPT_MAX_LENGTH = 150;

export const KNOWN_PII_ENTITIES = [
  "PERSON",
  "EMAIL_ADDRESS",
  "PHONE_NUMBER",
  "CREDIT_CARD",
  "US_SSN",
  "IP_ADDRESS",
  "LOCATION",
  "DATE_TIME",
] as const;

const BLOCK_INDICATORS = ["pii", "personal", "sensitive", "refuse", "block"];

/**
 * At most {@link EXCERPT_MAX_LENGTH} characters, and never more than half of
 * the source text, so a short ticket is not stored whole.
 */
export function createExcerpt(text: string): string {
  const keep = Math.min(EXCERPT_MAX_LENGTH - 3, Math.floor(text.length / 2));
  return `${text.slice(0, keep)}...`;
}

/** True when a detector failure message reads as a block decision. */
export function isBlockIndicator(message: string): boolean {
  const lower = message.toLowerCase();
  return BLOCK_INDICATORS.some((k) => lower.includes(k));
}

export function extractEntityTypes(message: string): string[] {
  const upper = message.toUpperCase();
  return KNOWN_PII_ENTITIES.filter((e) => upper.includes(e));
}

/**
 * Screens raw ticket text before any stage sees it. Detector failures that do
 * not read as a block decision are rethrown: the run never continues on
 * unscreened text.
 */
export async function screenTicket(
  text: string,
  backend: PiiBackend,
  sessionId: string,
  signal?: AbortSignal,
): Promise<GuardrailResult> {
  const checkedAt = new Date().toISOString();
  if (!text.trim()) {
    return { blocked: false, categories: [], excerpt: "", sessionId, checkedAt };
  }

  try {
    const res = await backend.check(text, signal);
    if (!res.blocked) {
      return { blocked: false, categories: [], excerpt: "", sessionId, checkedAt };
    }
    return {
      blocked: true,
      categories: res.categories.length ? [...res.categories] : ["PII_DETECTED"],
      excerpt: createExcerpt(text),
      sessionId,
      checkedAt,
    };
  } catch (err) {
    if (signal?.aborted) throw err;
    const msg = err instanceof Error ? err.message : String(err);
    if (!isBlockIndicator(msg)) throw err;
    const types = extractEntityTypes(msg);
    return {
      blocked: true,
      categories: types.length ? types : ["PII_DETECTED"],
      excerpt: createExcerpt(text),
      sessionId,
      checkedAt,
    };
  }
}
