import type { PiiBackend, PiiCheckResult } from "./types.js";

const PATTERNS: { category: string; re: RegExp }[] = [
  { category: "EMAIL_ADDRESS", re: /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/ },
  { category: "US_SSN", re: /\b\d{3}-\d{2}-\d{4}\b/ },
  { category: "CREDIT_CARD", re: /\b(?:\d{4}[ -]?){3}\d{4}\b/ },
  { category: "PHONE_NUMBER", re: /(?:\+?\d{1,2}[ .-]?)?\(?\b\d{3}\)?[ .-]\d{3}[ .-]\d{4}\b/ },
  { category: "IP_ADDRESS", re: /\b(?:(?:25[0-5]|2[0-4]\d|1?\d?\d)\.){3}(?:25[0-5]|2[0-4]\d|1?\d?\d)\b/ },
];

export function getEnabledPiiChecks(): string[] {
  return PATTERNS.map((p) => p.category);
}

/**
 * Local detector for the structured PII categories. Names and locations need a
 * model-backed detector; this one never reports PERSON or LOCATION.
 */
export class PatternPiiBackend implements PiiBackend {
  async check(text: string, signal?: AbortSignal): Promise<PiiCheckResult> {
    signal?.throwIfAborted();
    const categories: string[] = [];
    for (const { category, re } of PATTERNS) {
      if (re.test(text)) categories.push(category);
    }
    return {
      blocked: categories.length > 0,
      categories,
      excerpt: "",
    };
  }
}
