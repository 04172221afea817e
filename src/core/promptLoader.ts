import fs from "fs-extra";
import path from "node:path";
import { fileURLToPath } from "node:url";

const moduleDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
const projectRoot = path.resolve(moduleDir, "..");

export type PromptConfig = {
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
};

export type LoadedPrompt = {
  name: string;
  text: string;
  config: PromptConfig;
  source: string;
};

const DEFAULT_TTL_MS = 5 * 60 * 1000;

/**
 * Splits an optional leading `---` block of `key: value` lines off the prompt.
 * Only model, temperature and maxOutputTokens are recognised.
 */
export function parsePromptFile(name: string, raw: string, source: string): LoadedPrompt {
  const config: PromptConfig = {};
  let text = raw;
  const match = /^---\r?\n([\s\S]*?)\r?\n---\r?\n?/.exec(raw);
  if (match) {
    text = raw.slice(match[0].length);
    for (const line of (match[1] ?? "").split(/\r?\n/)) {
      const idx = line.indexOf(":");
      if (idx < 0) continue;
      const key = line.slice(0, idx).trim();
      const value = line.slice(idx + 1).trim();
      if (!value) continue;
      if (key === "model") config.model = value;
      else if (key === "temperature" && Number.isFinite(Number(value)))
        config.temperature = Number(value);
      else if (key === "maxOutputTokens" && Number.isInteger(Number(value)))
        config.maxOutputTokens = Number(value);
    }
  }
  return { name, text: text.trim(), config, source };
}

/** Reads one prompt from the first candidate location that holds it. */
export async function loadPrompt(
  relPath: string,
  opts: { promptsDir?: string } = {},
): Promise<LoadedPrompt> {
  const baseName = path.basename(relPath);
  const candidates = [
    // Explicit prompts directory from settings
    ...(opts.promptsDir ? [path.join(opts.promptsDir, baseName)] : []),
    // As provided (supports absolute or cwd-relative override paths)
    relPath,
    // CWD-based prompts/core override
    path.join(process.cwd(), "prompts", "core", baseName),
    // Packaged prompts under dist/ (if present)
    path.join(moduleDir, "prompts", "core", baseName),
    // Source prompts in a dev/linked setup
    path.join(projectRoot, "src", "prompts", "core", baseName),
  ];

  for (const candidate of candidates) {
    if (await fs.pathExists(candidate)) {
      const stat = await fs.stat(candidate);
      if (!stat.isFile()) continue;
      const raw = await fs.readFile(candidate, "utf8");
      return parsePromptFile(baseName.replace(/\.md$/, ""), raw, candidate);
    }
  }

  throw new Error(`Prompt not found: ${relPath}`);
}

/** Prompt source with its own TTL cache; one per set of services. */
export class PromptLoader {
  private readonly cache = new Map<string, { prompt: LoadedPrompt; loadedAt: number }>();
  private readonly ttlMs: number;

  constructor(private readonly opts: { promptsDir?: string; ttlMs?: number } = {}) {
    this.ttlMs = opts.ttlMs ?? DEFAULT_TTL_MS;
  }

  async load(relPath: string): Promise<LoadedPrompt> {
    const hit = this.cache.get(relPath);
    if (hit && Date.now() - hit.loadedAt < this.ttlMs) return hit.prompt;
    const prompt = await loadPrompt(relPath, { promptsDir: this.opts.promptsDir });
    this.cache.set(relPath, { prompt, loadedAt: Date.now() });
    return prompt;
  }

  clear() {
    this.cache.clear();
  }
}
