import fs from "fs-extra";
import path from "node:path";
import { DATA_FILES } from "./context.js";
import { loadPrompt } from "./promptLoader.js";
import type { ResolverSettings } from "./settings.js";

type CheckResult = { name: string; pass: boolean; info?: string };

export const REQUIRED_PROMPTS = [
  "intake.md",
  "refinement.md",
  "planning.md",
  "execution.md",
  "validation.md",
  "report.md",
] as const;

function pad(name: string, width: number) {
  return (name + " ".repeat(width)).slice(0, width);
}

function ok(pass: boolean) {
  return pass ? "✓" : "✗";
}

export async function collectEnvironmentChecks(
  settings: ResolverSettings,
): Promise<CheckResult[]> {
  const results: CheckResult[] = [];
  const add = (name: string, pass: boolean, info?: string) => results.push({ name, pass, info });

  const [maj = 0] = process.versions.node.split(".").map(Number);
  add("Node >= 20", maj >= 20, process.versions.node);

  const hasOpenAI = !!(process.env.OPENAI_API_KEY || process.env.OPENAI_KEY);
  add("OPENAI_API_KEY/OPENAI_KEY present", hasOpenAI);
  add("Model", true, settings.model);

  const history = path.join(settings.dataDir, DATA_FILES.historicalTickets);
  add("historical tickets", await fs.pathExists(history), history);
  const schemas = path.join(settings.dataDir, DATA_FILES.tableSchemas);
  add("table schemas", await fs.pathExists(schemas), schemas);
  const tables = path.join(settings.dataDir, DATA_FILES.tablesDir);
  add("tables directory", await fs.pathExists(tables), tables);

  for (const name of REQUIRED_PROMPTS) {
    try {
      const prompt = await loadPrompt(name, { promptsDir: settings.promptsDir });
      add(`prompt ${name}`, true, prompt.source);
    } catch (err) {
      add(`prompt ${name}`, false, err instanceof Error ? err.message : String(err));
    }
  }

  try {
    await fs.ensureDir(settings.sessionsDir);
    await fs.access(settings.sessionsDir, fs.constants.W_OK);
    add("sessions directory writable", true, settings.sessionsDir);
  } catch {
    add("sessions directory writable", false, settings.sessionsDir);
  }
  return results;
}

export async function checkEnvironment(
  settings: ResolverSettings,
  log: Console = console,
) {
  const results = await collectEnvironmentChecks(settings);
  const width = 36;
  log.info("Environment check:");
  for (const r of results) {
    log.info(`  ${ok(r.pass)} ${pad(`${r.name}:`, width)}${r.info ?? ""}`);
  }
  const allPass = results.every((r) => r.pass);
  if (!allPass) {
    log.warn("Some requirements not met. Runs may fail or fall back.");
  }
  return allPass;
}
