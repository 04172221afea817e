import fs from "fs-extra";
import path from "node:path";

export type UsageEntry = {
  timestamp: string;
  sessionId: string;
  stage?: string;
  model: string;
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
  meta?: Record<string, unknown>;
};

type Bucket = { calls: number; input: number; output: number; total: number };

export type UsageSummary = {
  entries: number;
  totalInput: number;
  totalOutput: number;
  totalTokens: number;
  byModel: Record<string, Bucket>;
  byStage: Record<string, Bucket>;
};

const USAGE_FILE = "usage.jsonl";

export async function recordUsage(
  dir: string,
  entry: Omit<UsageEntry, "timestamp">,
) {
  const full: UsageEntry = { ...entry, timestamp: new Date().toISOString() };
  await fs.ensureDir(dir);
  await fs.appendFile(path.join(dir, USAGE_FILE), JSON.stringify(full) + "\n", "utf8");
}

export async function readUsageEntries(dir: string): Promise<UsageEntry[]> {
  const file = path.join(dir, USAGE_FILE);
  if (!(await fs.pathExists(file))) return [];
  const raw = await fs.readFile(file, "utf8");
  const out: UsageEntry[] = [];
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    try {
      out.push(JSON.parse(trimmed));
    } catch {
      continue;
    }
  }
  return out;
}

function add(bucket: Record<string, Bucket>, key: string, i: number, o: number, t: number) {
  const b = bucket[key] ?? { calls: 0, input: 0, output: 0, total: 0 };
  b.calls += 1;
  b.input += i;
  b.output += o;
  b.total += t;
  bucket[key] = b;
}

export async function summarizeUsage(dir: string): Promise<UsageSummary> {
  const entries = await readUsageEntries(dir);
  const summary: UsageSummary = {
    entries: entries.length,
    totalInput: 0,
    totalOutput: 0,
    totalTokens: 0,
    byModel: {},
    byStage: {},
  };

  for (const e of entries) {
    const inTok = e.inputTokens ?? 0;
    const outTok = e.outputTokens ?? 0;
    const totTok = e.totalTokens ?? inTok + outTok;
    summary.totalInput += inTok;
    summary.totalOutput += outTok;
    summary.totalTokens += totTok;
    add(summary.byModel, e.model || "unknown", inTok, outTok, totTok);
    add(summary.byStage, e.stage || "unknown", inTok, outTok, totTok);
  }

  return summary;
}
