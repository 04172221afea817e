import chalk from "chalk";
import fs from "fs-extra";
import ora from "ora";
import path from "node:path";
import { createDefaultServices } from "../core/context.js";
import { checkEnvironment } from "../core/env.js";
import { BudgetExceededError, errorMessage } from "../core/errors.js";
import type { EngineEvent } from "../core/events.js";
import { logError, logInfo, setQuiet } from "../core/logger.js";
import { runResolver, type RunResult } from "../core/orchestrator.js";
import { SessionStore } from "../core/session.js";
import { loadSettings, type ResolverSettings } from "../core/settings.js";
import { ProgressReporter, progressModeFromOpts } from "./progress.js";
import { printUsageReport } from "./usage.js";

export type CliOpts = {
  model?: string;
  sessionsDir?: string;
  dataDir?: string;
  promptsDir?: string;
  maxIterations?: string;
  deadline?: string;
  debug?: boolean;
  quiet?: boolean;
};

export const EXIT_CODES = {
  completed: 0,
  failed: 1,
  blocked: 2,
  budgetExceeded: 3,
} as const;

export const SAMPLE_TICKET_FILE = "sample-ticket.txt";

function intOpt(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`--${name} expects a positive integer, got "${raw}"`);
  }
  return n;
}

export function settingsFromOpts(opts: CliOpts): ResolverSettings {
  return loadSettings({
    model: opts.model,
    sessionsDir: opts.sessionsDir ? path.resolve(opts.sessionsDir) : undefined,
    dataDir: opts.dataDir ? path.resolve(opts.dataDir) : undefined,
    promptsDir: opts.promptsDir ? path.resolve(opts.promptsDir) : undefined,
    maxIterations: intOpt("max-iterations", opts.maxIterations),
    deadlineMs: intOpt("deadline", opts.deadline),
    debug: opts.debug || undefined,
  });
}

async function ticketText(words: string[], settings: ResolverSettings) {
  const joined = words.join(" ").trim();
  if (joined) return joined;
  const sample = path.join(settings.dataDir, SAMPLE_TICKET_FILE);
  const text = (await fs.readFile(sample, "utf8")).trim();
  logInfo(`No ticket given; using the sample in ${sample}`);
  return text;
}

function printResult(result: RunResult) {
  const { state } = result;
  if (result.status === "blocked") {
    const categories = state.guardrail?.categories.join(", ") ?? "";
    console.log(chalk.redBright(`Blocked: personal data detected (${categories})`));
    console.log(chalk.dim(`Session ${result.session.id}`));
    return;
  }
  const report = state.report;
  if (!report) return;
  const color =
    report.resolutionStatus === "RESOLVED"
      ? chalk.greenBright
      : report.resolutionStatus === "PARTIALLY_RESOLVED"
        ? chalk.yellowBright
        : chalk.redBright;
  console.log(color(report.resolutionStatus), chalk.dim(`session ${result.session.id}`));
  console.log(report.summary);
  for (const step of report.stepsTaken) {
    const mark = step.status === "ok" ? chalk.green("✓") : chalk.red("✗");
    console.log(`  ${mark} ${step.ordinal}. [${step.stage}] ${step.description} ${chalk.dim(step.detail)}`);
  }
  if (report.followUps.length) {
    console.log("Follow-ups:");
    for (const f of report.followUps) console.log(`  - ${f}`);
  }
}

/** Runs one ticket; resolves to the process exit code. */
export async function runTicket(words: string[], opts: CliOpts): Promise<number> {
  setQuiet(!!opts.quiet);
  const settings = settingsFromOpts(opts);
  const ticket = await ticketText(words, settings);
  const services = await createDefaultServices(settings);

  const reporter = new ProgressReporter(progressModeFromOpts(opts));
  const spinner = opts.quiet ? null : ora("resolver run").start();
  const startedAt = Date.now();
  const onEvent = (ev: EngineEvent) => {
    spinner?.stop();
    reporter.log(ev);
    if (!spinner) return;
    const elapsedSec = Math.round((Date.now() - startedAt) / 1000);
    const label = ev.type === "stage-start" ? (ev.stage ?? "") : "working";
    spinner.start(`resolver run: stage=${label} time=${elapsedSec}s tokens=${reporter.tokens}`);
  };

  try {
    const result = await runResolver(services, settings, { ticket, onEvent });
    spinner?.succeed(`done (${result.status})`);
    printResult(result);
    return result.status === "blocked" ? EXIT_CODES.blocked : EXIT_CODES.completed;
  } catch (err) {
    spinner?.fail(errorMessage(err));
    if (err instanceof BudgetExceededError) {
      logError(`${err.message} (session ${err.state.session.id})`);
      return EXIT_CODES.budgetExceeded;
    }
    logError(errorMessage(err));
    return EXIT_CODES.failed;
  }
}

export async function showSession(sessionId: string, opts: CliOpts) {
  const settings = settingsFromOpts(opts);
  const store = new SessionStore(settings.sessionsDir);
  const artifacts = await store.readStageOutputs(sessionId);
  if (!artifacts.length) {
    console.log(`No artifacts for session ${sessionId} under ${settings.sessionsDir}`);
    return;
  }
  for (const a of artifacts) {
    const visit = a.visit ? ` #${a.visit}` : "";
    console.log(chalk.cyanBright(`${String(a.invocation).padStart(3, "0")} ${a.stage}${visit}`), chalk.dim(a.writtenAt));
    console.log(JSON.stringify(a.payload, null, 2));
  }
}

export async function runUsage(sessionId: string, opts: CliOpts) {
  const settings = settingsFromOpts(opts);
  const store = new SessionStore(settings.sessionsDir);
  await printUsageReport(store.sessionDir(sessionId));
}

export async function runDoctor(opts: CliOpts) {
  const settings = settingsFromOpts(opts);
  const spinner = ora("resolver doctor").start();
  try {
    spinner.stop();
    const pass = await checkEnvironment(settings, console);
    if (pass) spinner.succeed("checked");
    else spinner.warn("checked with warnings");
  } catch (e) {
    spinner.fail(String(e));
    throw e;
  }
}

