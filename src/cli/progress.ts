import chalk from "chalk";
import path from "node:path";
import type { EngineEvent } from "../core/events.js";

export type ProgressMode = "live" | "none";

type TaskStatus = "running" | "ok" | "fail" | "fallback";

type Task = {
  label: string;
  status: TaskStatus;
  detail?: string;
  startedAt: number;
  endedAt?: number;
  tokens: number;
  artifact?: string;
};

const icons: Record<TaskStatus, string> = {
  running: "⏳",
  ok: "✅",
  fail: "❌",
  fallback: "⚠️ ",
};

function fmtMs(ms: number) {
  const s = Math.max(0, Math.round(ms / 1000));
  const m = Math.floor(s / 60);
  const sec = s % 60;
  if (m > 0) return `${m}m${sec.toString().padStart(2, "0")}s`;
  return `${s}s`;
}

/** Prints one line per finished stage visit, driven by engine events. */
export class ProgressReporter {
  private totalTokens = 0;
  private current: Task | null = null;
  private visits = 0;

  constructor(private readonly mode: ProgressMode) {}

  get tokens() {
    return this.totalTokens;
  }

  private printLine(task: Task) {
    if (this.mode === "none") return;
    const statusColor =
      task.status === "ok"
        ? chalk.greenBright
        : task.status === "fail"
          ? chalk.redBright
          : task.status === "fallback"
            ? chalk.yellowBright
            : chalk.cyanBright;
    const parts = [
      statusColor(`${icons[task.status]} ${task.label}`),
      task.endedAt ? chalk.dim(fmtMs(task.endedAt - task.startedAt)) : "",
      task.artifact ? chalk.blue(task.artifact) : "",
      task.tokens ? chalk.green(`tokens:${task.tokens}`) : "",
      task.detail ? chalk.yellow(task.detail) : "",
    ].filter(Boolean);
    console.log(parts.join("  "));
  }

  log(event: EngineEvent) {
    if (this.mode === "none") return;

    switch (event.type) {
      case "stage-start":
        this.visits++;
        this.current = {
          label: `${this.visits}. ${event.stage ?? "stage"}`,
          status: "running",
          startedAt: Date.now(),
          tokens: 0,
        };
        return;
      case "llm-call": {
        const total = Number(event.data?.totalTokens ?? 0);
        if (Number.isNaN(total)) return;
        this.totalTokens += total;
        if (this.current) this.current.tokens += total;
        return;
      }
      case "fallback":
        if (this.current) {
          this.current.status = "fallback";
          this.current.detail = String(event.data?.reason ?? "fallback");
        }
        return;
      case "dispatch":
        if (this.current) {
          this.current.detail = `→ ${event.stage ?? "?"}`;
        }
        return;
      case "artifact-written":
        if (this.current && event.file) this.current.artifact = path.basename(event.file);
        return;
      case "stage-end":
        if (!this.current) return;
        this.current.endedAt = Date.now();
        if (event.success === false) this.current.status = "fail";
        else if (this.current.status === "running") this.current.status = "ok";
        this.printLine(this.current);
        this.current = null;
        return;
      case "run-end":
        if (this.current && event.success === false) {
          this.current.status = "fail";
          this.current.endedAt = Date.now();
          this.printLine(this.current);
          this.current = null;
        }
        return;
      default:
        return;
    }
  }
}

export function progressModeFromOpts(opts: { quiet?: boolean }): ProgressMode {
  return opts.quiet ? "none" : "live";
}
