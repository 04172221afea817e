import { afterEach, describe, expect, it, vi } from "vitest";
import type { EngineEvent } from "../src/core/events.js";
import { ProgressReporter, progressModeFromOpts } from "../src/cli/progress.js";

function ev(type: EngineEvent["type"], extra: Partial<EngineEvent> = {}): EngineEvent {
  return { type, timestamp: new Date().toISOString(), ...extra };
}

describe("ProgressReporter", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints one line per stage visit with its tokens and fallback", () => {
    const lines: string[] = [];
    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      lines.push(args.map(String).join(" "));
    });
    const reporter = new ProgressReporter("live");

    reporter.log(ev("stage-start", { stage: "intake" }));
    reporter.log(ev("llm-call", { data: { totalTokens: 150 } }));
    reporter.log(ev("artifact-written", { file: "/tmp/s/002-intake.json" }));
    reporter.log(ev("stage-end", { stage: "intake", success: true }));
    reporter.log(ev("stage-start", { stage: "planning" }));
    reporter.log(ev("llm-call", { data: { totalTokens: 40 } }));
    reporter.log(ev("fallback", { data: { reason: "No JSON object found in reasoning output" } }));
    reporter.log(ev("stage-end", { stage: "planning", success: true }));

    expect(reporter.tokens).toBe(190);
    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain("1. intake");
    expect(lines[0]).toContain("002-intake.json");
    expect(lines[0]).toContain("tokens:150");
    expect(lines[1]).toContain("2. planning");
    expect(lines[1]).toContain("No JSON object found in reasoning output");
  });

  it("prints the open stage when the run fails", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const reporter = new ProgressReporter("live");
    reporter.log(ev("stage-start", { stage: "execution" }));
    reporter.log(ev("run-end", { success: false }));
    expect(log).toHaveBeenCalledTimes(1);
  });

  it("stays silent in quiet mode", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const reporter = new ProgressReporter(progressModeFromOpts({ quiet: true }));
    reporter.log(ev("stage-start", { stage: "intake" }));
    reporter.log(ev("stage-end", { stage: "intake", success: true }));
    expect(log).not.toHaveBeenCalled();
    expect(progressModeFromOpts({})).toBe("live");
  });
});
