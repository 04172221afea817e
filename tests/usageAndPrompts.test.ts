import { afterAll, describe, expect, it } from "vitest";
import fs from "fs-extra";
import path from "node:path";
import { loadPrompt, parsePromptFile, PromptLoader } from "../src/core/promptLoader.js";
import { readUsageEntries, recordUsage, summarizeUsage } from "../src/core/usage.js";
import { tmpDir } from "./helpers.js";

describe("usage tracking", () => {
  let dir = "";

  afterAll(async () => {
    if (dir) await fs.remove(dir);
  });

  it("aggregates usage by model and stage", async () => {
    dir = await tmpDir("usage");
    await recordUsage(dir, { sessionId: "s1", model: "gpt-4.1-mini", stage: "intake", inputTokens: 10, outputTokens: 5 });
    await recordUsage(dir, {
      sessionId: "s1",
      model: "gpt-4.1-mini",
      stage: "planning",
      inputTokens: 20,
      outputTokens: 10,
      totalTokens: 31,
    });
    await recordUsage(dir, { sessionId: "s1", model: "gpt-4.1", stage: "planning" });

    const summary = await summarizeUsage(dir);
    expect(summary.entries).toBe(3);
    expect(summary.totalInput).toBe(30);
    expect(summary.totalOutput).toBe(15);
    expect(summary.totalTokens).toBe(46);
    expect(summary.byModel["gpt-4.1-mini"]).toEqual({ calls: 2, input: 30, output: 15, total: 46 });
    expect(summary.byStage.planning).toEqual({ calls: 2, input: 20, output: 10, total: 31 });
  });

  it("skips unreadable lines and missing files", async () => {
    dir = await tmpDir("usage");
    await fs.writeFile(
      path.join(dir, "usage.jsonl"),
      '{"sessionId":"s1","model":"m","timestamp":"t"}\nnot json\n\n',
      "utf8",
    );
    expect(await readUsageEntries(dir)).toHaveLength(1);
    expect((await summarizeUsage(path.join(dir, "missing"))).entries).toBe(0);
  });
});

describe("prompt loading", () => {
  let dir = "";

  afterAll(async () => {
    if (dir) await fs.remove(dir);
  });

  it("splits front-matter from the prompt body", () => {
    const prompt = parsePromptFile(
      "intake",
      "---\ntemperature: 0.2\nmaxOutputTokens: 12.5\nmodel: gpt-4.1\nunknown: x\n---\nBody text\n",
      "mem",
    );
    expect(prompt).toEqual({
      name: "intake",
      text: "Body text",
      config: { temperature: 0.2, model: "gpt-4.1" },
      source: "mem",
    });
  });

  it("keeps prompts without front-matter whole", () => {
    expect(parsePromptFile("x", "  Just text  ", "mem").text).toBe("Just text");
  });

  it("prefers the configured prompts directory", async () => {
    dir = await tmpDir("prompts");
    await fs.writeFile(path.join(dir, "intake.md"), "---\ntemperature: 0.5\n---\nLocal intake", "utf8");
    const prompt = await loadPrompt("intake.md", { promptsDir: dir });
    expect(prompt.name).toBe("intake");
    expect(prompt.text).toBe("Local intake");
    expect(prompt.config.temperature).toBe(0.5);
    expect(prompt.source).toBe(path.join(dir, "intake.md"));
  });

  it("caches per loader until the entry expires", async () => {
    dir = await tmpDir("prompts");
    const file = path.join(dir, "report.md");
    await fs.writeFile(file, "First", "utf8");
    const cached = new PromptLoader({ promptsDir: dir });
    const uncached = new PromptLoader({ promptsDir: dir, ttlMs: 0 });
    expect((await cached.load("report.md")).text).toBe("First");
    expect((await uncached.load("report.md")).text).toBe("First");

    await fs.writeFile(file, "Second", "utf8");
    expect((await cached.load("report.md")).text).toBe("First");
    expect((await uncached.load("report.md")).text).toBe("Second");
    expect((await new PromptLoader({ promptsDir: dir }).load("report.md")).text).toBe("Second");

    cached.clear();
    expect((await cached.load("report.md")).text).toBe("Second");
  });

  it("ships a prompt for every reasoning stage", async () => {
    for (const name of ["intake", "refinement", "planning", "execution", "validation", "report"]) {
      const prompt = await loadPrompt(`${name}.md`);
      expect(prompt.text.length).toBeGreaterThan(0);
    }
  });

  it("names the prompt it cannot find", async () => {
    await expect(loadPrompt("nope.md", { promptsDir: path.join(process.cwd(), ".tmp-none") })).rejects.toThrow(
      "Prompt not found: nope.md",
    );
  });
});
