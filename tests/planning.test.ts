import { afterAll, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "fs-extra";
import type { PlanStep } from "../src/core/types.js";
import { normalizeSteps, planningStage } from "../src/stages/planning.js";
import {
  ScriptedReasoningUnit,
  testContext,
  testServices,
  testSettings,
  testState,
  tmpDir,
} from "./helpers.js";

function step(ordinal: number, description: string): PlanStep {
  return { ordinal, action: "VERIFY", description, target: "", parameters: "", needsContext: false };
}

describe("normalizeSteps", () => {
  it("keeps strictly increasing ordinals as they are", () => {
    const steps = [step(1, "a"), step(3, "b"), step(7, "c")];
    expect(normalizeSteps(steps).map((s) => s.ordinal)).toEqual([1, 3, 7]);
  });

  it("drops repeated ordinals and renumbers out-of-order plans", () => {
    const out = normalizeSteps([step(2, "first two"), step(2, "second two"), step(1, "one")]);
    expect(out.map((s) => [s.ordinal, s.description])).toEqual([
      [1, "first two"],
      [2, "one"],
    ]);
  });
});

describe("planning stage", () => {
  let dir = "";

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    return () => vi.restoreAllMocks();
  });

  afterAll(async () => {
    if (dir) await fs.remove(dir);
  });

  async function plan(reply: unknown) {
    dir = await tmpDir("planning");
    const reasoning = new ScriptedReasoningUnit({ planning: [reply] });
    const services = testServices(dir, { reasoning });
    const state = await testState(services, "Users cannot log in, timeout after 30s");
    const delta = await planningStage(state, testContext(services, testSettings(dir)));
    return { delta, reasoning };
  }

  it("falls back to a single VERIFY step when the reply is not JSON", async () => {
    const { delta } = await plan("I would start by checking the logs.");
    expect(delta.plan?.fallback).toBe(true);
    expect(delta.plan?.confidence).toBe(0);
    expect(delta.plan?.steps).toEqual([
      {
        ordinal: 1,
        action: "VERIFY",
        description:
          "Verify the reported issue by hand (planning failed: No JSON object found in reasoning output)",
        target: "",
        parameters: "",
        needsContext: false,
      },
    ]);
  });

  it("falls back when the plan has no steps", async () => {
    const { delta } = await plan({ summary: "nothing", steps: [], confidence: 0.9 });
    expect(delta.plan?.steps).toHaveLength(1);
    expect(delta.plan?.steps[0]?.description).toBe(
      "Verify the reported issue by hand (planning failed: the plan had no steps)",
    );
  });

  it("reads a plan embedded in prose and normalises actions", async () => {
    const reply =
      'Here is the plan:\n{"summary":"fix login","steps":[{"ordinal":"1","action":" verify ","description":"check auth"}],"confidence":0.7}\nThanks';
    const { delta, reasoning } = await plan(reply);
    expect(delta.plan?.fallback).toBe(false);
    expect(delta.plan?.summary).toBe("fix login");
    expect(delta.plan?.complexity).toBe("unknown");
    expect(delta.plan?.steps).toEqual([
      { ordinal: 1, action: "VERIFY", description: "check auth", target: "", parameters: "", needsContext: false },
    ]);
    expect(reasoning.calls[0]?.input).toBe("Support ticket:\nUsers cannot log in, timeout after 30s");
    expect(reasoning.calls[0]?.prompt.name).toBe("planning.md");
  });

  it("persists the plan as a session artifact", async () => {
    dir = await tmpDir("planning");
    const services = testServices(dir);
    const state = await testState(services, "ticket");
    await planningStage(state, testContext(services, testSettings(dir)));
    const artifacts = await services.sessions.readStageOutputs(state.session.id);
    expect(artifacts.map((a) => a.stage)).toEqual(["planning"]);
  });
});
