import OpenAI from "openai";
import { errorMessage } from "./errors.js";
import { emitEngineEvent, type EngineEventListener } from "./events.js";
import { logDebug, logWarn } from "./logger.js";
import type { LoadedPrompt } from "./promptLoader.js";
import { recordUsage } from "./usage.js";
import type { StageName } from "./types.js";

export type ReasoningRequest = {
  stage: StageName;
  prompt: LoadedPrompt;
  input: string;
  sessionId: string;
  /** Directory for usage.jsonl; usually the session directory. */
  usageDir?: string;
  signal?: AbortSignal;
  onEvent?: EngineEventListener;
};

export type ReasoningResponse = {
  rawText: string;
  structured?: unknown;
};

/**
 * The one call every LLM-backed stage makes. Implementations may return an
 * already-parsed payload; callers still accept a bare `rawText`.
 */
export interface ReasoningUnit {
  invoke(request: ReasoningRequest): Promise<ReasoningResponse>;
}

export function ensureOpenAIKey() {
  if (!process.env.OPENAI_API_KEY && process.env.OPENAI_KEY) {
    process.env.OPENAI_API_KEY = process.env.OPENAI_KEY;
  }
  if (!process.env.OPENAI_API_KEY) {
    throw new Error("Missing OPENAI_API_KEY (alias: OPENAI_KEY)");
  }
}

export type OpenAIReasoningOpts = {
  model: string;
  modelForStage?: (stage: StageName) => string;
  temperature?: number;
  maxOutputTokens?: number;
  debug?: boolean;
  client?: OpenAI;
};

const OUTPUT_TOKEN_CAP = 10_000;

export class OpenAIReasoningUnit implements ReasoningUnit {
  private client: OpenAI | null;

  constructor(private readonly opts: OpenAIReasoningOpts) {
    this.client = opts.client ?? null;
  }

  private getClient() {
    if (!this.client) {
      ensureOpenAIKey();
      this.client = new OpenAI({ apiKey: process.env.OPENAI_API_KEY });
    }
    return this.client;
  }

  async invoke(request: ReasoningRequest): Promise<ReasoningResponse> {
    const { prompt, stage } = request;
    const model =
      prompt.config.model ?? this.opts.modelForStage?.(stage) ?? this.opts.model;
    const maxOutputTokens = Math.min(
      prompt.config.maxOutputTokens ?? this.opts.maxOutputTokens ?? 4000,
      OUTPUT_TOKEN_CAP,
    );

    logDebug(!!this.opts.debug, `LLM call stage=${stage} model=${model}`);

    const res = await this.getClient().responses.create(
      {
        model,
        instructions: prompt.text,
        input: request.input,
        temperature: prompt.config.temperature ?? this.opts.temperature ?? 0.1,
        max_output_tokens: maxOutputTokens,
        text: { format: { type: "json_object" } },
      },
      { signal: request.signal },
    );

    const inputTokens = res.usage?.input_tokens;
    const outputTokens = res.usage?.output_tokens;
    const totalTokens = res.usage?.total_tokens;

    if (request.usageDir) {
      try {
        await recordUsage(request.usageDir, {
          sessionId: request.sessionId,
          model,
          stage,
          inputTokens,
          outputTokens,
          totalTokens,
        });
      } catch (err) {
        logWarn("Usage recording failed:", errorMessage(err));
      }
    }

    emitEngineEvent(
      {
        type: "llm-call",
        sessionId: request.sessionId,
        model,
        stage,
        agent: prompt.name,
        data: { inputTokens, outputTokens, totalTokens },
      },
      request.onEvent,
    );

    const rawText = res.output_text ?? "";
    let structured: unknown;
    try {
      structured = rawText ? JSON.parse(rawText) : undefined;
    } catch {
      // left to the stage's text scan
      structured = undefined;
    }
    return { rawText, structured };
  }
}
