export type EngineEventType =
  | "run-start"
  | "run-end"
  | "stage-start"
  | "stage-end"
  | "dispatch"
  | "fallback"
  | "llm-call"
  | "artifact-written";

export type EngineEvent = {
  type: EngineEventType;
  timestamp: string;
  sessionId?: string;
  stage?: string;
  agent?: string;
  file?: string;
  model?: string;
  success?: boolean;
  data?: Record<string, unknown>;
};

export type EngineEventListener = (event: EngineEvent) => void;

let globalListener: EngineEventListener | null = null;

export function setEngineEventListener(listener: EngineEventListener | null) {
  globalListener = listener;
}

export function emitEngineEvent(
  event: Omit<EngineEvent, "timestamp">,
  local?: EngineEventListener,
) {
  const enriched: EngineEvent = {
    ...event,
    timestamp: new Date().toISOString(),
  };
  if (local) {
    try {
      local(enriched);
    } catch {
      // listener errors never reach the engine
    }
  }
  if (globalListener) {
    try {
      globalListener(enriched);
    } catch {
      // same for the global listener
    }
  }
}
