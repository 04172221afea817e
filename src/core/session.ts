import fg from "fast-glob";
import fs from "fs-extra";
import path from "node:path";
import { emitEngineEvent, type EngineEvent } from "./events.js";
import { errorMessage } from "./errors.js";
import { logWarn } from "./logger.js";
import type { Session, StageName } from "./types.js";

export type StageArtifact<T = unknown> = {
  sessionId: string;
  stage: StageName;
  invocation: number;
  visit?: number;
  writtenAt: string;
  payload: T;
};

const REPEATABLE: ReadonlySet<StageName> = new Set([
  "retrieval",
  "execution",
  "validation",
]);

function pad(n: number, width: number) {
  return n.toString().padStart(width, "0");
}

/** `YYYYMMDD-HHMMSS-xxxxxx`: sortable by creation time, random tail. */
export function generateSessionId(now = new Date()): string {
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1, 2)}${pad(now.getDate(), 2)}` +
    `-${pad(now.getHours(), 2)}${pad(now.getMinutes(), 2)}${pad(now.getSeconds(), 2)}`;
  const suffix = Math.random().toString(36).slice(2, 8).padEnd(6, "0");
  return `${stamp}-${suffix}`;
}

/**
 * Owns the per-session directories. Every stage output lands here as one JSON
 * artifact; write failures are logged and never interrupt a run.
 */
export class SessionStore {
  private readonly invocations = new Map<string, number>();
  private readonly visits = new Map<string, number>();

  constructor(readonly rootDir: string) {}

  async createSession(id = generateSessionId()): Promise<Session> {
    const dir = path.join(this.rootDir, id);
    await fs.ensureDir(dir);
    return { id, createdAt: new Date().toISOString(), dir };
  }

  /**
   * Continues numbering after artifacts already on disk, so a second store
   * (or process) on the same session id appends instead of overwriting.
   */
  private async seedCounters(session: Session) {
    if (this.invocations.has(session.id)) return;
    const files = await fg(["[0-9]*-*.json"], { cwd: session.dir });
    let highest = 0;
    for (const f of files) {
      const m = /^(\d+)-([a-z]+)(?:-(\d+))?\.json$/.exec(f);
      if (!m?.[2]) continue;
      highest = Math.max(highest, Number(m[1]));
      if (m[3]) {
        const key = `${session.id}:${m[2]}`;
        this.visits.set(key, Math.max(this.visits.get(key) ?? 0, Number(m[3])));
      }
    }
    this.invocations.set(session.id, highest);
  }

  sessionDir(sessionId: string) {
    return path.join(this.rootDir, sessionId);
  }

  async writeStageOutput<T>(
    session: Session,
    stage: StageName,
    payload: T,
    onEvent?: (event: EngineEvent) => void,
  ): Promise<string | null> {
    let file: string;
    let invocation: number;
    try {
      await fs.ensureDir(session.dir);
      await this.seedCounters(session);
      invocation = (this.invocations.get(session.id) ?? 0) + 1;
      this.invocations.set(session.id, invocation);

      let visit: number | undefined;
      if (REPEATABLE.has(stage)) {
        const key = `${session.id}:${stage}`;
        visit = (this.visits.get(key) ?? 0) + 1;
        this.visits.set(key, visit);
      }

      const name = `${pad(invocation, 3)}-${stage}${visit ? `-${visit}` : ""}.json`;
      file = path.join(session.dir, name);
      const artifact: StageArtifact<T> = {
        sessionId: session.id,
        stage,
        invocation,
        visit,
        writtenAt: new Date().toISOString(),
        payload,
      };
      // wx: an existing artifact is never overwritten
      await fs.writeJson(file, artifact, { spaces: 2, flag: "wx" });
    } catch (err) {
      logWarn(
        `Could not persist ${stage} output for session ${session.id}:`,
        errorMessage(err),
      );
      return null;
    }

    emitEngineEvent(
      {
        type: "artifact-written",
        stage,
        file,
        data: { sessionId: session.id, invocation },
      },
      onEvent,
    );
    return file;
  }

  /** Artifacts of a session in invocation order. */
  async readStageOutputs(sessionId: string): Promise<StageArtifact[]> {
    const dir = this.sessionDir(sessionId);
    if (!(await fs.pathExists(dir))) return [];
    const files = await fg(["[0-9]*-*.json"], { cwd: dir });
    files.sort();
    const out: StageArtifact[] = [];
    for (const f of files) {
      const artifact: StageArtifact = await fs.readJson(path.join(dir, f));
      out.push(artifact);
    }
    return out;
  }
}
