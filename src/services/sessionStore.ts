import { DuplicateSessionError, InvalidStageNameError, UnknownSessionError } from "../errors";
import { type Artifact, type Session, type StageName, stageNames } from "../types";

export interface SessionStoreLike {
  startSession(sessionId: string, title: string, qaContext: string): Session;
  saveStageOutput(sessionId: string, stageName: string, data: Artifact): void;
  getSession(sessionId: string): Session | undefined;
  listSessions(): string[];
}

const createEmptyStages = (): Record<StageName, Artifact | null> => ({
  planner_output: null,
  testcase_output: null,
  automation_output: null,
  global_validation_output: null
});

const isStageName = (value: string): value is StageName => stageNames.some((name) => name === value);

const snapshot = (session: Session): Session => ({
  id: session.id,
  metadata: { ...session.metadata },
  stages: structuredClone(session.stages)
});

// Not synchronized: keep a single writer per session id.
export class SessionStore implements SessionStoreLike {
  private readonly sessions = new Map<string, Session>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  startSession(sessionId: string, title: string, qaContext: string): Session {
    if (this.sessions.has(sessionId)) {
      throw new DuplicateSessionError(sessionId);
    }

    const session: Session = {
      id: sessionId,
      metadata: {
        title,
        qa_context: qaContext,
        created_at: this.now().toISOString()
      },
      stages: createEmptyStages()
    };
    this.sessions.set(sessionId, session);
    return snapshot(session);
  }

  saveStageOutput(sessionId: string, stageName: string, data: Artifact): void {
    const current = this.sessions.get(sessionId);
    if (!current) {
      throw new UnknownSessionError(sessionId);
    }
    if (!isStageName(stageName)) {
      throw new InvalidStageNameError(stageName, stageNames);
    }

    current.stages[stageName] = structuredClone(data);
  }

  getSession(sessionId: string): Session | undefined {
    const current = this.sessions.get(sessionId);
    return current ? snapshot(current) : undefined;
  }

  listSessions(): string[] {
    return [...this.sessions.keys()];
  }
}
