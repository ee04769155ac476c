// src/state/memory.session.repository.ts

import type { UploadSession } from "../types/upload.js";
import type { SessionRepository } from "./session.repository.js";

const clone = (session: UploadSession): UploadSession => ({
  ...session,
  receivedRanges: session.receivedRanges.map((r) => ({ ...r })),
});

/**
 * Process-local session table for STATE_BACKEND=memory (local runs, tests).
 * Records are copied in and out so callers cannot mutate stored state.
 */
export class MemorySessionRepository implements SessionRepository {
  private readonly sessions = new Map<string, UploadSession>();

  async get(sessionId: string): Promise<UploadSession | null> {
    const session = this.sessions.get(sessionId);
    return session ? clone(session) : null;
  }

  async save(sessionId: string, session: UploadSession): Promise<void> {
    this.sessions.set(sessionId, clone(session));
  }

  async delete(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  async listByOwner(owner: string): Promise<UploadSession[]> {
    return [...this.sessions.values()].filter((s) => s.owner === owner).map(clone);
  }

  async listAll(): Promise<UploadSession[]> {
    return [...this.sessions.values()].map(clone);
  }

  async ping(): Promise<void> {}
}
