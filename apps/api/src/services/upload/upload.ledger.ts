// src/services/upload/upload.ledger.ts

import {
  TERMINAL_STATES,
  type ByteRange,
  type CoverageDelta,
  type SessionSnapshot,
  type UploadSession,
  type UploadState,
} from "../../types/upload.js";
import type { SessionRepository } from "../../state/session.repository.js";
import { sessionIdOf } from "../../state/keys.js";
import { UploadError } from "../../utils/uploadError.js";
import { KeyedLock } from "./upload.lock.js";
import {
  coveredBytes,
  isFullyCovered,
  isValidRange,
  mergeRange,
  missingRanges,
  nextExpectedByte,
} from "./upload.ranges.js";

type TerminalState = "COMPLETE" | "FAILED" | "EXPIRED";

export function toSnapshot(session: UploadSession): SessionSnapshot {
  return {
    filename: session.filename,
    owner: session.owner,
    state: session.state,
    totalSize: session.totalSize,
    bytesReceived: coveredBytes(session.receivedRanges),
    receivedRanges: session.receivedRanges.map((r) => ({ ...r })),
    missingRanges: missingRanges(session.receivedRanges, session.totalSize),
    nextExpectedByte: nextExpectedByte(session.receivedRanges, session.totalSize),
    createdAt: session.createdAt,
    lastActivityAt: session.lastActivityAt,
    ...(session.completedAt !== undefined && { completedAt: session.completedAt }),
  };
}

export const isTerminal = (state: UploadState) => TERMINAL_STATES.has(state);

/**
 * Per-session record of received byte ranges and lifecycle state.
 *
 * Every mutation runs under a lock keyed by (owner, filename), so two
 * writers on the same session never lose each other's update, and writers
 * on different sessions never wait on each other. Reads are plain
 * snapshots and take no lock.
 */
export class ProgressLedger {
  private readonly locks: KeyedLock;
  private readonly now: () => number;

  constructor(
    private readonly repo: SessionRepository,
    options: { locks?: KeyedLock; now?: () => number } = {}
  ) {
    this.locks = options.locks ?? new KeyedLock();
    this.now = options.now ?? Date.now;
  }

  async open(filename: string, owner: string, totalSize: number): Promise<SessionSnapshot> {
    if (!Number.isSafeInteger(totalSize) || totalSize <= 0) {
      throw new UploadError("OUT_OF_BOUNDS", "Total size must be a positive integer");
    }

    return this.mutate(filename, owner, async (sessionId) => {
      const existing = await this.repo.get(sessionId);

      if (existing && !isTerminal(existing.state)) {
        if (existing.totalSize !== totalSize) {
          throw new UploadError(
            "SIZE_CONFLICT",
            `Upload already open with total size ${existing.totalSize}`
          );
        }
        return toSnapshot(existing);
      }

      if (existing?.state === "COMPLETE") {
        throw new UploadError("UPLOAD_CLOSED", "File is already complete; delete it first");
      }

      // No session, or a FAILED/EXPIRED one: start fresh.
      const now = this.now();
      const session: UploadSession = {
        filename,
        owner,
        totalSize,
        receivedRanges: [],
        state: "PENDING",
        createdAt: now,
        lastActivityAt: now,
      };

      await this.repo.save(sessionId, session);
      return toSnapshot(session);
    });
  }

  async record(filename: string, owner: string, range: ByteRange): Promise<CoverageDelta> {
    return this.mutate(filename, owner, async (sessionId) => {
      const session = await this.requireOpen(sessionId);

      if (!isValidRange(range) || range.end > session.totalSize - 1) {
        throw new UploadError(
          "OUT_OF_BOUNDS",
          `Range ${range.start}-${range.end} is outside 0-${session.totalSize - 1}`
        );
      }

      const wasComplete = isFullyCovered(session.receivedRanges, session.totalSize);
      const before = coveredBytes(session.receivedRanges);

      session.receivedRanges = mergeRange(session.receivedRanges, range);
      session.lastActivityAt = this.now();
      if (session.state === "PENDING") session.state = "IN_PROGRESS";

      await this.repo.save(sessionId, session);

      const after = coveredBytes(session.receivedRanges);
      const complete = isFullyCovered(session.receivedRanges, session.totalSize);

      return {
        bytesAdded: after - before,
        bytesReceived: after,
        complete,
        becameComplete: complete && !wasComplete,
      };
    });
  }

  async touch(filename: string, owner: string): Promise<void> {
    await this.mutate(filename, owner, async (sessionId) => {
      const session = await this.requireOpen(sessionId);
      session.lastActivityAt = this.now();
      await this.repo.save(sessionId, session);
    });
  }

  async status(filename: string, owner: string): Promise<SessionSnapshot> {
    const session = await this.repo.get(sessionIdOf(owner, filename));
    if (!session) {
      throw new UploadError("UPLOAD_NOT_FOUND", `No upload named ${filename}`);
    }
    return toSnapshot(session);
  }

  async find(filename: string, owner: string): Promise<SessionSnapshot | null> {
    const session = await this.repo.get(sessionIdOf(owner, filename));
    return session ? toSnapshot(session) : null;
  }

  async list(owner: string): Promise<SessionSnapshot[]> {
    const sessions = await this.repo.listByOwner(owner);
    return sessions
      .map(toSnapshot)
      .sort((a, b) => (a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0));
  }

  async scan(): Promise<SessionSnapshot[]> {
    const sessions = await this.repo.listAll();
    return sessions.map(toSnapshot);
  }

  async markComplete(filename: string, owner: string): Promise<SessionSnapshot> {
    return this.transition(filename, owner, "COMPLETE", (session) => {
      if (!isFullyCovered(session.receivedRanges, session.totalSize)) {
        throw new UploadError("INVALID_TRANSITION", "Cannot complete an upload with missing ranges");
      }
      session.completedAt = this.now();
    });
  }

  async markFailed(filename: string, owner: string, reason: string): Promise<SessionSnapshot> {
    return this.transition(filename, owner, "FAILED", (session) => {
      session.error = reason;
    });
  }

  async markExpired(filename: string, owner: string): Promise<SessionSnapshot> {
    return this.transition(filename, owner, "EXPIRED");
  }

  async remove(filename: string, owner: string): Promise<boolean> {
    return this.mutate(filename, owner, async (sessionId) => {
      const existing = await this.repo.get(sessionId);
      if (!existing) return false;
      await this.repo.delete(sessionId, owner);
      return true;
    });
  }

  private async transition(
    filename: string,
    owner: string,
    target: TerminalState,
    apply?: (session: UploadSession) => void
  ): Promise<SessionSnapshot> {
    return this.mutate(filename, owner, async (sessionId) => {
      const session = await this.repo.get(sessionId);
      if (!session) {
        throw new UploadError("UPLOAD_NOT_FOUND", `No upload named ${filename}`);
      }

      if (session.state === target) {
        return toSnapshot(session);
      }

      if (isTerminal(session.state)) {
        throw new UploadError(
          "INVALID_TRANSITION",
          `Upload is ${session.state}, cannot move to ${target}`
        );
      }

      apply?.(session);
      session.state = target;
      session.lastActivityAt = this.now();

      await this.repo.save(sessionId, session);
      return toSnapshot(session);
    });
  }

  private async requireOpen(sessionId: string): Promise<UploadSession> {
    const session = await this.repo.get(sessionId);
    if (!session) {
      throw new UploadError("UPLOAD_NOT_FOUND", "Upload session not found");
    }
    if (isTerminal(session.state)) {
      throw new UploadError("UPLOAD_CLOSED", `Upload is ${session.state}`);
    }
    return session;
  }

  private mutate<T>(
    filename: string,
    owner: string,
    fn: (sessionId: string) => Promise<T>
  ): Promise<T> {
    const sessionId = sessionIdOf(owner, filename);
    return this.locks.run(sessionId, () => fn(sessionId));
  }
}
