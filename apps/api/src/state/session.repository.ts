// src/state/session.repository.ts

import type { UploadSession } from "../types/upload.js";

/**
 * Persistence seam for upload sessions. `save` must make the whole record
 * visible at once; a reader never sees a new `receivedRanges` next to an
 * old `state`.
 */
export interface SessionRepository {
  get(sessionId: string): Promise<UploadSession | null>;

  save(sessionId: string, session: UploadSession): Promise<void>;

  delete(sessionId: string, owner: string): Promise<void>;

  listByOwner(owner: string): Promise<UploadSession[]>;

  listAll(): Promise<UploadSession[]>;

  ping(): Promise<void>;
}
