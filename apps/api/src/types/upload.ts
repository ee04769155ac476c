// src/types/upload.ts

export type UploadState =
  | "PENDING"
  | "IN_PROGRESS"
  | "COMPLETE"
  | "FAILED"
  | "EXPIRED";

export const TERMINAL_STATES: ReadonlySet<UploadState> = new Set([
  "COMPLETE",
  "FAILED",
  "EXPIRED",
]);

/** Inclusive on both ends. */
export interface ByteRange {
  start: number;
  end: number;
}

export interface UploadSession {
  filename: string;
  owner: string;
  totalSize: number;
  receivedRanges: ByteRange[];
  state: UploadState;
  createdAt: number;
  lastActivityAt: number;
  completedAt?: number;
  error?: string;
}

export interface SessionSnapshot {
  filename: string;
  owner: string;
  state: UploadState;
  totalSize: number;
  bytesReceived: number;
  receivedRanges: ByteRange[];
  missingRanges: ByteRange[];
  nextExpectedByte: number;
  createdAt: number;
  lastActivityAt: number;
  completedAt?: number;
}

export interface CoverageDelta {
  bytesAdded: number;
  bytesReceived: number;
  complete: boolean;
  // True for exactly one record() per session.
  becameComplete: boolean;
}

export interface FinalizeResult {
  finalized: boolean;
  sizeBytes: number;
}
