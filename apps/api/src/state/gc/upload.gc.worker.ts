// src/state/gc/upload.gc.worker.ts

import type { ProgressLedger } from "../../services/upload/upload.ledger.js";
import type { ChunkStore } from "../../store/chunk.store.js";
import type { EngineLogger } from "../../utils/logger.js";
import type { UploadState } from "../../types/upload.js";
import { isUploadError } from "../../utils/uploadError.js";

/**
 * Only these states are GC-eligible.
 * Everything else is protected.
 */
const GC_ELIGIBLE_STATES: ReadonlySet<UploadState> = new Set(["PENDING", "IN_PROGRESS"]);

export interface SweepDeps {
  ledger: ProgressLedger;
  chunkStore: ChunkStore;
  staleAfterMs: number;
  log: EngineLogger;
}

export interface SweepFailure {
  filename: string;
  owner: string;
  error: string;
}

export interface SweepReport {
  scanned: number;
  expired: Array<{ filename: string; owner: string }>;
  failures: SweepFailure[];
}

export async function runUploadGc(deps: SweepDeps, now = Date.now()): Promise<SweepReport> {
  const { ledger, chunkStore, staleAfterMs, log } = deps;

  const sessions = await ledger.scan();
  const report: SweepReport = { scanned: sessions.length, expired: [], failures: [] };

  for (const session of sessions) {
    if (!GC_ELIGIBLE_STATES.has(session.state)) continue;
    if (now - session.lastActivityAt <= staleAfterMs) continue;

    const { filename, owner } = session;

    try {
      await ledger.markExpired(filename, owner);
    } catch (err) {
      // Completed (or failed) between the scan and now: not ours to touch.
      if (isUploadError(err, "INVALID_TRANSITION")) continue;

      log.error({ err, filename, owner }, "GC failed to expire upload");
      report.failures.push({ filename, owner, error: describe(err) });
      continue;
    }

    try {
      await chunkStore.purge(filename, owner);
      report.expired.push({ filename, owner });
      log.warn(
        { filename, owner, idleMs: now - session.lastActivityAt },
        "GC expired stale upload"
      );
    } catch (err) {
      log.error({ err, filename, owner }, "GC failed to purge expired upload");
      report.failures.push({ filename, owner, error: describe(err) });
    }

    /**
     * Yield to event loop to avoid starvation
     * when GC backlog is large.
     */
    await new Promise((r) => setImmediate(r));
  }

  return report;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
