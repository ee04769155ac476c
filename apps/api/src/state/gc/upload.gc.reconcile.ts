// src/state/gc/upload.gc.reconcile.ts

import type { ProgressLedger } from "../../services/upload/upload.ledger.js";
import { isTerminal } from "../../services/upload/upload.ledger.js";
import type { UploadAssembler } from "../../services/upload/upload.finalize.js";
import type { ChunkStore } from "../../store/chunk.store.js";
import type { ArtifactStore } from "../../store/artifact.store.js";
import type { EngineLogger } from "../../utils/logger.js";
import { parseSessionId } from "../keys.js";

export interface ReconcileDeps {
  ledger: ProgressLedger;
  chunkStore: ChunkStore;
  artifacts: ArtifactStore;
  assembler: UploadAssembler;
  log: EngineLogger;
}

export interface ReconcileReport {
  finalized: number;
  purgedHoldings: number;
  discardedPartials: number;
}

/**
 * Repairs what a crash can leave behind: sessions that reached full
 * coverage but were never assembled, chunk directories that no open
 * session owns, and half-written artifacts.
 */
export async function reconcileUploads(deps: ReconcileDeps): Promise<ReconcileReport> {
  const { ledger, chunkStore, artifacts, assembler, log } = deps;
  const report: ReconcileReport = { finalized: 0, purgedHoldings: 0, discardedPartials: 0 };

  report.discardedPartials = await artifacts.discardAllPartials();

  for (const session of await ledger.scan()) {
    if (isTerminal(session.state) || session.missingRanges.length > 0) continue;

    const { filename, owner } = session;
    try {
      const result = await assembler.tryFinalize(filename, owner);
      if (result.finalized) report.finalized++;
    } catch (err) {
      log.error({ err, filename, owner }, "Reconcile failed to assemble upload");
    }
  }

  for (const sessionId of await chunkStore.listHoldings()) {
    const parsed = parseSessionId(sessionId);
    if (!parsed) continue;

    const { filename, owner } = parsed;
    try {
      const session = await ledger.find(filename, owner);
      if (session && !isTerminal(session.state)) continue;

      log.warn({ filename, owner }, "Purging orphan chunk holdings");
      await chunkStore.purge(filename, owner);
      report.purgedHoldings++;
    } catch (err) {
      log.error({ err, filename, owner }, "Reconcile failed to purge holdings");
    }
  }

  return report;
}
