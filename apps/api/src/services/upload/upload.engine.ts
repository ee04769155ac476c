// src/services/upload/upload.engine.ts

import path from "path";

import type { AppConfig } from "../../config/uploads.config.js";
import type { SessionRepository } from "../../state/session.repository.js";
import { runUploadGc, type SweepDeps, type SweepReport } from "../../state/gc/upload.gc.worker.js";
import { UploadGcScheduler } from "../../state/gc/upload.gc.scheduler.js";
import { reconcileUploads, type ReconcileReport } from "../../state/gc/upload.gc.reconcile.js";
import { ArtifactStore } from "../../store/artifact.store.js";
import type { ChunkStore } from "../../store/chunk.store.js";
import { DiskChunkStore } from "../../store/disk.chunk.store.js";
import type { EngineLogger } from "../../utils/logger.js";
import { UploadAssembler } from "./upload.finalize.js";
import { ProgressLedger } from "./upload.ledger.js";
import { RangeReader } from "./upload.read.js";
import { UploadService } from "./upload.service.js";

export interface UploadEngine {
  repo: SessionRepository;
  ledger: ProgressLedger;
  chunkStore: ChunkStore;
  artifacts: ArtifactStore;
  assembler: UploadAssembler;
  reader: RangeReader;
  service: UploadService;
  gc: UploadGcScheduler;
  sweep(now?: number): Promise<SweepReport>;
  reconcile(): Promise<ReconcileReport>;
}

export interface EngineOverrides {
  now?: () => number;
  // Builds the chunk store in place of the disk one; receives the engine's ledger.
  chunkStore?: (ledger: ProgressLedger, chunkDir: string) => ChunkStore;
}

export function chunkDirOf(uploadDir: string) {
  return path.join(uploadDir, "chunks");
}

export function fileDirOf(uploadDir: string) {
  return path.join(uploadDir, "files");
}

export function createEngine(
  config: Pick<AppConfig, "upload" | "gc">,
  repo: SessionRepository,
  log: EngineLogger,
  overrides: EngineOverrides = {}
): UploadEngine {
  const ledger = new ProgressLedger(repo, { now: overrides.now });
  const chunkDir = chunkDirOf(config.upload.dir);
  const chunkStore = overrides.chunkStore
    ? overrides.chunkStore(ledger, chunkDir)
    : new DiskChunkStore(chunkDir, ledger);
  const artifacts = new ArtifactStore(fileDirOf(config.upload.dir));

  const assembler = new UploadAssembler({
    ledger,
    chunkStore,
    artifacts,
    log,
    concurrency: config.upload.assemblyConcurrency,
  });

  const reader = new RangeReader(ledger, artifacts);

  const service = new UploadService({
    ledger,
    chunkStore,
    artifacts,
    assembler,
    reader,
    log,
    maxFileSizeBytes: config.upload.maxFileSizeBytes,
  });

  const sweepDeps: SweepDeps = {
    ledger,
    chunkStore,
    staleAfterMs: config.gc.staleAfterMs,
    log,
  };

  return {
    repo,
    ledger,
    chunkStore,
    artifacts,
    assembler,
    reader,
    service,
    gc: new UploadGcScheduler(sweepDeps, config.gc.intervalMs, overrides.now),
    sweep: (now) => runUploadGc(sweepDeps, now ?? (overrides.now ?? Date.now)()),
    reconcile: () => reconcileUploads({ ledger, chunkStore, artifacts, assembler, log }),
  };
}
