// src/services/upload/upload.finalize.ts

import { createWriteStream } from "fs";
import { pipeline } from "stream/promises";
import PQueue from "p-queue";

import type { FinalizeResult } from "../../types/upload.js";
import type { ChunkStore } from "../../store/chunk.store.js";
import type { ArtifactStore } from "../../store/artifact.store.js";
import type { EngineLogger } from "../../utils/logger.js";
import { sessionIdOf } from "../../state/keys.js";
import { UploadError, isUploadError } from "../../utils/uploadError.js";
import { isTerminal, type ProgressLedger } from "./upload.ledger.js";

const ASSEMBLY_WINDOW_BYTES = 8 * 1024 * 1024;

export interface AssemblerOptions {
  ledger: ProgressLedger;
  chunkStore: ChunkStore;
  artifacts: ArtifactStore;
  log: EngineLogger;
  concurrency: number;
  windowBytes?: number;
}

/**
 * Turns a fully covered session into its artifact, at most once.
 *
 * Triggers for a session already being assembled join the running
 * assembly instead of starting another. A trigger that arrives after
 * the session is COMPLETE finds nothing to do.
 */
export class UploadAssembler {
  private readonly inflight = new Map<string, Promise<FinalizeResult>>();
  private readonly queue: PQueue;
  private readonly windowBytes: number;

  constructor(private readonly opts: AssemblerOptions) {
    this.queue = new PQueue({ concurrency: opts.concurrency });
    this.windowBytes = opts.windowBytes ?? ASSEMBLY_WINDOW_BYTES;
  }

  isFinalizing(filename: string, owner: string): boolean {
    return this.inflight.has(sessionIdOf(owner, filename));
  }

  tryFinalize(filename: string, owner: string): Promise<FinalizeResult> {
    const sessionId = sessionIdOf(owner, filename);

    const running = this.inflight.get(sessionId);
    if (running) {
      return running.then((r) => ({ finalized: false, sizeBytes: r.sizeBytes }));
    }

    const run = this.queue
      .add(() => this.finalize(filename, owner), { throwOnTimeout: true })
      .finally(() => {
        this.inflight.delete(sessionId);
      });

    this.inflight.set(sessionId, run);
    return run;
  }

  async onIdle(): Promise<void> {
    await this.queue.onIdle();
  }

  private async finalize(filename: string, owner: string): Promise<FinalizeResult> {
    const { ledger, chunkStore, artifacts, log } = this.opts;

    const session = await ledger.status(filename, owner);
    if (isTerminal(session.state) || session.missingRanges.length > 0) {
      return { finalized: false, sizeBytes: session.totalSize };
    }

    const partialPath = await artifacts.createPartial(filename, owner);

    try {
      const written = await this.assemble(filename, owner, session.totalSize, partialPath);
      if (written !== session.totalSize) {
        throw new Error(`ASSEMBLED_SIZE_MISMATCH expected=${session.totalSize} actual=${written}`);
      }
      await artifacts.commit(partialPath, filename, owner);
    } catch (err) {
      await artifacts.discard(partialPath);
      log.error({ err, filename, owner }, "Upload assembly failed");
      await this.fail(filename, owner);
      throw new UploadError("ASSEMBLY_FAILURE", "File assembly failed; start a new upload", {
        cause: err,
      });
    }

    try {
      await ledger.markComplete(filename, owner);
    } catch (err) {
      // Someone moved the session to another terminal state under us.
      await artifacts.remove(filename, owner);
      throw err;
    }

    try {
      await chunkStore.purge(filename, owner);
    } catch (err) {
      // The artifact is self-sufficient; startup reconcile drops leftovers.
      log.warn({ err, filename, owner }, "Failed to release chunks after assembly");
    }

    log.info({ filename, owner, sizeBytes: session.totalSize }, "Upload assembled");
    return { finalized: true, sizeBytes: session.totalSize };
  }

  private async assemble(
    filename: string,
    owner: string,
    totalSize: number,
    outPath: string
  ): Promise<number> {
    const { chunkStore } = this.opts;
    const windowBytes = this.windowBytes;
    let written = 0;

    async function* windows() {
      for (let offset = 0; offset < totalSize; offset += windowBytes) {
        const end = Math.min(totalSize - 1, offset + windowBytes - 1);
        const buf = await chunkStore.readRange(filename, owner, { start: offset, end });
        written += buf.length;
        yield buf;
      }
    }

    await pipeline(windows(), createWriteStream(outPath, { flags: "wx" }));
    return written;
  }

  private async fail(filename: string, owner: string): Promise<void> {
    const { ledger, chunkStore, log } = this.opts;

    try {
      await ledger.markFailed(filename, owner, "ASSEMBLY_FAILURE");
    } catch (err) {
      if (!isUploadError(err, "INVALID_TRANSITION")) throw err;
      log.warn({ filename, owner }, "Upload left its open state before it could be failed");
    }

    try {
      await chunkStore.purge(filename, owner);
    } catch (err) {
      // The session is FAILED either way; startup reconcile drops leftovers.
      log.warn({ err, filename, owner }, "Failed to release chunks of a failed upload");
    }
  }
}
