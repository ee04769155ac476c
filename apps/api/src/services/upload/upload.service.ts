// src/services/upload/upload.service.ts

import type { ByteRange, CoverageDelta, SessionSnapshot } from "../../types/upload.js";
import type { ChunkStore } from "../../store/chunk.store.js";
import type { ArtifactStore } from "../../store/artifact.store.js";
import type { EngineLogger } from "../../utils/logger.js";
import { UploadError, isUploadError } from "../../utils/uploadError.js";
import { decodeChunk, headerRange, verifyChunk } from "./chunk.codec.js";
import type { ProgressLedger } from "./upload.ledger.js";
import type { UploadAssembler } from "./upload.finalize.js";
import type { OpenedRange, RangeReader } from "./upload.read.js";

export interface UploadServiceDeps {
  ledger: ProgressLedger;
  chunkStore: ChunkStore;
  artifacts: ArtifactStore;
  assembler: UploadAssembler;
  reader: RangeReader;
  log: EngineLogger;
  maxFileSizeBytes: number;
}

export class UploadService {
  constructor(private readonly deps: UploadServiceDeps) {}

  /**
   * Accepts one wire chunk. The chunk is durable before its range is
   * recorded, so the ledger never claims bytes the store does not hold.
   */
  async uploadChunk(
    owner: string,
    filename: string,
    totalSize: number,
    raw: Buffer
  ): Promise<SessionSnapshot> {
    const { ledger, chunkStore, assembler, log, maxFileSizeBytes } = this.deps;

    if (totalSize > maxFileSizeBytes) {
      throw new UploadError("OUT_OF_BOUNDS", `File exceeds the ${maxFileSizeBytes}-byte limit`);
    }

    const { header, payload } = decodeChunk(raw);
    verifyChunk(header, payload);
    const range = headerRange(header);

    const opened = await ledger.open(filename, owner, totalSize);
    if (range.end > opened.totalSize - 1) {
      throw new UploadError(
        "OUT_OF_BOUNDS",
        `Range ${range.start}-${range.end} is outside 0-${opened.totalSize - 1}`
      );
    }

    // Keeps a long transfer of a single chunk from looking idle to the sweeper.
    await ledger.touch(filename, owner);
    await chunkStore.writeChunk(filename, owner, range, payload);

    let delta: CoverageDelta;
    try {
      delta = await ledger.record(filename, owner, range);
    } catch (err) {
      // Closed or deleted while the bytes were landing: nobody will ever read them.
      if (isUploadError(err, "UPLOAD_CLOSED") || isUploadError(err, "UPLOAD_NOT_FOUND")) {
        await chunkStore.purge(filename, owner);
      }
      throw err;
    }

    log.debug(
      { filename, owner, start: range.start, end: range.end, bytesAdded: delta.bytesAdded },
      "Chunk recorded"
    );

    if (delta.complete) {
      await assembler.tryFinalize(filename, owner);
    }

    return ledger.status(filename, owner);
  }

  download(owner: string, filename: string, range?: ByteRange): Promise<OpenedRange> {
    return this.deps.reader.open(filename, owner, range);
  }

  status(owner: string, filename: string): Promise<SessionSnapshot> {
    return this.deps.ledger.status(filename, owner);
  }

  list(owner: string): Promise<SessionSnapshot[]> {
    return this.deps.ledger.list(owner);
  }

  async delete(owner: string, filename: string): Promise<void> {
    const { ledger, chunkStore, artifacts, assembler, log } = this.deps;

    if (assembler.isFinalizing(filename, owner)) {
      throw new UploadError(
        "FINALIZATION_IN_PROGRESS",
        "File is being assembled; retry shortly"
      );
    }

    await chunkStore.purge(filename, owner);
    const hadArtifact = await artifacts.remove(filename, owner);
    const hadSession = await ledger.remove(filename, owner);

    if (!hadArtifact && !hadSession) {
      throw new UploadError("UPLOAD_NOT_FOUND", `No upload named ${filename}`);
    }

    log.info({ filename, owner }, "Upload deleted");
  }
}
