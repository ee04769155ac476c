// src/store/disk.chunk.store.ts

import fs from "fs/promises";
import type { FileHandle } from "fs/promises";
import path from "path";
import crypto from "crypto";

import type { ByteRange } from "../types/upload.js";
import type { ChunkStore } from "./chunk.store.js";
import type { ProgressLedger } from "../services/upload/upload.ledger.js";
import { isTerminal } from "../services/upload/upload.ledger.js";
import { sessionIdOf } from "../state/keys.js";
import { UploadError } from "../utils/uploadError.js";
import {
  containsRange,
  intersect,
  isFullyCovered,
  mergeRange,
  rangeLength,
} from "../services/upload/upload.ranges.js";

// <seq>_<start>_<end>.chunk; seq orders writes so the newest overlap wins.
const CHUNK_FILE = /^(\d{16})_(\d+)_(\d+)\.chunk$/;

interface HeldChunk {
  file: string;
  seq: number;
  range: ByteRange;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

const rangeUnavailable = (range: ByteRange) =>
  new UploadError(
    "RANGE_UNAVAILABLE",
    `Bytes ${range.start}-${range.end} have not been received`
  );

export class DiskChunkStore implements ChunkStore {
  private lastSeq = 0;

  constructor(
    private readonly rootDir: string,
    private readonly ledger: ProgressLedger
  ) {}

  private dir(filename: string, owner: string) {
    return path.join(this.rootDir, sessionIdOf(owner, filename));
  }

  private nextSeq(): number {
    this.lastSeq = Math.max(this.lastSeq + 1, Date.now() * 1000);
    return this.lastSeq;
  }

  async writeChunk(
    filename: string,
    owner: string,
    range: ByteRange,
    payload: Uint8Array
  ): Promise<void> {
    if (payload.length !== rangeLength(range)) {
      throw new UploadError("MALFORMED_HEADER", "Chunk payload does not match its range");
    }

    const dir = this.dir(filename, owner);
    await fs.mkdir(dir, { recursive: true });

    const seq = this.nextSeq();
    const name = `${String(seq).padStart(16, "0")}_${range.start}_${range.end}.chunk`;
    const finalPath = path.join(dir, name);
    const tempPath = path.join(dir, `.${crypto.randomUUID()}.tmp`);

    const fh = await fs.open(tempPath, "wx");
    try {
      await fh.writeFile(payload);
      await fh.sync();
    } catch (err) {
      await fh.close();
      await fs.rm(tempPath, { force: true });
      throw err;
    }
    await fh.close();

    await fs.rename(tempPath, finalPath);

    // Older copies of the exact same range are now shadowed.
    const held = await this.list(dir);
    await Promise.all(
      held
        .filter(
          (c) => c.seq < seq && c.range.start === range.start && c.range.end === range.end
        )
        .map((c) => fs.rm(path.join(dir, c.file), { force: true }))
    );
  }

  async readRange(filename: string, owner: string, range: ByteRange): Promise<Buffer> {
    const session = await this.ledger.find(filename, owner);
    if (
      !session ||
      isTerminal(session.state) ||
      !containsRange(session.receivedRanges, range)
    ) {
      throw rangeUnavailable(range);
    }

    const dir = this.dir(filename, owner);

    // A re-send of the same range may replace a file between list and open;
    // one fresh listing picks up the replacement.
    for (let attempt = 0; attempt < 2; attempt++) {
      const out = await this.compose(dir, range);
      if (out) return out;
    }

    throw rangeUnavailable(range);
  }

  async purge(filename: string, owner: string): Promise<void> {
    await fs.rm(this.dir(filename, owner), { recursive: true, force: true });
  }

  async listHoldings(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.rootDir, { withFileTypes: true });
      return entries.filter((e) => e.isDirectory()).map((e) => e.name);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
  }

  /** Null when the held chunks do not cover every byte of `range`. */
  private async compose(dir: string, range: ByteRange): Promise<Buffer | null> {
    const held = (await this.list(dir))
      .filter((c) => intersect(c.range, range))
      .sort((a, b) => a.seq - b.seq);

    const out = Buffer.alloc(rangeLength(range));
    let filled: ByteRange[] = [];

    for (const chunk of held) {
      const part = intersect(chunk.range, range);
      if (!part) continue;

      let fh: FileHandle;
      try {
        fh = await fs.open(path.join(dir, chunk.file), "r");
      } catch (err) {
        if (isMissingFile(err)) continue;
        throw err;
      }

      try {
        const length = rangeLength(part);
        const { bytesRead } = await fh.read(
          out,
          part.start - range.start,
          length,
          part.start - chunk.range.start
        );
        if (bytesRead !== length) {
          throw new Error("CHUNK_SHORT_READ");
        }
      } finally {
        await fh.close();
      }

      filled = mergeRange(filled, {
        start: part.start - range.start,
        end: part.end - range.start,
      });
    }

    return isFullyCovered(filled, out.length) ? out : null;
  }

  private async list(dir: string): Promise<HeldChunk[]> {
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    const held: HeldChunk[] = [];
    for (const file of names) {
      const m = CHUNK_FILE.exec(file);
      if (!m) continue;
      held.push({
        file,
        seq: Number(m[1]),
        range: { start: Number(m[2]), end: Number(m[3]) },
      });
    }
    return held;
  }
}
