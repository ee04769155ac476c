// src/services/upload/upload.read.ts

import type { Readable } from "stream";

import type { ByteRange } from "../../types/upload.js";
import type { ArtifactStore } from "../../store/artifact.store.js";
import { UploadError } from "../../utils/uploadError.js";
import type { ProgressLedger } from "./upload.ledger.js";
import { rangeLength } from "./upload.ranges.js";

export interface OpenedRange {
  range: ByteRange;
  totalSize: number;
  contentRange: string;
  // False when the read covers the whole file.
  partial: boolean;
  stream(): Readable;
}

export interface ReadResult {
  data: Buffer;
  range: ByteRange;
  totalSize: number;
  contentRange: string;
}

const notSatisfiable = (totalSize: number) =>
  new UploadError(
    "RANGE_NOT_SATISFIABLE",
    `Range not satisfiable for file of size ${totalSize}`
  );

/**
 * Parse a single-range `Range` header: `bytes=a-b`, `bytes=a-`, `bytes=-n`.
 * A bounded end beyond the file is rejected rather than clamped.
 */
export function parseRangeHeader(rangeHeader: string, totalSize: number): ByteRange {
  const m = rangeHeader.trim().match(/^bytes=(\d*)-(\d*)$/i);
  if (!m) throw notSatisfiable(totalSize);

  const rawStart = m[1];
  const rawEnd = m[2];

  // Suffix: bytes=-N
  if (rawStart === "" && rawEnd !== "") {
    const suffixLen = Number(rawEnd);
    if (!Number.isSafeInteger(suffixLen) || suffixLen <= 0) throw notSatisfiable(totalSize);
    return { start: Math.max(0, totalSize - suffixLen), end: totalSize - 1 };
  }

  if (rawStart === "") throw notSatisfiable(totalSize);

  const start = Number(rawStart);
  // Open ended: bytes=N-
  const end = rawEnd === "" ? totalSize - 1 : Number(rawEnd);

  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    throw notSatisfiable(totalSize);
  }
  return { start, end };
}

export class RangeReader {
  constructor(
    private readonly ledger: ProgressLedger,
    private readonly artifacts: ArtifactStore
  ) {}

  async open(filename: string, owner: string, requested?: ByteRange): Promise<OpenedRange> {
    const session = await this.ledger.status(filename, owner);

    if (session.state !== "COMPLETE") {
      throw new UploadError("FILE_NOT_READY", "File is not complete and cannot be downloaded");
    }

    const totalSize = session.totalSize;
    const range = requested ?? { start: 0, end: totalSize - 1 };

    if (range.start < 0 || range.start > range.end || range.end > totalSize - 1) {
      throw notSatisfiable(totalSize);
    }

    return {
      range,
      totalSize,
      contentRange: `bytes ${range.start}-${range.end}/${totalSize}`,
      partial: rangeLength(range) !== totalSize,
      stream: () => this.artifacts.openRange(filename, owner, range),
    };
  }

  async read(filename: string, owner: string, requested?: ByteRange): Promise<ReadResult> {
    const opened = await this.open(filename, owner, requested);

    const parts: Buffer[] = [];
    for await (const chunk of opened.stream()) {
      parts.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }

    return {
      data: Buffer.concat(parts),
      range: opened.range,
      totalSize: opened.totalSize,
      contentRange: opened.contentRange,
    };
  }
}
