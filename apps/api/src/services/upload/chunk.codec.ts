// src/services/upload/chunk.codec.ts

import type { ByteRange } from "../../types/upload.js";
import { UploadError } from "../../utils/uploadError.js";

// [8 start_byte BE][8 end_byte BE][1 checksum][payload]
export const CHUNK_HEADER_BYTES = 17;

const MAX_OFFSET = BigInt(Number.MAX_SAFE_INTEGER);

export interface ChunkHeader {
  startByte: number;
  endByte: number;
  checksum: number;
}

export interface DecodedChunk {
  header: ChunkHeader;
  payload: Buffer;
}

export function checksumOf(bytes: Uint8Array): number {
  let sum = 0;
  for (let i = 0; i < bytes.length; i++) {
    sum = (sum + bytes[i]) & 0xff;
  }
  return sum;
}

export function headerRange(header: ChunkHeader): ByteRange {
  return { start: header.startByte, end: header.endByte };
}

export function decodeChunk(raw: Buffer): DecodedChunk {
  if (raw.length < CHUNK_HEADER_BYTES) {
    throw new UploadError(
      "MALFORMED_HEADER",
      `Chunk must start with a ${CHUNK_HEADER_BYTES}-byte header`
    );
  }

  const start = raw.readBigUInt64BE(0);
  const end = raw.readBigUInt64BE(8);
  const checksum = raw.readUInt8(16);

  if (start > MAX_OFFSET || end > MAX_OFFSET) {
    throw new UploadError("MALFORMED_HEADER", "Chunk offset is too large");
  }
  if (start > end) {
    throw new UploadError("MALFORMED_HEADER", "Chunk start_byte is after end_byte");
  }

  const payload = raw.subarray(CHUNK_HEADER_BYTES);
  const expectedLength = Number(end - start) + 1;

  if (payload.length !== expectedLength) {
    throw new UploadError(
      "MALFORMED_HEADER",
      `Chunk payload is ${payload.length} bytes, header declares ${expectedLength}`
    );
  }

  return {
    header: { startByte: Number(start), endByte: Number(end), checksum },
    payload,
  };
}

export function verifyChunk(header: ChunkHeader, payload: Uint8Array): true {
  const actual = checksumOf(payload);
  if (actual !== header.checksum) {
    throw new UploadError("CHECKSUM_MISMATCH", "Chunk checksum validation failed");
  }
  return true;
}

export function encodeChunk(range: ByteRange, payload: Uint8Array): Buffer {
  const header = Buffer.alloc(CHUNK_HEADER_BYTES);
  header.writeBigUInt64BE(BigInt(range.start), 0);
  header.writeBigUInt64BE(BigInt(range.end), 8);
  header.writeUInt8(checksumOf(payload), 16);
  return Buffer.concat([header, payload]);
}
