// src/store/chunk.store.ts

import type { ByteRange } from "../types/upload.js";

/**
 * Holding area for chunk bytes until assembly. Another backend is another
 * implementation of this interface.
 */
export interface ChunkStore {
  /** Resolves only once the bytes are durable. */
  writeChunk(filename: string, owner: string, range: ByteRange, payload: Uint8Array): Promise<void>;

  /** Throws RANGE_UNAVAILABLE unless every byte of `range` is held. */
  readRange(filename: string, owner: string, range: ByteRange): Promise<Buffer>;

  purge(filename: string, owner: string): Promise<void>;

  /** Session ids that currently hold chunk bytes. */
  listHoldings(): Promise<string[]>;
}
