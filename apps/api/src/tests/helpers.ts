// src/tests/helpers.ts

import fs from "fs/promises";
import os from "os";
import path from "path";
import { pino } from "pino";

import type { AppConfig } from "../config/uploads.config.js";
import { encodeChunk } from "../services/upload/chunk.codec.js";
import { createEngine, type EngineOverrides } from "../services/upload/upload.engine.js";
import { MemorySessionRepository } from "../state/memory.session.repository.js";

export const silentLogger = pino({ level: "silent" });

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "chunkvault-test-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function testConfig(dir: string): Pick<AppConfig, "upload" | "gc" | "auth"> {
  return {
    upload: {
      dir,
      maxFileSizeBytes: 10_000,
      maxChunkBytes: 1024,
      assemblyConcurrency: 2,
    },
    gc: {
      intervalMs: 60_000,
      staleAfterMs: 1_000,
    },
    auth: {
      jwtSecret: "test-secret",
      tokenTtlSeconds: 3600,
      devices: new Map([
        ["deviceA", "device-a-secret"],
        ["deviceB", "device-b-secret"],
      ]),
    },
  };
}

export function makeEngine(dir: string, overrides: EngineOverrides = {}) {
  const repo = new MemorySessionRepository();
  return createEngine(testConfig(dir), repo, silentLogger, overrides);
}

/** Deterministic, non-repeating-every-256 test content. */
export function fileBytes(size: number): Buffer {
  const buf = Buffer.alloc(size);
  for (let i = 0; i < size; i++) {
    buf[i] = (i * 7 + Math.floor(i / 256)) & 0xff;
  }
  return buf;
}

/** Wire chunk carrying bytes [start, end] of `file`. */
export function chunkOf(file: Buffer, start: number, end: number): Buffer {
  return encodeChunk({ start, end }, file.subarray(start, end + 1));
}
