// src/store/artifact.store.ts

import fs from "fs/promises";
import { createReadStream } from "fs";
import path from "path";
import crypto from "crypto";
import type { Readable } from "stream";

import type { ByteRange } from "../types/upload.js";
import { sessionIdOf } from "../state/keys.js";

const PARTIAL_SUFFIX = ".partial";

/**
 * Assembled files. An artifact only ever appears at its final path through
 * a rename, so a half-written file is never visible there.
 */
export class ArtifactStore {
  constructor(private readonly rootDir: string) {}

  private finalPath(filename: string, owner: string) {
    return path.join(this.rootDir, sessionIdOf(owner, filename));
  }

  async createPartial(filename: string, owner: string): Promise<string> {
    await fs.mkdir(this.rootDir, { recursive: true });
    return path.join(
      this.rootDir,
      `.${sessionIdOf(owner, filename)}.${crypto.randomUUID()}${PARTIAL_SUFFIX}`
    );
  }

  async commit(partialPath: string, filename: string, owner: string): Promise<void> {
    const fh = await fs.open(partialPath, "r");
    try {
      await fh.sync();
    } finally {
      await fh.close();
    }
    await fs.rename(partialPath, this.finalPath(filename, owner));
  }

  async discard(partialPath: string): Promise<void> {
    await fs.rm(partialPath, { force: true });
  }

  /** Size in bytes, or null when no artifact exists. */
  async size(filename: string, owner: string): Promise<number | null> {
    try {
      const st = await fs.stat(this.finalPath(filename, owner));
      return st.size;
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw err;
    }
  }

  openRange(filename: string, owner: string, range: ByteRange): Readable {
    return createReadStream(this.finalPath(filename, owner), {
      start: range.start,
      end: range.end,
    });
  }

  async remove(filename: string, owner: string): Promise<boolean> {
    const existed = (await this.size(filename, owner)) !== null;
    await fs.rm(this.finalPath(filename, owner), { force: true });
    return existed;
  }

  /** Partial files left behind by a crash mid-assembly. */
  async discardAllPartials(): Promise<number> {
    let names: string[];
    try {
      names = await fs.readdir(this.rootDir);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return 0;
      throw err;
    }

    const partials = names.filter((n) => n.endsWith(PARTIAL_SUFFIX));
    await Promise.all(partials.map((n) => fs.rm(path.join(this.rootDir, n), { force: true })));
    return partials.length;
  }
}
