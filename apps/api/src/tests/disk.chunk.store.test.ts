import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import fs from "fs/promises";
import path from "path";

import { ProgressLedger } from "../services/upload/upload.ledger.js";
import { sessionIdOf } from "../state/keys.js";
import { MemorySessionRepository } from "../state/memory.session.repository.js";
import { DiskChunkStore } from "../store/disk.chunk.store.js";
import { isUploadError } from "../utils/uploadError.js";
import { fileBytes, makeTempDir, removeDir } from "./helpers.js";

describe("DiskChunkStore", () => {
  let dir: string;
  let ledger: ProgressLedger;
  let store: DiskChunkStore;

  const file = fileBytes(100);

  async function put(start: number, end: number, payload: Buffer = file.subarray(start, end + 1)) {
    await store.writeChunk("photo.jpg", "deviceA", { start, end }, payload);
    await ledger.record("photo.jpg", "deviceA", { start, end });
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    ledger = new ProgressLedger(new MemorySessionRepository());
    store = new DiskChunkStore(dir, ledger);
    await ledger.open("photo.jpg", "deviceA", 100);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("reads back bytes inside one chunk", async () => {
    await put(0, 49);

    const out = await store.readRange("photo.jpg", "deviceA", { start: 10, end: 20 });
    assert.strictEqual(out.length, 11);
    assert.deepStrictEqual(out, file.subarray(10, 21));
  });

  it("stitches a read across chunk boundaries", async () => {
    await put(50, 99);
    await put(0, 49);

    const out = await store.readRange("photo.jpg", "deviceA", { start: 40, end: 60 });
    assert.deepStrictEqual(out, file.subarray(40, 61));
  });

  it("refuses a range the ledger has not recorded", async () => {
    await put(0, 49);
    await store.writeChunk("photo.jpg", "deviceA", { start: 50, end: 59 }, file.subarray(50, 60));

    await assert.rejects(
      store.readRange("photo.jpg", "deviceA", { start: 40, end: 60 }),
      (err) => isUploadError(err, "RANGE_UNAVAILABLE")
    );
  });

  it("lets the newest write win where re-sends overlap", async () => {
    await put(0, 9, Buffer.alloc(10, 1));
    await put(5, 14, Buffer.alloc(10, 2));

    const out = await store.readRange("photo.jpg", "deviceA", { start: 0, end: 14 });
    assert.deepStrictEqual(
      [...out],
      [1, 1, 1, 1, 1, 2, 2, 2, 2, 2, 2, 2, 2, 2, 2]
    );
  });

  it("keeps a single file for repeated sends of the same range", async () => {
    await put(0, 9, Buffer.alloc(10, 1));
    await put(0, 9, Buffer.alloc(10, 3));

    const files = await fs.readdir(path.join(dir, sessionIdOf("deviceA", "photo.jpg")));
    assert.strictEqual(files.filter((f) => f.endsWith(".chunk")).length, 1);

    const out = await store.readRange("photo.jpg", "deviceA", { start: 0, end: 9 });
    assert.deepStrictEqual(out, Buffer.alloc(10, 3));
  });

  it("rejects a payload that does not match its range", async () => {
    await assert.rejects(
      store.writeChunk("photo.jpg", "deviceA", { start: 0, end: 9 }, Buffer.alloc(5)),
      (err) => isUploadError(err, "MALFORMED_HEADER")
    );
  });

  it("reports missing bytes when chunk files are gone", async () => {
    await put(0, 49);
    await store.purge("photo.jpg", "deviceA");

    await assert.rejects(
      store.readRange("photo.jpg", "deviceA", { start: 0, end: 9 }),
      (err) => isUploadError(err, "RANGE_UNAVAILABLE")
    );
  });

  it("refuses reads once the session is terminal", async () => {
    await put(0, 49);
    await ledger.markExpired("photo.jpg", "deviceA");

    await assert.rejects(
      store.readRange("photo.jpg", "deviceA", { start: 0, end: 9 }),
      (err) => isUploadError(err, "RANGE_UNAVAILABLE")
    );
  });

  it("lists and purges holdings per session", async () => {
    await put(0, 9);
    await ledger.open("other.bin", "deviceB", 10);
    await store.writeChunk("other.bin", "deviceB", { start: 0, end: 9 }, file.subarray(0, 10));

    const held = (await store.listHoldings()).sort();
    assert.deepStrictEqual(
      held,
      [sessionIdOf("deviceA", "photo.jpg"), sessionIdOf("deviceB", "other.bin")].sort()
    );

    await store.purge("photo.jpg", "deviceA");
    assert.deepStrictEqual(await store.listHoldings(), [sessionIdOf("deviceB", "other.bin")]);
  });

  it("has no holdings before anything is written", async () => {
    const empty = new DiskChunkStore(path.join(dir, "absent"), ledger);
    assert.deepStrictEqual(await empty.listHoldings(), []);
  });
});
