import { describe, it, beforeEach } from "node:test";
import assert from "node:assert";

import { ProgressLedger } from "../services/upload/upload.ledger.js";
import { runUploadGc } from "../state/gc/upload.gc.worker.js";
import { sessionIdOf, uploadKeys } from "../state/keys.js";
import {
  RedisSessionRepository,
  type SessionRedisClient,
  type SessionRedisTransaction,
} from "../state/redis.session.repository.js";
import type { ChunkStore } from "../store/chunk.store.js";
import type { UploadSession } from "../types/upload.js";
import { silentLogger } from "./helpers.js";

/** In-process stand-in for the Upstash client: hashes and sets in maps. */
class FakeRedis implements SessionRedisClient {
  readonly hashes = new Map<string, Record<string, string>>();
  readonly sets = new Map<string, Set<string>>();

  async hgetall(key: string): Promise<Record<string, unknown> | null> {
    const hash = this.hashes.get(key);
    return hash ? { ...hash } : null;
  }

  async smembers(key: string): Promise<string[]> {
    return [...(this.sets.get(key) ?? [])];
  }

  async ping(): Promise<unknown> {
    return "PONG";
  }

  multi(): SessionRedisTransaction {
    return new FakeTransaction(this);
  }

  members(key: string): string[] {
    return [...(this.sets.get(key) ?? [])].sort();
  }
}

class FakeTransaction implements SessionRedisTransaction {
  private readonly ops: Array<() => number> = [];

  constructor(private readonly redis: FakeRedis) {}

  del(...keys: string[]): SessionRedisTransaction {
    this.ops.push(() => keys.filter((k) => this.redis.hashes.delete(k)).length);
    return this;
  }

  hset(key: string, kv: Record<string, string>): SessionRedisTransaction {
    this.ops.push(() => {
      const hash = this.redis.hashes.get(key) ?? {};
      const added = Object.keys(kv).filter((f) => !(f in hash)).length;
      this.redis.hashes.set(key, { ...hash, ...kv });
      return added;
    });
    return this;
  }

  sadd(key: string, member: string): SessionRedisTransaction {
    this.ops.push(() => {
      const set = this.redis.sets.get(key) ?? new Set<string>();
      const had = set.has(member);
      set.add(member);
      this.redis.sets.set(key, set);
      return had ? 0 : 1;
    });
    return this;
  }

  srem(key: string, member: string): SessionRedisTransaction {
    this.ops.push(() => (this.redis.sets.get(key)?.delete(member) ? 1 : 0));
    return this;
  }

  async exec(): Promise<unknown> {
    return this.ops.map((op) => op());
  }
}

function session(overrides: Partial<UploadSession> = {}): UploadSession {
  return {
    filename: "photo.jpg",
    owner: "deviceA",
    totalSize: 100,
    receivedRanges: [],
    state: "IN_PROGRESS",
    createdAt: 1_000,
    lastActivityAt: 2_000,
    ...overrides,
  };
}

describe("RedisSessionRepository", () => {
  let redis: FakeRedis;
  let repo: RedisSessionRepository;

  beforeEach(() => {
    redis = new FakeRedis();
    repo = new RedisSessionRepository(redis, silentLogger);
  });

  it("reads back a saved session with ranges, completion time and error", async () => {
    const id = sessionIdOf("deviceA", "photo.jpg");
    const saved = session({
      receivedRanges: [
        { start: 0, end: 9 },
        { start: 20, end: 99 },
      ],
      state: "FAILED",
      completedAt: 3_000,
      error: "disk unavailable",
    });

    await repo.save(id, saved);

    assert.deepStrictEqual(redis.hashes.get(uploadKeys.session(id)), {
      filename: "photo.jpg",
      owner: "deviceA",
      totalSize: "100",
      receivedRanges: "[[0,9],[20,99]]",
      state: "FAILED",
      createdAt: "1000",
      lastActivityAt: "2000",
      completedAt: "3000",
      error: "disk unavailable",
    });
    assert.deepStrictEqual(await repo.get(id), saved);
  });

  it("drops fields of the session it replaces", async () => {
    const id = sessionIdOf("deviceA", "photo.jpg");
    await repo.save(id, session({ state: "FAILED", completedAt: 3_000, error: "boom" }));

    const fresh = session({ lastActivityAt: 5_000 });
    await repo.save(id, fresh);

    const stored = await repo.get(id);
    assert.deepStrictEqual(stored, fresh);
    assert.strictEqual(stored !== null && "error" in stored, false);
  });

  it("returns null for an unknown session", async () => {
    assert.strictEqual(await repo.get(sessionIdOf("deviceA", "missing.bin")), null);
  });

  it("maintains the owner and global indexes on save and delete", async () => {
    const a1 = sessionIdOf("deviceA", "a.bin");
    const a2 = sessionIdOf("deviceA", "b.bin");
    const b1 = sessionIdOf("deviceB", "a.bin");

    await repo.save(a1, session({ filename: "a.bin" }));
    await repo.save(a2, session({ filename: "b.bin" }));
    await repo.save(b1, session({ owner: "deviceB", filename: "a.bin" }));

    assert.deepStrictEqual(redis.members(uploadKeys.ownerIndex("deviceA")), [a1, a2].sort());
    assert.deepStrictEqual(redis.members(uploadKeys.ownerIndex("deviceB")), [b1]);
    assert.deepStrictEqual(redis.members(uploadKeys.allIndex()), [a1, a2, b1].sort());

    await repo.delete(a1, "deviceA");

    assert.strictEqual(redis.hashes.has(uploadKeys.session(a1)), false);
    assert.deepStrictEqual(redis.members(uploadKeys.ownerIndex("deviceA")), [a2]);
    assert.deepStrictEqual(redis.members(uploadKeys.allIndex()), [a2, b1].sort());
  });

  it("lists sessions per owner and across owners", async () => {
    await repo.save(sessionIdOf("deviceA", "a.bin"), session({ filename: "a.bin" }));
    await repo.save(sessionIdOf("deviceB", "b.bin"), session({ owner: "deviceB", filename: "b.bin" }));

    const mine = await repo.listByOwner("deviceA");
    assert.deepStrictEqual(mine.map((s) => s.filename), ["a.bin"]);

    const all = await repo.listAll();
    assert.deepStrictEqual(all.map((s) => s.filename).sort(), ["a.bin", "b.bin"]);
  });

  describe("unreadable records", () => {
    const corruptId = sessionIdOf("deviceA", "corrupt.bin");

    function plantCorrupt(fields: Record<string, string>) {
      redis.hashes.set(uploadKeys.session(corruptId), {
        filename: "corrupt.bin",
        owner: "deviceA",
        totalSize: "100",
        receivedRanges: "[]",
        state: "IN_PROGRESS",
        createdAt: "1000",
        lastActivityAt: "2000",
        ...fields,
      });
      redis.sets.set(uploadKeys.ownerIndex("deviceA"), new Set([corruptId]));
      redis.sets.set(uploadKeys.allIndex(), new Set([corruptId]));
    }

    it("throws when a single record has a non-numeric size", async () => {
      plantCorrupt({ totalSize: "abc" });

      await assert.rejects(repo.get(corruptId), /CORRUPT_UPLOAD_SESSION/);
    });

    it("throws on an unknown state or malformed ranges", async () => {
      plantCorrupt({ state: "UPLOADING" });
      await assert.rejects(repo.get(corruptId), /CORRUPT_UPLOAD_SESSION/);

      plantCorrupt({ receivedRanges: "[[0]]" });
      await assert.rejects(repo.get(corruptId), /CORRUPT_UPLOAD_SESSION/);

      plantCorrupt({ receivedRanges: "not json" });
      await assert.rejects(repo.get(corruptId), /CORRUPT_UPLOAD_SESSION/);
    });

    it("leaves a corrupt record out of listings without hiding the rest", async () => {
      plantCorrupt({ totalSize: "abc" });
      const goodId = sessionIdOf("deviceA", "good.bin");
      await repo.save(goodId, session({ filename: "good.bin" }));

      assert.deepStrictEqual(
        (await repo.listByOwner("deviceA")).map((s) => s.filename),
        ["good.bin"]
      );
      assert.deepStrictEqual(
        (await repo.listAll()).map((s) => s.filename),
        ["good.bin"]
      );
    });

    it("lets the sweeper expire healthy sessions past a corrupt one", async () => {
      plantCorrupt({ totalSize: "abc" });

      let clock = 10_000;
      const ledger = new ProgressLedger(repo, { now: () => clock });
      await ledger.open("stale.bin", "deviceB", 50);

      const purged: string[] = [];
      const chunkStore: ChunkStore = {
        writeChunk: async () => {},
        readRange: async () => Buffer.alloc(0),
        purge: async (filename) => {
          purged.push(filename);
        },
        listHoldings: async () => [],
      };

      clock += 5_000;
      const report = await runUploadGc(
        { ledger, chunkStore, staleAfterMs: 1_000, log: silentLogger },
        clock
      );

      assert.strictEqual(report.scanned, 1);
      assert.deepStrictEqual(report.expired, [{ filename: "stale.bin", owner: "deviceB" }]);
      assert.deepStrictEqual(report.failures, []);
      assert.deepStrictEqual(purged, ["stale.bin"]);
      assert.strictEqual((await ledger.status("stale.bin", "deviceB")).state, "EXPIRED");
    });
  });
});
