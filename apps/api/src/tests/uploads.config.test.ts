import { describe, it } from "node:test";
import assert from "node:assert";

import { loadConfig } from "../config/uploads.config.js";

const base = {
  UPLOAD_DIR: "/var/lib/chunkvault",
  AUTH_JWT_SECRET: "test-secret",
  STATE_BACKEND: "memory",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(base);

    assert.strictEqual(config.port, 3000);
    assert.strictEqual(config.env, "development");
    assert.deepStrictEqual(config.state, { backend: "memory" });
    assert.deepStrictEqual(config.upload, {
      dir: "/var/lib/chunkvault",
      maxFileSizeBytes: 15 * 1024 * 1024 * 1024,
      maxChunkBytes: 20 * 1024 * 1024,
      assemblyConcurrency: 2,
    });
    assert.deepStrictEqual(config.gc, {
      intervalMs: 60 * 60 * 1000,
      staleAfterMs: 24 * 60 * 60 * 1000,
    });
    assert.strictEqual(config.auth.tokenTtlSeconds, 86_400);
    assert.strictEqual(config.auth.devices.size, 0);
  });

  it("reads overrides", () => {
    const config = loadConfig({
      ...base,
      PORT: "8080",
      MAX_CHUNK_BYTES: "4096",
      STALE_UPLOAD_TIMEOUT_MS: "5000",
      NODE_ENV: "production",
    });

    assert.strictEqual(config.port, 8080);
    assert.strictEqual(config.upload.maxChunkBytes, 4096);
    assert.strictEqual(config.gc.staleAfterMs, 5000);
    assert.strictEqual(config.env, "production");
  });

  it("parses device credentials", () => {
    const config = loadConfig({ ...base, DEVICE_CREDENTIALS: "deviceA:alpha, deviceB:beta:gamma" });

    assert.deepStrictEqual(
      [...config.auth.devices.entries()],
      [
        ["deviceA", "alpha"],
        ["deviceB", "beta:gamma"],
      ]
    );
  });

  it("rejects malformed device credentials", () => {
    assert.throws(
      () => loadConfig({ ...base, DEVICE_CREDENTIALS: "deviceA" }),
      /DEVICE_CREDENTIALS entries must look like deviceId:secret/
    );
  });

  it("requires UPLOAD_DIR and AUTH_JWT_SECRET", () => {
    assert.throws(
      () => loadConfig({ ...base, UPLOAD_DIR: "" }),
      /Missing required env: UPLOAD_DIR/
    );
    assert.throws(
      () => loadConfig({ ...base, AUTH_JWT_SECRET: undefined }),
      /Missing required env: AUTH_JWT_SECRET/
    );
  });

  it("requires Redis credentials for the redis backend", () => {
    assert.throws(
      () => loadConfig({ ...base, STATE_BACKEND: "redis" }),
      /Missing required env: UPSTASH_REDIS_REST_URL/
    );

    const config = loadConfig({
      ...base,
      STATE_BACKEND: undefined,
      UPSTASH_REDIS_REST_URL: "http://localhost:8079",
      UPSTASH_REDIS_REST_TOKEN: "test-token",
    });
    assert.deepStrictEqual(config.state, {
      backend: "redis",
      redisUrl: "http://localhost:8079",
      redisToken: "test-token",
    });
  });

  it("rejects an unknown backend", () => {
    assert.throws(
      () => loadConfig({ ...base, STATE_BACKEND: "sqlite" }),
      /STATE_BACKEND must be 'redis' or 'memory'/
    );
  });

  it("rejects non-positive numbers", () => {
    assert.throws(() => loadConfig({ ...base, PORT: "abc" }), /PORT must be an integer >= 1/);
    assert.throws(
      () => loadConfig({ ...base, ASSEMBLY_CONCURRENCY: "0" }),
      /ASSEMBLY_CONCURRENCY must be an integer >= 1/
    );
  });
});
