// src/config/uploads.config.ts
import path from "path";

type Env = Record<string, string | undefined>;

function parsePositiveIntEnv(env: Env, name: string, fallback: number, min = 1): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isSafeInteger(n) || n < min) {
    throw new Error(`${name} must be an integer >= ${min}`);
  }
  return n;
}

function requireEnv(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new Error(`Missing required env: ${name}`);
  }
  return value;
}

/** `device1:secret1,device2:secret2` */
function parseDeviceCredentials(raw: string | undefined): Map<string, string> {
  const credentials = new Map<string, string>();
  if (!raw) return credentials;

  for (const entry of raw.split(",").map((s) => s.trim()).filter(Boolean)) {
    const sep = entry.indexOf(":");
    if (sep <= 0 || sep === entry.length - 1) {
      throw new Error("DEVICE_CREDENTIALS entries must look like deviceId:secret");
    }
    credentials.set(entry.slice(0, sep), entry.slice(sep + 1));
  }
  return credentials;
}

export type StateBackend = "redis" | "memory";

export interface AppConfig {
  env: string;
  port: number;

  state: {
    backend: StateBackend;
    redisUrl?: string;
    redisToken?: string;
  };

  upload: {
    dir: string;
    maxFileSizeBytes: number;
    maxChunkBytes: number;
    assemblyConcurrency: number;
  };

  gc: {
    intervalMs: number;
    staleAfterMs: number;
  };

  auth: {
    jwtSecret: string;
    tokenTtlSeconds: number;
    devices: Map<string, string>;
  };
}

export function loadConfig(env: Env = process.env): AppConfig {
  const backend = env.STATE_BACKEND?.trim() || "redis";
  if (backend !== "redis" && backend !== "memory") {
    throw new Error("STATE_BACKEND must be 'redis' or 'memory'");
  }

  return {
    env: env.NODE_ENV ?? "development",
    port: parsePositiveIntEnv(env, "PORT", 3000),

    state: {
      backend,
      ...(backend === "redis" && {
        redisUrl: requireEnv(env, "UPSTASH_REDIS_REST_URL"),
        redisToken: requireEnv(env, "UPSTASH_REDIS_REST_TOKEN"),
      }),
    },

    upload: {
      dir: path.resolve(requireEnv(env, "UPLOAD_DIR")),
      maxFileSizeBytes: parsePositiveIntEnv(env, "MAX_FILE_SIZE_BYTES", 15 * 1024 * 1024 * 1024), // 15 GB
      maxChunkBytes: parsePositiveIntEnv(env, "MAX_CHUNK_BYTES", 20 * 1024 * 1024), // 20 MB
      assemblyConcurrency: parsePositiveIntEnv(env, "ASSEMBLY_CONCURRENCY", 2),
    },

    gc: {
      intervalMs: parsePositiveIntEnv(env, "CLEANUP_INTERVAL_MS", 60 * 60 * 1000), // 1 hour
      staleAfterMs: parsePositiveIntEnv(env, "STALE_UPLOAD_TIMEOUT_MS", 24 * 60 * 60 * 1000), // 24 hours
    },

    auth: {
      jwtSecret: requireEnv(env, "AUTH_JWT_SECRET"),
      tokenTtlSeconds: parsePositiveIntEnv(env, "ACCESS_TOKEN_TTL_SECONDS", 24 * 60 * 60),
      devices: parseDeviceCredentials(env.DEVICE_CREDENTIALS),
    },
  };
}
