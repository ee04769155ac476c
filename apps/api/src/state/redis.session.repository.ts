// src/state/redis.session.repository.ts

import type { ByteRange, UploadSession, UploadState } from "../types/upload.js";
import type { EngineLogger } from "../utils/logger.js";
import type { SessionRepository } from "./session.repository.js";
import { uploadKeys } from "./keys.js";

const STATES: readonly UploadState[] = [
  "PENDING",
  "IN_PROGRESS",
  "COMPLETE",
  "FAILED",
  "EXPIRED",
];

function isUploadState(value: unknown): value is UploadState {
  return typeof value === "string" && STATES.some((s) => s === value);
}

function parseRanges(raw: string | undefined): ByteRange[] | null {
  if (!raw) return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!Array.isArray(parsed)) return null;

  const ranges: ByteRange[] = [];
  for (const entry of parsed) {
    if (!Array.isArray(entry) || entry.length !== 2) return null;
    const [start, end] = entry;
    if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) return null;
    ranges.push({ start, end });
  }
  return ranges;
}

function serialize(session: UploadSession): Record<string, string> {
  return {
    filename: session.filename,
    owner: session.owner,
    totalSize: String(session.totalSize),
    receivedRanges: JSON.stringify(session.receivedRanges.map((r) => [r.start, r.end])),
    state: session.state,
    createdAt: String(session.createdAt),
    lastActivityAt: String(session.lastActivityAt),
    ...(session.completedAt !== undefined && { completedAt: String(session.completedAt) }),
    ...(session.error !== undefined && { error: session.error }),
  };
}

function field(data: Record<string, unknown>, name: string): string | undefined {
  const value = data[name];
  return typeof value === "string" ? value : undefined;
}

function deserialize(data: Record<string, unknown>): UploadSession {
  const filename = field(data, "filename");
  const owner = field(data, "owner");
  const totalSize = Number(field(data, "totalSize"));
  const createdAt = Number(field(data, "createdAt"));
  const lastActivityAt = Number(field(data, "lastActivityAt"));
  const receivedRanges = parseRanges(field(data, "receivedRanges"));
  const state = field(data, "state");
  const completedAt = field(data, "completedAt");
  const error = field(data, "error");

  if (
    filename === undefined ||
    owner === undefined ||
    !Number.isSafeInteger(totalSize) ||
    totalSize <= 0 ||
    !Number.isFinite(createdAt) ||
    !Number.isFinite(lastActivityAt) ||
    !isUploadState(state) ||
    !receivedRanges
  ) {
    throw new Error("CORRUPT_UPLOAD_SESSION");
  }

  return {
    filename,
    owner,
    totalSize,
    receivedRanges,
    state,
    createdAt,
    lastActivityAt,
    ...(completedAt !== undefined && { completedAt: Number(completedAt) }),
    ...(error !== undefined && { error }),
  };
}

/**
 * The slice of the Upstash client the repository uses. Values come back as
 * plain strings (`automaticDeserialization: false`).
 */
export interface SessionRedisClient {
  hgetall(key: string): Promise<Record<string, unknown> | null>;
  smembers(key: string): Promise<string[]>;
  multi(): SessionRedisTransaction;
  ping(): Promise<unknown>;
}

export interface SessionRedisTransaction {
  del(...keys: string[]): SessionRedisTransaction;
  hset(key: string, kv: Record<string, string>): SessionRedisTransaction;
  sadd(key: string, member: string): SessionRedisTransaction;
  srem(key: string, member: string): SessionRedisTransaction;
  exec(): Promise<unknown>;
}

export class RedisSessionRepository implements SessionRepository {
  constructor(
    private readonly redis: SessionRedisClient,
    private readonly log: EngineLogger
  ) {}

  async get(sessionId: string): Promise<UploadSession | null> {
    const data = await this.redis.hgetall(uploadKeys.session(sessionId));

    if (!data || Object.keys(data).length === 0) {
      return null;
    }

    return deserialize(data);
  }

  async save(sessionId: string, session: UploadSession): Promise<void> {
    const sessionKey = uploadKeys.session(sessionId);

    // del + hset in one MULTI so fields from a replaced session never linger.
    const results = await this.redis
      .multi()
      .del(sessionKey)
      .hset(sessionKey, serialize(session))
      .sadd(uploadKeys.ownerIndex(session.owner), sessionId)
      .sadd(uploadKeys.allIndex(), sessionId)
      .exec();

    if (!results) {
      throw new Error("REDIS_TRANSACTION_FAILED");
    }
  }

  async delete(sessionId: string, owner: string): Promise<void> {
    const results = await this.redis
      .multi()
      .del(uploadKeys.session(sessionId))
      .srem(uploadKeys.ownerIndex(owner), sessionId)
      .srem(uploadKeys.allIndex(), sessionId)
      .exec();

    if (!results) {
      throw new Error("REDIS_TRANSACTION_FAILED");
    }
  }

  async listByOwner(owner: string): Promise<UploadSession[]> {
    const ids = await this.redis.smembers(uploadKeys.ownerIndex(owner));
    return this.load(ids);
  }

  async listAll(): Promise<UploadSession[]> {
    const ids = await this.redis.smembers(uploadKeys.allIndex());
    return this.load(ids);
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  /** Unreadable records are logged and left out; one bad hash never hides the rest. */
  private async load(ids: string[]): Promise<UploadSession[]> {
    if (!ids.length) return [];

    const sessions = await Promise.all(
      ids.map(async (id) => {
        try {
          return await this.get(id);
        } catch (err) {
          this.log.error({ err, sessionId: id }, "Skipping unreadable upload session");
          return null;
        }
      })
    );
    return sessions.filter((s): s is UploadSession => s !== null);
  }
}
