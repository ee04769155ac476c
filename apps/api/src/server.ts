// src/server.ts

import fs from "fs/promises";
import os from "os";
import path from "path";
import { pino } from "pino";

import { buildApp } from "./app.js";
import { loadConfig, type AppConfig } from "./config/uploads.config.js";
import { createEngine } from "./services/upload/upload.engine.js";
import { initRedis } from "./state/client.js";
import { MemorySessionRepository } from "./state/memory.session.repository.js";
import { RedisSessionRepository } from "./state/redis.session.repository.js";
import type { SessionRepository } from "./state/session.repository.js";

const logger = pino({
  level: process.env.NODE_ENV === "production" ? "info" : "debug",
  redact: {
    paths: ["req.headers.authorization"],
    remove: true,
  },
});

process.on("unhandledRejection", (reason) => {
  logger.error({ err: reason }, "Unhandled promise rejection");
});

process.on("uncaughtException", (err) => {
  logger.fatal({ err }, "Uncaught exception");
  process.exit(1);
});

async function validateUploadDir(dir: string) {
  const home = os.homedir();

  if (!path.isAbsolute(dir)) {
    throw new Error("UPLOAD_DIR must be an absolute path");
  }
  if (dir === "/" || dir === "/home" || dir === home) {
    throw new Error(`UPLOAD_DIR is unsafe: ${dir}`);
  }

  await fs.mkdir(dir, { recursive: true });

  // Verify we can write to the directory. This prevents starting with a
  // misconfigured path that will later fail during uploads/GC/delete.
  const marker = path.join(dir, `.chunkvault_write_test_${process.pid}_${Date.now()}`);
  await fs.writeFile(marker, "ok");
  await fs.unlink(marker);
}

let config: AppConfig;
let repo: SessionRepository;

try {
  config = loadConfig();
  await validateUploadDir(config.upload.dir);

  if (config.state.backend === "redis") {
    const redis = await initRedis({ url: config.state.redisUrl, token: config.state.redisToken });
    repo = new RedisSessionRepository(redis, logger);
    logger.info("Redis initialized");
  } else {
    repo = new MemorySessionRepository();
    logger.warn("Using in-memory session state; uploads will not survive a restart");
  }
} catch (err) {
  logger.error({ err }, "Failed to initialize server");
  process.exit(1);
}

const engine = createEngine(config, repo, logger);

const reconciled = await engine.reconcile();
logger.info(reconciled, "Upload state reconciled");

engine.gc.start();

const app = await buildApp({ config, engine, loggerInstance: logger });

try {
  await app.listen({
    port: config.port,
    host: "0.0.0.0",
  });

  app.log.info(
    { port: config.port, env: config.env },
    "API server started"
  );
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}

async function shutdown(signal: string) {
  app.log.info({ signal }, "Shutting down server");

  try {
    await engine.gc.stop();
    await app.close();
    await engine.assembler.onIdle();
    process.exit(0);
  } catch (err) {
    app.log.error(err, "Shutdown failed");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
