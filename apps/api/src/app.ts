// src/app.ts

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import multipart from "@fastify/multipart";

import type { AppConfig } from "./config/uploads.config.js";
import type { UploadEngine } from "./services/upload/upload.engine.js";
import { CHUNK_HEADER_BYTES } from "./services/upload/chunk.codec.js";
import { deviceAuthHook } from "./auth/device.auth.js";
import authRoutes from "./routes/auth.routes.js";
import filesRoutes from "./routes/files.routes.js";
import healthRoute from "./routes/health.js";
import { sendApiError, sendUploadError } from "./utils/apiError.js";
import { isUploadError } from "./utils/uploadError.js";

export interface BuildAppOptions {
  config: Pick<AppConfig, "upload" | "auth">;
  engine: UploadEngine;
  loggerInstance?: FastifyBaseLogger;
}

function statusCodeOf(err: unknown): number {
  if (typeof err === "object" && err !== null && "statusCode" in err) {
    const code = err.statusCode;
    if (typeof code === "number" && Number.isInteger(code)) return code;
  }
  return 500;
}

export async function buildApp(opts: BuildAppOptions): Promise<FastifyInstance> {
  const { config, engine } = opts;
  const maxChunkBytes = config.upload.maxChunkBytes;

  const app = Fastify({
    // Silent when no logger is passed in.
    loggerInstance: opts.loggerInstance,
    // Requests should be chunk-sized (raw or multipart) or small JSON.
    bodyLimit: maxChunkBytes + 1024 * 1024,
    // GET /v1/files/:filename answers HEAD itself without opening the file.
    exposeHeadRoutes: false,
  });

  await app.register(multipart, {
    attachFieldsToBody: false,
    throwFileSizeLimit: false,
    limits: {
      // One chunk per request.
      fileSize: maxChunkBytes + CHUNK_HEADER_BYTES,
      files: 1,
    },
  });

  app.decorateRequest("owner", "");

  app.setErrorHandler((err, req, reply) => {
    if (isUploadError(err)) {
      return sendUploadError(reply, err);
    }

    const statusCode = statusCodeOf(err);

    req.log.error(
      { err, url: req.url, method: req.method, requestId: req.id },
      "Request error"
    );

    if (statusCode < 500) {
      return sendApiError(
        reply,
        statusCode,
        "INVALID_REQUEST",
        err instanceof Error ? err.message : "Invalid request"
      );
    }

    return sendApiError(reply, 500, "INTERNAL_ERROR", "Unexpected server error");
  });

  await app.register(healthRoute, { repo: engine.repo, uploadDir: config.upload.dir });
  await app.register(authRoutes, config.auth);

  await app.register(async (scope) => {
    scope.addHook("onRequest", deviceAuthHook(config.auth.jwtSecret));
    await scope.register(filesRoutes, { service: engine.service, maxChunkBytes });
  });

  return app;
}
