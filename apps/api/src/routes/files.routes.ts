// src/routes/files.routes.ts

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

import type { ByteRange } from "../types/upload.js";
import type { UploadService } from "../services/upload/upload.service.js";
import { CHUNK_HEADER_BYTES } from "../services/upload/chunk.codec.js";
import { parseRangeHeader } from "../services/upload/upload.read.js";
import { sendApiError, sendUploadError } from "../utils/apiError.js";
import { isUploadError } from "../utils/uploadError.js";

export interface FilesRoutesOptions {
  service: UploadService;
  maxChunkBytes: number;
}

type FileParams = { filename: string };
type ChunkRoute = {
  Params: FileParams;
  Querystring: { size?: string };
  Body: Buffer | undefined;
};

const MAX_FILENAME_LENGTH = 255;

function isValidFilename(filename: string): boolean {
  return (
    filename.length > 0 &&
    filename.length <= MAX_FILENAME_LENGTH &&
    !filename.includes("/") &&
    !filename.includes("\0")
  );
}

function parseTotalSize(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d+$/.test(raw)) return null;
  const n = Number(raw);
  return Number.isSafeInteger(n) && n > 0 ? n : null;
}

/**
 * Engine errors map onto the API envelope; anything else is left for the
 * app-level error handler.
 */
function handleUploadError(reply: FastifyReply, err: unknown) {
  if (isUploadError(err)) return sendUploadError(reply, err);
  throw err;
}

async function readChunkBody(
  req: FastifyRequest<ChunkRoute>
): Promise<Buffer | { error: string }> {
  if (req.isMultipart()) {
    const part = await req.file();
    if (!part || part.fieldname !== "file") {
      return { error: "Multipart file field required" };
    }

    const data = await part.toBuffer();
    if (part.file.truncated) {
      return { error: "Chunk exceeds the size limit" };
    }
    return data;
  }

  if (!Buffer.isBuffer(req.body)) {
    return { error: "Chunk body must be application/octet-stream or multipart/form-data" };
  }
  return req.body;
}

export default async function filesRoutes(app: FastifyInstance, opts: FilesRoutesOptions) {
  const { service, maxChunkBytes } = opts;

  app.addContentTypeParser(
    "application/octet-stream",
    { parseAs: "buffer", bodyLimit: maxChunkBytes + CHUNK_HEADER_BYTES },
    (_req, body, done) => {
      done(null, body);
    }
  );

  app.put<ChunkRoute>(
    "/v1/files/:filename/chunks",
    async (req, reply) => {
      const { filename } = req.params;

      if (!isValidFilename(filename)) {
        return sendApiError(reply, 400, "INVALID_REQUEST", "Invalid filename");
      }

      const totalSize = parseTotalSize(req.query.size);
      if (totalSize === null) {
        return sendApiError(reply, 400, "INVALID_REQUEST", "size must be a positive integer");
      }

      const body = await readChunkBody(req);
      if (!Buffer.isBuffer(body)) {
        return sendApiError(reply, 400, "INVALID_REQUEST", body.error);
      }

      try {
        const snapshot = await service.uploadChunk(req.owner, filename, totalSize, body);
        return reply.code(200).send(snapshot);
      } catch (err) {
        if (isUploadError(err)) {
          req.log.warn({ filename, code: err.code }, "Chunk rejected");
        }
        return handleUploadError(reply, err);
      }
    }
  );

  app.route<{ Params: FileParams }>({
    method: ["GET", "HEAD"],
    url: "/v1/files/:filename",
    handler: async (req, reply) => {
      const { filename } = req.params;

      if (!isValidFilename(filename)) {
        return sendApiError(reply, 400, "INVALID_REQUEST", "Invalid filename");
      }

      let totalSize = 0;
      try {
        const snapshot = await service.status(req.owner, filename);
        totalSize = snapshot.totalSize;

        const rangeHeader = req.headers.range;
        let range: ByteRange | undefined;
        // An incomplete file is FILE_NOT_READY whatever range was asked for.
        if (
          snapshot.state === "COMPLETE" &&
          typeof rangeHeader === "string" &&
          rangeHeader.trim() !== ""
        ) {
          range = parseRangeHeader(rangeHeader, totalSize);
        }

        const opened = await service.download(req.owner, filename, range);

        reply.header("Accept-Ranges", "bytes");
        reply.header("Content-Type", "application/octet-stream");
        reply.header("Content-Length", String(opened.range.end - opened.range.start + 1));

        const status = range ? 206 : 200;
        if (range) {
          reply.header("Content-Range", opened.contentRange);
        }

        if (req.method === "HEAD") {
          return reply.status(status).send();
        }

        return reply.status(status).send(opened.stream());
      } catch (err) {
        if (isUploadError(err, "RANGE_NOT_SATISFIABLE")) {
          reply.header("Content-Range", `bytes */${totalSize}`);
        }
        return handleUploadError(reply, err);
      }
    },
  });

  app.get<{ Params: FileParams }>("/v1/files/:filename/status", async (req, reply) => {
    const { filename } = req.params;

    if (!isValidFilename(filename)) {
      return sendApiError(reply, 400, "INVALID_REQUEST", "Invalid filename");
    }

    try {
      return reply.code(200).send(await service.status(req.owner, filename));
    } catch (err) {
      return handleUploadError(reply, err);
    }
  });

  app.get("/v1/files", async (req, reply) => {
    const files = await service.list(req.owner);
    return reply.code(200).send({ files });
  });

  app.delete<{ Params: FileParams }>("/v1/files/:filename", async (req, reply) => {
    const { filename } = req.params;

    if (!isValidFilename(filename)) {
      return sendApiError(reply, 400, "INVALID_REQUEST", "Invalid filename");
    }

    try {
      await service.delete(req.owner, filename);
      return reply.code(204).send();
    } catch (err) {
      return handleUploadError(reply, err);
    }
  });
}
