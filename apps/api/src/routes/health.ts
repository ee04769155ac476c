// src/routes/health.ts

import fs from "fs/promises";
import { constants } from "fs";
import type { FastifyInstance } from "fastify";

import type { SessionRepository } from "../state/session.repository.js";

export interface HealthRouteOptions {
  repo: SessionRepository;
  uploadDir: string;
}

export default async function healthRoute(app: FastifyInstance, opts: HealthRouteOptions) {
  app.get("/health", async (req, reply) => {
    const start = Date.now();
    const timestamp = new Date().toISOString();

    let stateOk = false;
    let latencyMs: number | null = null;

    try {
      await opts.repo.ping();
      stateOk = true;
      latencyMs = Date.now() - start;
    } catch (err) {
      req.log.error({ err }, "State Backend Health Check Failed");
    }

    let storageOk = false;
    try {
      await fs.access(opts.uploadDir, constants.R_OK | constants.W_OK);
      storageOk = true;
    } catch (err) {
      req.log.error({ err }, "Upload Directory Health Check Failed");
    }

    const ready = stateOk && storageOk;

    return reply.status(ready ? 200 : 503).send({
      status: ready ? "UP" : "DOWN",
      service: "chunkvault-api-v1",
      ready,
      timestamp,
      checks: {
        state: {
          ok: stateOk,
          latencyMs,
          timestamp,
        },
        storage: {
          ok: storageOk,
        },
      },
    });
  });
}
