// src/routes/auth.routes.ts

import type { FastifyInstance } from "fastify";

import { issueToken, type DeviceAuthOptions } from "../auth/device.auth.js";
import { sendApiError } from "../utils/apiError.js";

type TokenBody = {
  deviceId?: unknown;
  secret?: unknown;
};

export default async function authRoutes(app: FastifyInstance, opts: DeviceAuthOptions) {
  app.post<{ Body: TokenBody | undefined }>("/v1/auth/token", async (req, reply) => {
    const deviceId = req.body?.deviceId;
    const secret = req.body?.secret;

    if (typeof deviceId !== "string" || !deviceId || typeof secret !== "string" || !secret) {
      return sendApiError(reply, 400, "INVALID_REQUEST", "deviceId and secret are required");
    }

    const issued = issueToken(opts, deviceId, secret);
    if (!issued) {
      req.log.warn({ deviceId }, "Rejected device credentials");
      return sendApiError(reply, 401, "UNAUTHORIZED", "Unknown device or wrong secret");
    }

    return reply.code(200).send(issued);
  });
}
