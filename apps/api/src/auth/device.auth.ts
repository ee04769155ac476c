// src/auth/device.auth.ts

import crypto from "crypto";
import jwt from "jsonwebtoken";
import type { FastifyReply, FastifyRequest } from "fastify";

import { sendApiError } from "../utils/apiError.js";

declare module "fastify" {
  interface FastifyRequest {
    // Verified device id; empty until the auth hook has run.
    owner: string;
  }
}

export interface DeviceAuthOptions {
  jwtSecret: string;
  tokenTtlSeconds: number;
  devices: ReadonlyMap<string, string>;
}

export interface IssuedToken {
  accessToken: string;
  tokenType: "bearer";
  expiresIn: number;
}

function sameSecret(a: string, b: string): boolean {
  const ha = crypto.createHash("sha256").update(a).digest();
  const hb = crypto.createHash("sha256").update(b).digest();
  return crypto.timingSafeEqual(ha, hb);
}

/** Null when the device is unknown or the secret does not match. */
export function issueToken(
  opts: DeviceAuthOptions,
  deviceId: string,
  secret: string
): IssuedToken | null {
  const expected = opts.devices.get(deviceId);
  if (expected === undefined || !sameSecret(expected, secret)) return null;

  const accessToken = jwt.sign({}, opts.jwtSecret, {
    algorithm: "HS256",
    subject: deviceId,
    expiresIn: opts.tokenTtlSeconds,
  });

  return { accessToken, tokenType: "bearer", expiresIn: opts.tokenTtlSeconds };
}

/** Returns the token subject; throws on a bad or expired token. */
export function verifyToken(jwtSecret: string, token: string): string {
  const payload = jwt.verify(token, jwtSecret, { algorithms: ["HS256"] });
  if (typeof payload === "string" || !payload.sub) {
    throw new jwt.JsonWebTokenError("missing subject claim");
  }
  return payload.sub;
}

export function deviceAuthHook(jwtSecret: string) {
  return async function authenticate(req: FastifyRequest, reply: FastifyReply) {
    const header = req.headers.authorization;

    if (!header || !header.startsWith("Bearer ")) {
      return sendApiError(reply, 401, "UNAUTHORIZED", "Missing or malformed authorization header");
    }

    const token = header.slice(7).trim();
    if (!token) {
      return sendApiError(reply, 401, "UNAUTHORIZED", "Empty authorization token");
    }

    try {
      req.owner = verifyToken(jwtSecret, token);
    } catch (err) {
      // Don't expose JWT error details beyond expiry.
      const message =
        err instanceof jwt.TokenExpiredError ? "Token has expired" : "Invalid access token";
      return sendApiError(reply, 401, "UNAUTHORIZED", message);
    }
  };
}
