// src/utils/logger.ts

import type { FastifyBaseLogger } from "fastify";

// The slice of Fastify's pino logger the engine writes to.
export type EngineLogger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;
