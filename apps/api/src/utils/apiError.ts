// src/utils/apiError.ts

import type { FastifyReply } from "fastify";
import type { UploadError, UploadErrorCode } from "./uploadError.js";

/**
 * Canonical API error codes.
 * MUST stay in sync with routes and services.
 */
export type ApiErrorCode =
  | UploadErrorCode
  | "INVALID_REQUEST"
  | "UNAUTHORIZED"
  | "INTERNAL_ERROR";

export interface ApiErrorResponse {
  error: {
    code: ApiErrorCode;
    message: string;
    retryable: boolean;
    details?: Record<string, unknown>;
  };
}

export function sendApiError(
  reply: FastifyReply,
  statusCode: number,
  code: ApiErrorCode,
  message: string,
  options?: {
    retryable?: boolean;
    details?: Record<string, unknown>;
  }
) {
  const safeStatus =
    Number.isInteger(statusCode) &&
    statusCode >= 400 &&
    statusCode <= 599
      ? statusCode
      : 500;

  const response: ApiErrorResponse = {
    error: {
      code,
      message,
      retryable: options?.retryable ?? false,
      ...(options?.details && { details: options.details }),
    },
  };

  return reply.code(safeStatus).send(response);
}

const UPLOAD_ERROR_STATUS: Record<UploadErrorCode, { status: number; retryable: boolean }> = {
  MALFORMED_HEADER: { status: 400, retryable: false },
  CHECKSUM_MISMATCH: { status: 400, retryable: true },
  OUT_OF_BOUNDS: { status: 400, retryable: false },
  SIZE_CONFLICT: { status: 409, retryable: false },
  INVALID_TRANSITION: { status: 500, retryable: false },
  RANGE_UNAVAILABLE: { status: 409, retryable: false },
  RANGE_NOT_SATISFIABLE: { status: 416, retryable: false },
  FILE_NOT_READY: { status: 409, retryable: true },
  ASSEMBLY_FAILURE: { status: 500, retryable: false },
  UPLOAD_NOT_FOUND: { status: 404, retryable: false },
  UPLOAD_CLOSED: { status: 409, retryable: false },
  FINALIZATION_IN_PROGRESS: { status: 409, retryable: true },
};

export function sendUploadError(reply: FastifyReply, err: UploadError) {
  const { status, retryable } = UPLOAD_ERROR_STATUS[err.code];
  return sendApiError(reply, status, err.code, err.message, { retryable });
}
