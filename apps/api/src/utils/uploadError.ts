// src/utils/uploadError.ts

export type UploadErrorCode =
  | "MALFORMED_HEADER"
  | "CHECKSUM_MISMATCH"
  | "OUT_OF_BOUNDS"
  | "SIZE_CONFLICT"
  | "INVALID_TRANSITION"
  | "RANGE_UNAVAILABLE"
  | "RANGE_NOT_SATISFIABLE"
  | "FILE_NOT_READY"
  | "ASSEMBLY_FAILURE"
  | "UPLOAD_NOT_FOUND"
  | "UPLOAD_CLOSED"
  | "FINALIZATION_IN_PROGRESS";

/**
 * Engine error. `message` is safe to send to a client: it never carries
 * a storage path or an upstream error text. The underlying fault, if any,
 * rides on `cause` for logging only.
 */
export class UploadError extends Error {
  readonly code: UploadErrorCode;

  constructor(code: UploadErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UploadError";
    this.code = code;
  }
}

export function isUploadError(err: unknown, code?: UploadErrorCode): err is UploadError {
  return err instanceof UploadError && (code === undefined || err.code === code);
}
