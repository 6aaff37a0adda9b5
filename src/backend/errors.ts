/**
 * Errors raised by the data layer
 */

export type BackendErrorCode =
  | "NOT_FOUND"
  | "INVALID_INPUT"
  | "INVALID_MOVE"
  | "STORAGE"
  | "NOT_INITIALIZED";

export class BackendError extends Error {
  readonly code: BackendErrorCode;

  constructor(code: BackendErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BackendError";
    this.code = code;
  }
}

export function notFound(entity: string, id: string): BackendError {
  return new BackendError("NOT_FOUND", `${entity} not found: ${id}`);
}

export function invalidInput(message: string): BackendError {
  return new BackendError("INVALID_INPUT", message);
}

export function isBackendError(error: unknown): error is BackendError {
  return error instanceof BackendError;
}
