export type PersistenceErrorCode = "SNAPSHOT_UNREADABLE" | "SNAPSHOT_INVALID" | "SNAPSHOT_UNWRITABLE";

export class PersistenceError extends Error {
  override name = "PersistenceError";
  override cause?: unknown;
  code: PersistenceErrorCode;

  constructor({ code, message, cause }: { code: PersistenceErrorCode; message: string; cause?: unknown }) {
    super(message);
    this.code = code;
    this.cause = cause;
  }
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
