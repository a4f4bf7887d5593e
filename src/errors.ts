export type LedgerErrorCode = "already_exists" | "lock_timeout" | "storage_unavailable";

export class LedgerError extends Error {
  constructor(
    public readonly code: LedgerErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${code}: ${message}`, options);
    this.name = "LedgerError";
  }
}

export function isLedgerError(error: unknown, code?: LedgerErrorCode): error is LedgerError {
  if (!(error instanceof LedgerError)) return false;
  return code === undefined || error.code === code;
}

/** Errors worth retrying: the store was busy or briefly unreachable. */
export function isTransientLedgerError(error: unknown): boolean {
  return isLedgerError(error, "lock_timeout") || isLedgerError(error, "storage_unavailable");
}
