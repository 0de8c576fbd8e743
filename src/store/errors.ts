/**
 * Store error taxonomy.
 *
 * Every failure the store reports to its callers is a StoreError with one of
 * a closed set of kinds. Raw filesystem errors never cross the store
 * boundary; they are wrapped as StorageFailure (or NotFound for ENOENT).
 */

export type StoreErrorKind =
  | "UnknownTenant"
  | "PathTraversal"
  | "NotFound"
  | "InvalidContent"
  | "UnsupportedAssetType"
  | "MalformedIdentifier"
  | "AlreadyExists"
  | "StorageFailure";

export class StoreError extends Error {
  constructor(
    public readonly kind: StoreErrorKind,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "StoreError";
  }
}

export function isStoreError(value: unknown, kind?: StoreErrorKind): value is StoreError {
  if (!(value instanceof StoreError)) return false;
  return kind === undefined || value.kind === kind;
}

/** Node error code of a thrown value, if it carries one. */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map a raw filesystem error to a StoreError.
 *
 * StoreErrors pass through untouched. ENOENT and ENOTDIR mean the target (or
 * one of its parents) is missing, which callers see as NotFound; everything
 * else (EACCES, ENOSPC, EIO, ...) becomes StorageFailure.
 */
export function toStoreError(error: unknown, what: string): StoreError {
  if (error instanceof StoreError) return error;

  const code = errnoCode(error);
  if (code === "ENOENT" || code === "ENOTDIR") {
    return new StoreError("NotFound", `${what} does not exist`, error);
  }
  return storageFailure(error, what);
}

/**
 * Wrap a failure on the write path. Missing parents there are not a caller
 * error (the store creates them), so nothing maps to NotFound.
 */
export function storageFailure(error: unknown, what: string): StoreError {
  if (error instanceof StoreError) return error;
  const detail = error instanceof Error ? error.message : String(error);
  return new StoreError("StorageFailure", `Storage failure on ${what}: ${detail}`, error);
}
