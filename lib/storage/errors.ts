export type BlobStoreErrorCode = "invalid_ref" | "not_found" | "too_large" | "empty" | "read_failed";

export class BlobStoreError extends Error {
  readonly code: BlobStoreErrorCode;

  constructor(code: BlobStoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BlobStoreError";
    this.code = code;
  }
}
