export class PrivacyLedgerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PrivacyLedgerError";
  }
}

export class DatabaseNotInitializedError extends PrivacyLedgerError {
  constructor() {
    super("Database is not initialized. Call db_init first.", "DB_NOT_INITIALIZED");
    this.name = "DatabaseNotInitializedError";
  }
}

export class DatabaseAlreadyInitializedError extends PrivacyLedgerError {
  constructor() {
    super("Database is already initialized.", "DB_ALREADY_INITIALIZED");
    this.name = "DatabaseAlreadyInitializedError";
  }
}

export class EntityNotFoundError extends PrivacyLedgerError {
  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`, "ENTITY_NOT_FOUND");
    this.name = "EntityNotFoundError";
  }
}

export class InvalidParameterError extends PrivacyLedgerError {
  constructor(message: string) {
    super(message, "INVALID_PARAMETER");
    this.name = "InvalidParameterError";
  }
}

export class VersionNotFoundError extends PrivacyLedgerError {
  constructor(documentId: string, versionNumber: number) {
    super(`Version ${versionNumber} not found for document ${documentId}`, "VERSION_NOT_FOUND");
    this.name = "VersionNotFoundError";
  }
}

export class DetectionError extends PrivacyLedgerError {
  constructor(category: string, cause: unknown) {
    super(`Pattern '${category}' could not be compiled: ${describeCause(cause)}`, "DETECTION_ERROR", { cause });
    this.name = "DetectionError";
  }
}

export class ClassifierUnavailableError extends PrivacyLedgerError {
  constructor(reason: string, cause?: unknown) {
    super(`External classifier unavailable: ${reason}`, "CLASSIFIER_UNAVAILABLE", { cause });
    this.name = "ClassifierUnavailableError";
  }
}

export class StorageError extends PrivacyLedgerError {
  constructor(operation: string, cause: unknown) {
    super(`Storage failure during ${operation}: ${describeCause(cause)}`, "STORAGE_ERROR", { cause });
    this.name = "StorageError";
  }
}

export class ReviewNotFoundError extends PrivacyLedgerError {
  constructor(reviewId: string) {
    super(`Review not found: ${reviewId}`, "REVIEW_NOT_FOUND");
    this.name = "ReviewNotFoundError";
  }
}

/**
 * Runs a persistence step, re-throwing driver failures as {@link StorageError}.
 * Domain errors raised inside the step pass through untouched.
 */
export function withStorage<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof PrivacyLedgerError) throw err;
    throw new StorageError(operation, err);
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
