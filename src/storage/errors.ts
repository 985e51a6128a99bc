// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * No document database is configured for this process.
 */
export class StorageUnavailableError extends Error {
  constructor(message: string = 'Database not configured') {
    super(message);
    this.name = 'StorageUnavailableError';
  }
}

/**
 * A configured database rejected an operation. The driver error is kept as `cause`.
 */
export class StorageError extends Error {
  readonly operation: string;
  readonly collection?: string;

  constructor(operation: string, cause: unknown, collection?: string) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(collection ? `${operation} on ${collection} failed: ${reason}` : `${operation} failed: ${reason}`, { cause });
    this.name = 'StorageError';
    this.operation = operation;
    this.collection = collection;
  }
}
