export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/** Invalid or missing configuration; raised once at startup. */
export class ConfigError extends AppError {
  constructor(message: string, public readonly key: string) {
    super(message);
  }
}

/**
 * The database could not complete an operation. Callers see this for the whole
 * ingestion or query call; retrying is left to them.
 */
export class StorageError extends AppError {
  constructor(public readonly operation: string, cause: unknown) {
    super(`Storage failure during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export function wrapStorage<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof StorageError) throw err;
    throw new StorageError(operation, err);
  }
}
