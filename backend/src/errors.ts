export type BackendName = "embedding-generator" | "vector-index" | "document-store" | "language-model";

/**
 * Base error with a stable code and the HTTP status the API answers with.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class InvalidQuery extends AppError {
  constructor(message = "No vector to search with") {
    super(message, "INVALID_QUERY", 400);
    this.name = "InvalidQuery";
  }
}

export class InvalidEmbedding extends AppError {
  constructor(message = "Cannot store an empty vector") {
    super(message, "INVALID_EMBEDDING", 400);
    this.name = "InvalidEmbedding";
  }
}

export class InvalidOwner extends AppError {
  constructor(message = "Owner info must name at least one field") {
    super(message, "INVALID_OWNER", 400);
    this.name = "InvalidOwner";
  }
}

/**
 * A call into an external store or model failed. The original error stays
 * available as `cause`.
 */
export class BackendUnavailable extends AppError {
  constructor(
    public readonly backend: BackendName,
    public readonly operation: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${backend} ${operation} failed: ${reason}`, "BACKEND_UNAVAILABLE", 502, { backend, operation });
    this.name = "BackendUnavailable";
    this.cause = cause;
  }
}

export class UnknownActorType extends AppError {
  constructor(readonly tag: string) {
    super(
      `Actor type "${tag}" not found in registry. Did you forget to register it?`,
      "UNKNOWN_ACTOR_TYPE",
      500,
      { tag }
    );
    this.name = "UnknownActorType";
  }
}

export class CorruptRecord extends AppError {
  constructor(namespace: string, id: string, issues: string) {
    super(`Malformed record ${id} in ${namespace}: ${issues}`, "CORRUPT_RECORD", 500, { namespace, id });
    this.name = "CorruptRecord";
  }
}

export class ResponseValidationFailed extends AppError {
  constructor(attempts: number, lastReason: string) {
    super(
      `Could not get a valid response after ${attempts} attempts: ${lastReason}`,
      "RESPONSE_VALIDATION_FAILED",
      422,
      { attempts, lastReason }
    );
    this.name = "ResponseValidationFailed";
  }
}

export class BackendTimeout extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = "BackendTimeout";
  }
}

/**
 * Runs one external call with a deadline and reports any failure as
 * `BackendUnavailable`. Application errors raised inside the call are rethrown
 * unchanged.
 */
export async function callBackend<T>(
  backend: BackendName,
  operation: string,
  timeoutMs: number,
  fn: () => Promise<T>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new BackendTimeout(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([fn(), deadline]);
  } catch (err) {
    if (err instanceof AppError) throw err;
    throw new BackendUnavailable(backend, operation, err);
  } finally {
    clearTimeout(timer);
  }
}
