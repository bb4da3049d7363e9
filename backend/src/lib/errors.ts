export type ErrorKind =
  | "TRANSIENT_COLLABORATOR"
  | "COLLABORATOR"
  | "RETRY_EXHAUSTED"
  | "MALFORMED_INPUT"
  | "STATE_CONFLICT"
  | "INTERNAL";

export type CollaboratorName = "notifier" | "objectStore" | "validator" | "structuredStore" | "poller";

export class CollaboratorError extends Error {
  readonly kind: ErrorKind = "COLLABORATOR";

  constructor(
    readonly collaborator: CollaboratorName,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CollaboratorError";
  }
}

/** Network failures, timeouts, 5xx and 429 responses. Retried under a {@link RetryPolicy}. */
export class TransientCollaboratorError extends CollaboratorError {
  override readonly kind: ErrorKind = "TRANSIENT_COLLABORATOR";

  constructor(collaborator: CollaboratorName, message: string, status?: number, options?: { cause?: unknown }) {
    super(collaborator, message, status, options);
    this.name = "TransientCollaboratorError";
  }
}

export class RetryExhaustedError extends Error {
  readonly kind: ErrorKind = "RETRY_EXHAUSTED";

  constructor(
    readonly label: string,
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(
      `${label} failed after ${attempts} attempt(s): ${lastError instanceof Error ? lastError.message : String(lastError)}`,
      { cause: lastError },
    );
    this.name = "RetryExhaustedError";
  }
}

export class MalformedInputError extends Error {
  readonly kind: ErrorKind = "MALFORMED_INPUT";

  constructor(message: string) {
    super(message);
    this.name = "MalformedInputError";
  }
}

export class StateConflictError extends Error {
  readonly kind: ErrorKind = "STATE_CONFLICT";

  constructor(
    readonly applicationId: string,
    readonly expectedVersion: number,
  ) {
    super(`Workflow record ${applicationId} changed since version ${expectedVersion}`);
    this.name = "StateConflictError";
  }
}

export const errorKindOf = (error: unknown): ErrorKind => {
  if (
    error instanceof CollaboratorError ||
    error instanceof RetryExhaustedError ||
    error instanceof MalformedInputError ||
    error instanceof StateConflictError
  ) {
    return error.kind;
  }
  return "INTERNAL";
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const readProperty = (value: unknown, key: string): unknown => {
  if (value === null || typeof value !== "object") {
    return undefined;
  }
  return Reflect.get(value, key);
};

// googleapis errors carry `code`, AWS SDK errors carry `$metadata.httpStatusCode`,
// gaxios errors carry `response.status`.
const extractStatus = (error: unknown): number | undefined => {
  const candidates = [
    readProperty(error, "status"),
    readProperty(error, "code"),
    readProperty(readProperty(error, "response"), "status"),
    readProperty(readProperty(error, "$metadata"), "httpStatusCode"),
    readProperty(readProperty(error, "cause"), "status"),
  ];
  for (const candidate of candidates) {
    const value = Number(candidate);
    if (Number.isInteger(value) && value >= 100 && value < 600) {
      return value;
    }
  }
  return undefined;
};

export const isTransientStatus = (status: number | undefined): boolean =>
  status === undefined || status === 408 || status === 429 || status >= 500;

/**
 * Maps an error thrown by a collaborator SDK onto the taxonomy.
 * Errors without an HTTP status (sockets, DNS, aborts) are treated as transient.
 */
export const toCollaboratorError = (error: unknown, collaborator: CollaboratorName): CollaboratorError => {
  if (error instanceof CollaboratorError) {
    return error;
  }
  const status = extractStatus(error);
  const message = errorMessage(error);
  if (isTransientStatus(status)) {
    return new TransientCollaboratorError(collaborator, message, status, { cause: error });
  }
  return new CollaboratorError(collaborator, message, status, { cause: error });
};
