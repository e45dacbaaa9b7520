export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Raised by the energy model and the ledger for values no caller should send,
 * such as a negative appliance count.
 */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class UnauthorizedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnauthorizedError";
  }
}

export class ForbiddenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ForbiddenError";
  }
}

/**
 * A storage operation failed. `serverUnavailable` is set when the backend
 * could not be reached at all, so callers can tell "try again later" apart
 * from a failed operation.
 */
export class DatabaseError extends Error {
  readonly serverUnavailable: boolean;

  constructor(
    message: string,
    options: { cause?: unknown; serverUnavailable?: boolean } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "DatabaseError";
    this.serverUnavailable = options.serverUnavailable ?? false;
  }
}

export class CorruptRecordError extends DatabaseError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "CorruptRecordError";
  }
}

const SERVER_UNAVAILABLE_ERRORS = new Set([
  "MongooseServerSelectionError",
  "MongoServerSelectionError",
  "MongoNetworkError",
  "MongoNetworkTimeoutError",
  "MongoNotConnectedError",
]);

export const isServerUnavailableError = (error: unknown): boolean =>
  error instanceof Error && SERVER_UNAVAILABLE_ERRORS.has(error.name);

export const toDatabaseError = (error: unknown, message: string): DatabaseError => {
  if (error instanceof DatabaseError) {
    return error;
  }
  return new DatabaseError(message, {
    cause: error,
    serverUnavailable: isServerUnavailableError(error),
  });
};
