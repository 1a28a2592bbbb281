/**
 * Error taxonomy for the todo service.
 * @module errors
 */

/**
 * Failure kinds raised by the store and the HTTP boundary.
 *
 * - `NOT_FOUND`: no row matched the requested id
 * - `STORE_FAILURE`: any other SQLite failure (I/O, constraint, bad statement)
 * - `REQUEST_MALFORMED`: request body or path failed to decode
 */
export type TodoErrorCode = "NOT_FOUND" | "STORE_FAILURE" | "REQUEST_MALFORMED";

/**
 * Base error class for all todo service errors.
 *
 * Carries a code for programmatic handling and preserves the
 * underlying cause for debugging.
 *
 * @example
 * ```typescript
 * try {
 *   store.read(42);
 * } catch (error) {
 *   if (TodoError.isTodoError(error) && error.isNotFound) {
 *     // 404
 *   }
 * }
 * ```
 */
export class TodoError extends Error {
  /** Error code for programmatic handling */
  readonly code: TodoErrorCode;

  constructor(
    message: string,
    code: TodoErrorCode,
    options: { cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });

    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = "TodoError";
    this.code = code;
  }

  /**
   * Type guard to check if an error is a TodoError.
   */
  static isTodoError(error: unknown): error is TodoError {
    return error instanceof TodoError;
  }

  /** Check if no row matched */
  get isNotFound(): boolean {
    return this.code === "NOT_FOUND";
  }

  /** Check if the request failed to decode */
  get isMalformed(): boolean {
    return this.code === "REQUEST_MALFORMED";
  }
}

/**
 * HTTP status for each error code.
 */
export function statusForErrorCode(code: TodoErrorCode): number {
  switch (code) {
    case "NOT_FOUND":
      return 404;
    case "REQUEST_MALFORMED":
      return 400;
    case "STORE_FAILURE":
      return 500;
    default: {
      const unreachable: never = code;
      return unreachable;
    }
  }
}

/**
 * HTTP status for any thrown value. Anything that is not a
 * TodoError is an internal failure.
 */
export function statusForError(error: unknown): number {
  return TodoError.isTodoError(error) ? statusForErrorCode(error.code) : 500;
}

/**
 * Wrap a store-level failure, passing TodoErrors through untouched.
 * @internal
 */
export function toStoreFailure(error: unknown, action: string): TodoError {
  if (TodoError.isTodoError(error)) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new TodoError(`Failed to ${action}: ${detail}`, "STORE_FAILURE", {
    cause: error,
  });
}

// ============================================
// Client-side transport failures
// ============================================

/**
 * Reasons a client request could not be completed.
 *
 * - `CONNECTION_FAILED`: the server could not be reached
 * - `INVALID_PAYLOAD`: the response body is not UTF-8, or not the JSON it claims to be
 */
export type TransportErrorCode = "CONNECTION_FAILED" | "INVALID_PAYLOAD";

/**
 * Raised by TodoClient when no usable response was received.
 */
export class TransportError extends Error {
  readonly code: TransportErrorCode;

  constructor(
    message: string,
    code: TransportErrorCode,
    options: { cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = "TransportError";
    this.code = code;
  }

  static isTransportError(error: unknown): error is TransportError {
    return error instanceof TransportError;
  }
}

/**
 * Create a TransportError from a fetch failure.
 * Undici reports the socket error as the cause of "fetch failed".
 * @internal
 */
export function createErrorFromNetworkFailure(
  error: unknown,
  url: string,
): TransportError {
  const cause = error instanceof Error ? error.cause : undefined;
  const detail =
    cause instanceof Error
      ? cause.message
      : error instanceof Error
        ? error.message
        : String(error);
  return new TransportError(
    `Cannot connect to ${url}: ${detail}`,
    "CONNECTION_FAILED",
    { cause: error },
  );
}
