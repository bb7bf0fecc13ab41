/**
 * Standardized error types for docweave.
 *
 * All errors extend from DocweaveError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 * - Consistent error messages
 *
 * ## Usage
 *
 * ```typescript
 * import { RetrievalError } from './errors.js';
 *
 * try {
 *   hits = await vectorStore.search(embedding, topN, filter);
 * } catch (err) {
 *   throw new RetrievalError('Vector store unavailable', 'VECTOR_STORE_UNAVAILABLE', err);
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all docweave errors.
 *
 * - `code`: Programmatic error identifier (e.g., 'VECTOR_STORE_UNAVAILABLE')
 * - `cause`: Original error that caused this one
 * - `name`: Error class name (e.g., 'RetrievalError')
 */
export class DocweaveError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof DocweaveError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Storage Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from the storage layer (database, document and supersession stores).
 *
 * Common codes:
 * - `DB_QUERY_FAILED`: Query execution failed
 * - `DOCUMENT_NOT_FOUND`: Requested document doesn't exist
 * - `REPOSITORY_UNAVAILABLE`: Document or supersession repository unreachable
 */
export class StorageError extends DocweaveError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Retrieval Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors during retrieval and context assembly.
 *
 * Common codes:
 * - `VECTOR_STORE_UNAVAILABLE`: Vector search failed or backend unreachable
 * - `CRITICAL_FETCH_FAILED`: Critical document lookup failed
 * - `HYDRATION_FAILED`: Linked documents could not be loaded
 */
export class RetrievalError extends DocweaveError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Graph Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from the document link graph.
 *
 * Common codes:
 * - `INVALID_PATH`: Empty or non-string vertex identity
 */
export class GraphError extends DocweaveError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Supersession Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from the supersession tracker.
 *
 * Data-quality problems (cycles, dangling targets) are warnings, not errors.
 * This type covers repository failures surfaced during a chain operation.
 *
 * Common codes:
 * - `LOOKUP_FAILED`: Repository read failed mid-operation
 * - `REGISTRATION_FAILED`: Repository write failed
 */
export class SupersessionError extends DocweaveError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_INVALID`: Configuration validation failed
 * - `INVALID_OPTIONS`: Retrieval options out of range
 */
export class ConfigError extends DocweaveError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Cancellation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Raised when an operation observes an aborted signal.
 *
 * Cancellation is an early exit, not a failure: callers should check
 * `isCancellation()` before reporting it.
 */
export class OperationCancelledError extends DocweaveError {
  constructor(operation: string, cause?: unknown) {
    super(`${operation} was cancelled`, 'CANCELLED', cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a docweave error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof DocweaveError && error.code === code;
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}

export function isGraphError(error: unknown): error is GraphError {
  return error instanceof GraphError;
}

export function isSupersessionError(error: unknown): error is SupersessionError {
  return error instanceof SupersessionError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Wrap an unknown error in a DocweaveError.
 *
 * If the error is already a DocweaveError, returns it unchanged.
 */
export function wrapError(error: unknown, message?: string): DocweaveError {
  if (error instanceof DocweaveError) {
    return error;
  }

  const errorMessage = message ?? (error instanceof Error ? error.message : String(error));
  return new DocweaveError(errorMessage, 'UNKNOWN', error);
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
