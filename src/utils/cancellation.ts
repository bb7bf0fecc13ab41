/**
 * Cooperative cancellation helpers built on AbortSignal.
 */

import { OperationCancelledError } from './errors.js';

/**
 * Throw OperationCancelledError if the signal has been aborted.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation, signal.reason);
  }
}

/**
 * True for errors that represent cancellation rather than failure.
 */
export function isCancellation(error: unknown): error is OperationCancelledError {
  return error instanceof OperationCancelledError;
}
