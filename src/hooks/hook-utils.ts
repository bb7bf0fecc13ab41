/**
 * Hook utilities: retry with backoff, execution metrics, logging.
 *
 * Index-time hooks run inside an indexer's write path, so a locked database
 * is retried and everything else propagates.
 */

import { isCancellation } from '../utils/cancellation.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('hooks');

/** Hook execution metrics */
export interface HookMetrics {
  hookName: string;
  startTime: number;
  endTime?: number;
  durationMs?: number;
  success?: boolean;
  retryCount: number;
  error?: string;
}

/** Retry options */
export interface RetryOptions {
  /** Maximum number of retries. Default: 3 */
  maxRetries?: number;
  /** Initial delay in ms. Default: 50 */
  initialDelayMs?: number;
  /** Maximum delay in ms. Default: 1000 */
  maxDelayMs?: number;
  /** Backoff multiplier. Default: 2 */
  backoffFactor?: number;
  /** Errors to retry on. Default: isTransientError */
  retryOn?: (error: Error) => boolean;
}

function calculateBackoff(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffFactor: number,
): number {
  const delay = initialDelayMs * Math.pow(backoffFactor, attempt);
  return Math.min(delay, maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic. Cancellation is never retried.
 */
export async function withRetry<T>(
  hookName: string,
  fn: () => Promise<T>,
  options: RetryOptions = {},
  metrics?: HookMetrics,
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 50,
    maxDelayMs = 1000,
    backoffFactor = 2,
    retryOn = isTransientError,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      if (isCancellation(err) || !retryOn(err) || attempt >= maxRetries) {
        throw err;
      }

      const delay = calculateBackoff(attempt, initialDelayMs, maxDelayMs, backoffFactor);
      log.warn(`${hookName} failed, retrying`, { attempt: attempt + 1, delay, error: err.message });
      await sleep(delay);
      if (metrics) metrics.retryCount++;
    }
  }
}

export function createMetrics(hookName: string): HookMetrics {
  return {
    hookName,
    startTime: Date.now(),
    retryCount: 0,
  };
}

export function completeMetrics(metrics: HookMetrics, success: boolean, error?: unknown): HookMetrics {
  metrics.endTime = Date.now();
  metrics.durationMs = metrics.endTime - metrics.startTime;
  metrics.success = success;
  if (error !== undefined) {
    metrics.error = errorMessage(error);
  }
  return metrics;
}

/**
 * Wrap a hook body with logging, metrics, and optional retry.
 */
export async function executeHook<T>(
  hookName: string,
  fn: () => Promise<T>,
  options: { retry?: RetryOptions } = {},
): Promise<{ result: T; metrics: HookMetrics }> {
  const metrics = createMetrics(hookName);

  try {
    const result = options.retry ? await withRetry(hookName, fn, options.retry, metrics) : await fn();
    completeMetrics(metrics, true);
    log.debug(`${hookName} completed`, { durationMs: metrics.durationMs, retries: metrics.retryCount });
    return { result, metrics };
  } catch (error) {
    completeMetrics(metrics, false, error);
    if (!isCancellation(error)) {
      log.error(`${hookName} failed`, { durationMs: metrics.durationMs, error: metrics.error });
    }
    throw error;
  }
}

const TRANSIENT_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED'];
const TRANSIENT_MESSAGES = ['database is locked', 'database table is locked'];

function hasTransientCode(error: Error): boolean {
  const code = 'code' in error ? error.code : undefined;
  if (typeof code !== 'string') return false;
  // Extended result codes such as SQLITE_BUSY_SNAPSHOT count too
  return TRANSIENT_CODES.some((base) => code === base || code.startsWith(`${base}_`));
}

/**
 * Check if an error is transient (worth retrying). Walks the whole cause
 * chain, since store and tracker errors wrap the driver's error.
 */
export function isTransientError(error: Error): boolean {
  const seen = new Set<Error>();
  let current: unknown = error;

  while (current instanceof Error && !seen.has(current)) {
    seen.add(current);
    if (hasTransientCode(current)) return true;
    const message = current.message.toLowerCase();
    if (TRANSIENT_MESSAGES.some((text) => message.includes(text)) || message.includes('sqlite_busy')) {
      return true;
    }
    current = current.cause;
  }
  return false;
}
