/**
 * Index-time hook exports.
 */

// Hook utilities
export {
  executeHook,
  withRetry,
  createMetrics,
  completeMetrics,
  isTransientError,
} from './hook-utils.js';
export type { HookMetrics, RetryOptions } from './hook-utils.js';

// Link graph hooks
export { createGraphHooks } from './graph-hooks.js';
export type { GraphHooks } from './graph-hooks.js';

// Supersession hooks
export { createSupersessionHooks } from './supersession-hooks.js';
export type { SupersessionHooks, SupersessionHookResult } from './supersession-hooks.js';
