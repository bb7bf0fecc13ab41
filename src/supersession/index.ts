/**
 * Supersession chain tracking.
 */

export { SupersessionTracker } from './supersession-tracker.js';
export type { SupersessionTrackerDeps } from './supersession-tracker.js';
export type {
  RegistrationResult,
  SupersessionInfo,
  RemovalResult,
  ChainIssue,
  ChainIssueKind,
  ReconcileResult,
} from './types.js';
