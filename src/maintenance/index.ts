/**
 * Maintenance module exports.
 */

export {
  buildMaintenanceTasks,
  runTask,
  runIntegrityCheck,
  type IntegrityCheckDeps,
  type IntegrityReport,
} from './integrity-check.js';
export type { MaintenanceResult, MaintenanceTask } from './types.js';
export * from './tasks/index.js';
