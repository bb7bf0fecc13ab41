/**
 * Shared types for the maintenance module.
 */

/** Result of a maintenance task run */
export interface MaintenanceResult {
  success: boolean;
  duration: number;
  message: string;
  details?: Record<string, unknown>;
}

/** Maintenance task definition */
export interface MaintenanceTask {
  name: string;
  description: string;
  handler: () => Promise<MaintenanceResult>;
}
