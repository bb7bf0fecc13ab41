/**
 * Maintenance task: Resolve supersession targets that were not indexed when
 * the relation was registered.
 */

import type { ReconcileResult } from '../../supersession/types.js';
import { errorMessage } from '../../utils/errors.js';
import type { MaintenanceResult } from '../types.js';

export interface ReconcileSupersessionsDeps {
  reconcileDanglingTargets: () => Promise<ReconcileResult>;
}

export async function reconcileSupersessions(
  deps: ReconcileSupersessionsDeps,
): Promise<MaintenanceResult> {
  const startTime = Date.now();

  try {
    const result = await deps.reconcileDanglingTargets();

    return {
      success: true,
      duration: Date.now() - startTime,
      message:
        `Resolved ${result.resolved} supersession targets ` +
        `(${result.stillDangling} still dangling, ${result.rejected} rejected)`,
      details: { ...result },
    };
  } catch (error) {
    return {
      success: false,
      duration: Date.now() - startTime,
      message: `Supersession reconciliation failed: ${errorMessage(error)}`,
    };
  }
}
