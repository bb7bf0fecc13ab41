/**
 * Integrity check over the link graph and supersession chains.
 *
 * Tasks run in order: reconciliation first, so chain validation sees
 * targets that have since been indexed.
 */

import type { DocumentGraph } from '../graph/types.js';
import type { SupersessionTracker } from '../supersession/supersession-tracker.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { reconcileSupersessions, validateChains, validateGraph } from './tasks/index.js';
import type { MaintenanceResult, MaintenanceTask } from './types.js';

const log = createLogger('maintenance');

export interface IntegrityCheckDeps {
  graph: Pick<DocumentGraph, 'enumerateCycles' | 'stats'>;
  tracker: Pick<SupersessionTracker, 'validateAllChains' | 'reconcileDanglingTargets'>;
}

export interface IntegrityReport {
  /** Every task succeeded and no chain issues remain */
  healthy: boolean;
  results: Map<string, MaintenanceResult>;
}

export function buildMaintenanceTasks(deps: IntegrityCheckDeps): MaintenanceTask[] {
  return [
    {
      name: 'reconcile-supersessions',
      description: 'Resolve supersession targets indexed after registration',
      handler: () =>
        reconcileSupersessions({
          reconcileDanglingTargets: () => deps.tracker.reconcileDanglingTargets(),
        }),
    },
    {
      name: 'validate-chains',
      description: 'Report supersession cycles, dangling targets and long chains',
      handler: () => validateChains({ validateAllChains: () => deps.tracker.validateAllChains() }),
    },
    {
      name: 'validate-graph',
      description: 'Enumerate link cycles and report graph statistics',
      handler: () => validateGraph({ graph: deps.graph }),
    },
  ];
}

/**
 * Run one task, converting a thrown error into a failed result.
 */
export async function runTask(task: MaintenanceTask): Promise<MaintenanceResult> {
  log.info(`Running maintenance task: ${task.name}`);
  const startTime = Date.now();

  try {
    const result = await task.handler();
    log.info(`Task ${task.name}: ${result.message}`, { durationMs: result.duration });
    return result;
  } catch (error) {
    log.error(`Task ${task.name} failed`, { error });
    return {
      success: false,
      duration: Date.now() - startTime,
      message: `Task failed: ${errorMessage(error)}`,
    };
  }
}

export async function runIntegrityCheck(deps: IntegrityCheckDeps): Promise<IntegrityReport> {
  const results = new Map<string, MaintenanceResult>();
  for (const task of buildMaintenanceTasks(deps)) {
    results.set(task.name, await runTask(task));
  }

  const chainIssues = results.get('validate-chains')?.details?.issueCount;
  const healthy =
    [...results.values()].every((result) => result.success) && chainIssues === 0;

  return { healthy, results };
}
