/**
 * Maintenance task: Check every supersession chain for cycles, dangling
 * targets and excess length.
 */

import type { ChainIssue, ChainIssueKind } from '../../supersession/types.js';
import { errorMessage } from '../../utils/errors.js';
import type { MaintenanceResult } from '../types.js';

export interface ValidateChainsDeps {
  validateAllChains: () => Promise<ChainIssue[]>;
}

export async function validateChains(deps: ValidateChainsDeps): Promise<MaintenanceResult> {
  const startTime = Date.now();

  try {
    const issues = await deps.validateAllChains();

    const byKind: Partial<Record<ChainIssueKind, number>> = {};
    for (const issue of issues) {
      byKind[issue.kind] = (byKind[issue.kind] ?? 0) + 1;
    }
    const summary = Object.entries(byKind)
      .map(([kind, count]) => `${count} ${kind}`)
      .join(', ');

    return {
      success: true,
      duration: Date.now() - startTime,
      message:
        issues.length === 0
          ? 'All supersession chains are valid'
          : `Found ${issues.length} chain issues (${summary})`,
      details: { issueCount: issues.length, byKind, issues },
    };
  } catch (error) {
    return {
      success: false,
      duration: Date.now() - startTime,
      message: `Chain validation failed: ${errorMessage(error)}`,
    };
  }
}
