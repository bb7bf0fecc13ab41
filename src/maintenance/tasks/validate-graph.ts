/**
 * Maintenance task: Enumerate link cycles and report graph shape.
 *
 * Cycles are legal in the link graph; they are reported, not repaired.
 */

import type { DocumentGraph } from '../../graph/types.js';
import { errorMessage } from '../../utils/errors.js';
import type { MaintenanceResult } from '../types.js';

export interface ValidateGraphDeps {
  graph: Pick<DocumentGraph, 'enumerateCycles' | 'stats'>;
}

export async function validateGraph(deps: ValidateGraphDeps): Promise<MaintenanceResult> {
  const startTime = Date.now();

  try {
    const cycles = await deps.graph.enumerateCycles();
    const stats = await deps.graph.stats();

    return {
      success: true,
      duration: Date.now() - startTime,
      message:
        `Graph has ${stats.vertexCount} vertices, ${stats.edgeCount} edges ` +
        `(${stats.danglingCount} dangling), ${cycles.length} cycles`,
      details: { ...stats, cycleCount: cycles.length, cycles },
    };
  } catch (error) {
    return {
      success: false,
      duration: Date.now() - startTime,
      message: `Graph validation failed: ${errorMessage(error)}`,
    };
  }
}
