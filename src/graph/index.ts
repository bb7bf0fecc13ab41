/**
 * Document link graph.
 */

export type {
  TraversalHit,
  CycleWarning,
  EdgeUpdateResult,
  DocumentLinks,
  GraphSnapshot,
  GraphStats,
  DocumentGraph,
} from './types.js';

export { LinkGraph } from './link-graph.js';
export { isReachable, shortestCycleThrough, stronglyConnectedComponents, findCycles } from './cycles.js';
export type { Adjacency } from './cycles.js';
