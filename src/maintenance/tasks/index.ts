/**
 * Barrel export for maintenance task modules.
 */

export { validateGraph, type ValidateGraphDeps } from './validate-graph.js';
export { validateChains, type ValidateChainsDeps } from './validate-chains.js';
export {
  reconcileSupersessions,
  type ReconcileSupersessionsDeps,
} from './reconcile-supersessions.js';
