/**
 * Indexer-facing hooks that keep the link graph in step with the index.
 *
 * The graph never reads document content: callers pass the outgoing relative
 * paths their link extractor found.
 */

import type { DocumentGraph, DocumentLinks, EdgeUpdateResult } from '../graph/types.js';
import { executeHook, type HookMetrics } from './hook-utils.js';

export interface GraphHooks {
  /** Document (re)indexed: replace its outgoing links in one step. */
  onDocumentIndexed(path: string, outgoingLinks: readonly string[]): Promise<EdgeUpdateResult>;
  /** Document removed: drop the vertex and every incident edge. */
  onDocumentDeleted(path: string): Promise<boolean>;
  /** Full re-index: replace the whole graph. */
  onFullRebuild(documents: Iterable<DocumentLinks>): Promise<void>;
  /** Metrics of the most recent hook call, for diagnostics */
  lastMetrics(): HookMetrics | null;
}

export function createGraphHooks(graph: DocumentGraph): GraphHooks {
  let last: HookMetrics | null = null;

  async function run<T>(name: string, fn: () => Promise<T>): Promise<T> {
    try {
      const { result, metrics } = await executeHook(name, fn);
      last = metrics;
      return result;
    } catch (error) {
      last = null;
      throw error;
    }
  }

  return {
    onDocumentIndexed: (path, outgoingLinks) =>
      run('graph.onDocumentIndexed', () => graph.replaceOutgoingEdges(path, outgoingLinks)),
    onDocumentDeleted: (path) => run('graph.onDocumentDeleted', () => graph.removeVertex(path)),
    onFullRebuild: (documents) => run('graph.onFullRebuild', () => graph.rebuild(documents)),
    lastMetrics: () => last,
  };
}
