/**
 * Link graph contracts.
 */

/**
 * A document reached by traversal.
 */
export interface TraversalHit {
  path: string;
  /** Level of first discovery, >= 1 */
  depth: number;
  /** The vertex whose edge discovered this one */
  linkedFrom: string;
}

/**
 * An edge that closes a cycle. Recorded, never rejected.
 */
export interface CycleWarning {
  source: string;
  target: string;
}

/**
 * Outcome of replacing a vertex's outgoing edges.
 */
export interface EdgeUpdateResult {
  added: number;
  removed: number;
  cycleWarnings: CycleWarning[];
}

/**
 * A document and the relative paths it links to.
 */
export interface DocumentLinks {
  path: string;
  links: readonly string[];
}

export interface GraphSnapshot {
  /** Sorted vertex paths */
  vertices: string[];
  /** Sorted [source, target] pairs */
  edges: Array<[string, string]>;
}

export interface GraphStats {
  vertexCount: number;
  edgeCount: number;
  /** Vertices known only as link targets */
  danglingCount: number;
}

/**
 * In-memory document link graph.
 *
 * Reads (traversal, lookups, cycle checks) run concurrently; mutations are
 * exclusive and each one is observed whole.
 */
export interface DocumentGraph {
  /** Register an indexed document. Returns false when it was already indexed. */
  addVertex(path: string): Promise<boolean>;
  /** Remove a vertex and every incident edge. Returns false when absent. */
  removeVertex(path: string): Promise<boolean>;
  /** Atomically swap a vertex's outgoing edges for `targets`. */
  replaceOutgoingEdges(path: string, targets: readonly string[]): Promise<EdgeUpdateResult>;
  /** True when adding source → target would close a cycle. */
  wouldCreateCycle(source: string, target: string): Promise<boolean>;
  /**
   * Breadth-first expansion from startPaths, at most maxDepth levels and
   * maxCount hits. Start paths are never emitted.
   */
  traverse(
    startPaths: readonly string[],
    maxDepth: number,
    maxCount: number,
    signal?: AbortSignal,
  ): Promise<TraversalHit[]>;
  incomingEdges(path: string): Promise<string[]>;
  outgoingEdges(path: string): Promise<string[]>;
  hasVertex(path: string): Promise<boolean>;
  /** Strongly connected components with more than one vertex. */
  enumerateCycles(): Promise<string[][]>;
  /** Shortest cycle through path, or null. */
  findCycleFrom(path: string): Promise<string[] | null>;
  isAcyclic(): Promise<boolean>;
  /** Replace the whole graph in one step. */
  rebuild(documents: Iterable<DocumentLinks>): Promise<void>;
  snapshot(): Promise<GraphSnapshot>;
  stats(): Promise<GraphStats>;
}
