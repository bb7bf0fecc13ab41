/**
 * In-memory directed graph of document links.
 *
 * Vertices are relative document paths; edges are (source, target) pairs held
 * in two indexes so both "what do I link to" and "who links to me" are
 * O(degree). A target that hasn't been indexed yet is a dangling vertex: legal,
 * kept while something links to it, never emitted by traversal.
 *
 * ## Locking
 *
 * One ReadWriteLock covers the whole structure. Traversal, lookups and cycle
 * checks share it; every mutation holds it exclusively and applies all of its
 * changes before releasing, so readers never see half an edge update.
 *
 * ## Cycles
 *
 * Cyclic links are legal (documents may reference each other). Edges that
 * close a cycle are reported as warnings, and traversal keeps a visited set so
 * it terminates regardless.
 */

import type {
  CycleWarning,
  DocumentGraph,
  DocumentLinks,
  EdgeUpdateResult,
  GraphSnapshot,
  GraphStats,
  TraversalHit,
} from './types.js';
import { findCycles, isReachable, shortestCycleThrough } from './cycles.js';
import { ReadWriteLock } from '../utils/rw-lock.js';
import { throwIfCancelled } from '../utils/cancellation.js';
import { GraphError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('link-graph');

function assertPath(path: string): void {
  if (typeof path !== 'string' || path.trim() === '') {
    throw new GraphError('Vertex path must be a non-empty string', 'INVALID_PATH');
  }
}

export class LinkGraph implements DocumentGraph {
  private readonly outgoing = new Map<string, Set<string>>();
  private readonly incoming = new Map<string, Set<string>>();
  private readonly indexed = new Set<string>();
  private readonly lock = new ReadWriteLock();

  // ── Mutation (write lock) ─────────────────────────────────────────────────

  async addVertex(path: string): Promise<boolean> {
    assertPath(path);
    return this.lock.withWrite(() => {
      if (this.indexed.has(path)) return false;
      this.ensureVertex(path);
      this.indexed.add(path);
      return true;
    });
  }

  async removeVertex(path: string): Promise<boolean> {
    assertPath(path);
    return this.lock.withWrite(() => this.detach(path));
  }

  async replaceOutgoingEdges(path: string, targets: readonly string[]): Promise<EdgeUpdateResult> {
    assertPath(path);
    const next = this.normalizeTargets(path, targets);

    const result = await this.lock.withWrite(() => this.applyOutgoing(path, next));

    for (const warning of result.cycleWarnings) {
      log.warn(`Link ${warning.source} -> ${warning.target} closes a cycle`);
    }
    return result;
  }

  async rebuild(documents: Iterable<DocumentLinks>): Promise<void> {
    const entries = [...documents];
    for (const entry of entries) assertPath(entry.path);

    const summary = await this.lock.withWrite(() => {
      this.outgoing.clear();
      this.incoming.clear();
      this.indexed.clear();

      for (const entry of entries) {
        this.ensureVertex(entry.path);
        this.indexed.add(entry.path);
      }

      let cyclicLinks = 0;
      for (const entry of entries) {
        const result = this.applyOutgoing(entry.path, this.normalizeTargets(entry.path, entry.links));
        cyclicLinks += result.cycleWarnings.length;
      }
      return { vertices: this.outgoing.size, cyclicLinks };
    });

    log.info(
      `Rebuilt link graph: ${summary.vertices} vertices from ${entries.length} documents` +
        (summary.cyclicLinks > 0 ? `, ${summary.cyclicLinks} cyclic links` : ''),
    );
  }

  // ── Reads (read lock) ─────────────────────────────────────────────────────

  async hasVertex(path: string): Promise<boolean> {
    return this.lock.withRead(() => this.outgoing.has(path));
  }

  async outgoingEdges(path: string): Promise<string[]> {
    return this.lock.withRead(() => [...(this.outgoing.get(path) ?? [])]);
  }

  async incomingEdges(path: string): Promise<string[]> {
    return this.lock.withRead(() => [...(this.incoming.get(path) ?? [])]);
  }

  async wouldCreateCycle(source: string, target: string): Promise<boolean> {
    return this.lock.withRead(() => isReachable(this.outgoing, target, source));
  }

  async traverse(
    startPaths: readonly string[],
    maxDepth: number,
    maxCount: number,
    signal?: AbortSignal,
  ): Promise<TraversalHit[]> {
    if (maxDepth <= 0 || maxCount <= 0 || startPaths.length === 0) return [];

    return this.lock.withRead(() => {
      const visited = new Set<string>(startPaths);
      const hits: TraversalHit[] = [];
      let frontier = [...visited];

      for (let depth = 1; depth <= maxDepth && frontier.length > 0; depth++) {
        throwIfCancelled(signal, 'traverse');

        const nextFrontier: string[] = [];
        for (const source of frontier) {
          for (const target of this.outgoing.get(source) ?? []) {
            if (visited.has(target)) continue;
            visited.add(target);
            // Dangling targets have no document and no outgoing links
            if (!this.indexed.has(target)) continue;

            hits.push({ path: target, depth, linkedFrom: source });
            if (hits.length >= maxCount) return hits;
            nextFrontier.push(target);
          }
        }
        frontier = nextFrontier;
      }

      return hits;
    });
  }

  async enumerateCycles(): Promise<string[][]> {
    return this.lock.withRead(() => findCycles(this.outgoing));
  }

  async findCycleFrom(path: string): Promise<string[] | null> {
    return this.lock.withRead(() => shortestCycleThrough(this.outgoing, path));
  }

  async isAcyclic(): Promise<boolean> {
    return this.lock.withRead(() => findCycles(this.outgoing).length === 0);
  }

  async snapshot(): Promise<GraphSnapshot> {
    return this.lock.withRead(() => {
      const vertices = [...this.outgoing.keys()].sort();
      const edges: Array<[string, string]> = [];
      for (const source of vertices) {
        for (const target of [...(this.outgoing.get(source) ?? [])].sort()) {
          edges.push([source, target]);
        }
      }
      return { vertices, edges };
    });
  }

  async stats(): Promise<GraphStats> {
    return this.lock.withRead(() => {
      let edgeCount = 0;
      for (const targets of this.outgoing.values()) edgeCount += targets.size;
      return {
        vertexCount: this.outgoing.size,
        edgeCount,
        danglingCount: this.outgoing.size - this.indexed.size,
      };
    });
  }

  // ── Internals (caller holds the write lock) ───────────────────────────────

  private normalizeTargets(path: string, targets: readonly string[]): string[] {
    const unique = new Set<string>();
    for (const target of targets) {
      if (typeof target !== 'string' || target.trim() === '') continue;
      if (target === path) {
        log.debug(`Ignoring self-link on ${path}`);
        continue;
      }
      unique.add(target);
    }
    return [...unique];
  }

  private ensureVertex(path: string): void {
    if (!this.outgoing.has(path)) this.outgoing.set(path, new Set());
    if (!this.incoming.has(path)) this.incoming.set(path, new Set());
  }

  private applyOutgoing(path: string, targets: string[]): EdgeUpdateResult {
    this.ensureVertex(path);
    this.indexed.add(path);

    const previous = this.outgoing.get(path) ?? new Set<string>();
    const next = new Set(targets);
    let added = 0;
    let removed = 0;

    for (const target of previous) {
      if (next.has(target)) continue;
      this.incoming.get(target)?.delete(path);
      removed++;
    }

    for (const target of next) {
      this.ensureVertex(target);
      this.incoming.get(target)?.add(path);
      if (!previous.has(target)) added++;
    }

    // Keep caller's target order for deterministic traversal
    this.outgoing.set(path, next);

    for (const target of previous) {
      if (!next.has(target)) this.pruneDangling(target);
    }

    const cycleWarnings: CycleWarning[] = [];
    for (const target of next) {
      if (!previous.has(target) && isReachable(this.outgoing, target, path)) {
        cycleWarnings.push({ source: path, target });
      }
    }

    return { added, removed, cycleWarnings };
  }

  private detach(path: string): boolean {
    const targets = this.outgoing.get(path);
    if (!targets) return false;

    for (const target of targets) {
      this.incoming.get(target)?.delete(path);
    }
    for (const source of this.incoming.get(path) ?? []) {
      this.outgoing.get(source)?.delete(path);
    }

    this.outgoing.delete(path);
    this.incoming.delete(path);
    this.indexed.delete(path);

    for (const target of targets) {
      this.pruneDangling(target);
    }
    return true;
  }

  /** Drop a dangling vertex nothing links to any more. */
  private pruneDangling(path: string): void {
    if (this.indexed.has(path)) return;
    if ((this.incoming.get(path)?.size ?? 0) > 0) return;
    if ((this.outgoing.get(path)?.size ?? 0) > 0) return;
    this.outgoing.delete(path);
    this.incoming.delete(path);
  }
}
