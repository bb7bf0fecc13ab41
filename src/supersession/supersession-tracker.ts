/**
 * Supersession chain tracking.
 *
 * A lineage is a singly linked chain: each document supersedes at most one
 * older document and is superseded by at most one newer one. Records live in
 * a SupersessionRepository; walks here are bounded, iterative point reads
 * guarded by a visited set.
 *
 * ```
 *   v1  ◄──supersedes──  v2  ◄──supersedes──  v3 (current)
 *   ×0.25                ×0.5                 ×1.0
 * ```
 *
 * Data problems fail open: a dangling target is stored and resolved later, a
 * cycle or an over-long chain is logged and the walk stops where it is safe.
 * Repository failures are not data problems and surface as SupersessionError.
 */

import { DEFAULT_CONFIG, type EngineConfig } from '../config/engine-config.js';
import { parsePromotionLevel } from '../core/promotion.js';
import type { DocumentRepository, SupersessionRecord, SupersessionRepository } from '../storage/types.js';
import { SupersessionError } from '../utils/errors.js';
import { isCancellation, throwIfCancelled } from '../utils/cancellation.js';
import { createLogger } from '../utils/logger.js';
import type {
  ChainIssue,
  ReconcileResult,
  RegistrationResult,
  RemovalResult,
  SupersessionInfo,
} from './types.js';

const log = createLogger('supersession');

export interface SupersessionTrackerDeps {
  repository: SupersessionRepository;
  documents: DocumentRepository;
  config?: EngineConfig;
}

interface ForwardWalk {
  currentId: string;
  position: number;
  cycleDetected: boolean;
  depthExceeded: boolean;
}

export class SupersessionTracker {
  private readonly repository: SupersessionRepository;
  private readonly documents: DocumentRepository;
  private readonly decayFactor: number;
  private readonly maxChainDepth: number;
  private readonly demoteSuperseded: boolean;

  constructor(deps: SupersessionTrackerDeps) {
    const settings = (deps.config ?? DEFAULT_CONFIG).supersession;
    this.repository = deps.repository;
    this.documents = deps.documents;
    this.decayFactor = settings.decayFactor;
    this.maxChainDepth = settings.maxChainDepth;
    this.demoteSuperseded = settings.demoteSuperseded;
  }

  /**
   * Record that documentId supersedes the document at supersededPath.
   *
   * Fails without storing anything when the link would close a cycle or the
   * target already has a different successor. An unindexed target is stored
   * unresolved with a warning.
   */
  async register(documentId: string, supersededPath: string): Promise<RegistrationResult> {
    if (documentId.trim() === '' || supersededPath.trim() === '') {
      return { success: false, warning: 'Document id and superseded path are required', chainDepth: 0 };
    }

    return this.guard('register', 'REGISTRATION_FAILED', async () => {
      const target = await this.documents.getByPath(supersededPath);
      const targetId = target?.id ?? null;

      if (targetId === documentId) {
        const warning = `Document ${documentId} cannot supersede itself (${supersededPath})`;
        log.warn(warning);
        return { success: false, warning, chainDepth: 0 };
      }

      const existing = await this.repository.getByDocumentId(documentId);
      if (
        existing &&
        existing.supersededPath === supersededPath &&
        existing.supersededDocumentId === targetId
      ) {
        return { success: true, chainDepth: await this.countPredecessors(documentId) };
      }

      if (targetId !== null) {
        const refusal = await this.checkLink(documentId, targetId, supersededPath);
        if (refusal) {
          log.warn(refusal);
          return { success: false, warning: refusal, chainDepth: 0 };
        }
      }

      if (existing) {
        log.info(
          `Document ${documentId} now supersedes ${supersededPath} (was ${existing.supersededPath})`,
        );
      }
      await this.repository.save({ documentId, supersededPath, supersededDocumentId: targetId });

      let warning: string | undefined;
      if (targetId === null) {
        warning = `Superseded document ${supersededPath} is not indexed; stored unresolved`;
        log.warn(warning);
      } else if (target) {
        await this.demote(targetId, target.promotionTag, supersededPath);
      }

      return { success: true, warning, chainDepth: await this.countPredecessors(documentId) };
    });
  }

  /**
   * Drop the document's own declaration. Its successor, if any, is untouched.
   */
  async unregister(documentId: string): Promise<boolean> {
    return this.guard('unregister', 'REGISTRATION_FAILED', () => this.repository.delete(documentId));
  }

  /**
   * Supersession state of a document, including its score multiplier.
   */
  async getInfo(documentId: string, signal?: AbortSignal): Promise<SupersessionInfo> {
    return this.guard('getInfo', 'LOOKUP_FAILED', async () => {
      throwIfCancelled(signal, 'supersession lookup');
      const own = await this.repository.getByDocumentId(documentId);
      const successor = await this.repository.getSuccessor(documentId);
      const walk = await this.walkForward(documentId, successor, signal);

      return {
        documentId,
        supersedesPath: own?.supersededPath ?? null,
        supersedesId: own?.supersededDocumentId ?? null,
        supersededById: successor?.documentId ?? null,
        isSuperseded: successor !== null,
        chainPosition: walk.position,
        currentVersionId: walk.currentId,
        multiplier: this.multiplierFor(walk),
        cycleDetected: walk.cycleDetected,
        depthExceeded: walk.depthExceeded,
      };
    });
  }

  /**
   * Score multiplier: 1.0 for the current version, decayFactor^d for a
   * document d hops behind it, 1.0 when the chain is cyclic.
   */
  async getMultiplier(documentId: string, signal?: AbortSignal): Promise<number> {
    return (await this.getInfo(documentId, signal)).multiplier;
  }

  async isSuperseded(documentId: string): Promise<boolean> {
    return this.guard('isSuperseded', 'LOOKUP_FAILED', async () => {
      return (await this.repository.getSuccessor(documentId)) !== null;
    });
  }

  /**
   * Newest reachable version of the document's lineage.
   */
  async getCurrentVersion(documentId: string): Promise<string> {
    return this.guard('getCurrentVersion', 'LOOKUP_FAILED', async () => {
      const successor = await this.repository.getSuccessor(documentId);
      return (await this.walkForward(documentId, successor)).currentId;
    });
  }

  /**
   * Document ids of the lineage, oldest first.
   */
  async getChain(documentId: string): Promise<string[]> {
    return this.guard('getChain', 'LOOKUP_FAILED', async () => {
      const seen = new Set<string>([documentId]);

      const older: string[] = [];
      let cursor = await this.repository.getByDocumentId(documentId);
      while (cursor?.supersededDocumentId && !seen.has(cursor.supersededDocumentId)) {
        if (older.length >= this.maxChainDepth) {
          log.warn(`Chain behind ${documentId} exceeds ${this.maxChainDepth} documents, truncated`);
          break;
        }
        const previous = cursor.supersededDocumentId;
        seen.add(previous);
        older.push(previous);
        cursor = await this.repository.getByDocumentId(previous);
      }

      const newer: string[] = [];
      let next = await this.repository.getSuccessor(documentId);
      while (next && !seen.has(next.documentId)) {
        if (newer.length >= this.maxChainDepth) {
          log.warn(`Chain ahead of ${documentId} exceeds ${this.maxChainDepth} documents, truncated`);
          break;
        }
        seen.add(next.documentId);
        newer.push(next.documentId);
        next = await this.repository.getSuccessor(next.documentId);
      }

      return [...older.reverse(), documentId, ...newer];
    });
  }

  /**
   * Remove a document from its lineage. A middle document's neighbours are
   * joined; removing the current version makes its predecessor current;
   * removing the oldest leaves its successor's target unresolved.
   */
  async removeFromChain(documentId: string): Promise<RemovalResult> {
    return this.guard('removeFromChain', 'REMOVAL_FAILED', async () => {
      const result = await this.repository.splice(documentId);
      if (result.chainReconnected) {
        log.info(`Removed ${documentId} from its chain and reconnected its neighbours`);
      } else if (result.orphanedSuccessorId) {
        log.debug(`Removed ${documentId}; ${result.orphanedSuccessorId} now has an unresolved target`);
      }
      return { chainReconnected: result.chainReconnected };
    });
  }

  /**
   * Check every stored chain for cycles, unresolved or missing targets,
   * missing documents and excessive length.
   */
  async validateAllChains(): Promise<ChainIssue[]> {
    return this.guard('validateAllChains', 'LOOKUP_FAILED', async () => {
      const records = await this.repository.getAll();
      const issues: ChainIssue[] = [];

      const byDocument = new Map<string, SupersessionRecord>();
      for (const record of records) byDocument.set(record.documentId, record);

      for (const record of records) {
        if (!(await this.documents.getById(record.documentId))) {
          issues.push({
            kind: 'missing-document',
            documentIds: [record.documentId],
            message: `Superseding document ${record.documentId} is no longer indexed`,
          });
        }
        if (record.supersededDocumentId === null) {
          issues.push({
            kind: 'dangling-target',
            documentIds: [record.documentId],
            message: `${record.documentId} supersedes unresolved path ${record.supersededPath}`,
          });
        } else if (!(await this.documents.getById(record.supersededDocumentId))) {
          issues.push({
            kind: 'missing-target',
            documentIds: [record.documentId, record.supersededDocumentId].sort(),
            message: `${record.documentId} supersedes ${record.supersededDocumentId}, which is no longer indexed`,
          });
        }
      }

      issues.push(...this.findChainCycles(byDocument));
      issues.push(...this.findLongChains(byDocument));

      for (const issue of issues) {
        log.warn(`Chain issue (${issue.kind}): ${issue.message}`);
      }
      return issues;
    });
  }

  /**
   * Resolve stored targets whose path has since been indexed.
   */
  async reconcileDanglingTargets(): Promise<ReconcileResult> {
    return this.guard('reconcileDanglingTargets', 'RECONCILE_FAILED', async () => {
      const result: ReconcileResult = { resolved: 0, stillDangling: 0, rejected: 0 };

      for (const record of await this.repository.getUnresolved()) {
        const target = await this.documents.getByPath(record.supersededPath);
        if (!target) {
          result.stillDangling++;
          continue;
        }

        const refusal =
          target.id === record.documentId
            ? `Document ${record.documentId} cannot supersede itself (${record.supersededPath})`
            : await this.checkLink(record.documentId, target.id, record.supersededPath);
        if (refusal) {
          log.warn(refusal);
          result.rejected++;
          continue;
        }

        await this.repository.resolveTarget(record.documentId, target.id);
        await this.demote(target.id, target.promotionTag, record.supersededPath);
        result.resolved++;
      }

      if (result.resolved > 0) {
        log.info(`Resolved ${result.resolved} superseded targets`);
      }
      return result;
    });
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private async guard<T>(operation: string, code: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isCancellation(error)) throw error;
      throw new SupersessionError(`Supersession ${operation} failed`, code, error);
    }
  }

  /**
   * Reason to refuse "documentId supersedes targetId", or null when allowed.
   */
  private async checkLink(
    documentId: string,
    targetId: string,
    supersededPath: string,
  ): Promise<string | null> {
    if (await this.reachesBackward(targetId, documentId)) {
      return `Superseding ${supersededPath} from ${documentId} would create a cycle`;
    }

    const successor = await this.repository.getSuccessor(targetId);
    if (successor && successor.documentId !== documentId) {
      return `${supersededPath} is already superseded by ${successor.documentId}`;
    }
    return null;
  }

  /**
   * Walk "supersedes" records back from start; true when goal is reached.
   */
  private async reachesBackward(start: string, goal: string): Promise<boolean> {
    const visited = new Set<string>([start]);
    let record = await this.repository.getByDocumentId(start);

    while (record?.supersededDocumentId) {
      const previous = record.supersededDocumentId;
      if (previous === goal) return true;
      if (visited.has(previous)) return false;
      visited.add(previous);
      record = await this.repository.getByDocumentId(previous);
    }
    return false;
  }

  private async countPredecessors(documentId: string): Promise<number> {
    const visited = new Set<string>([documentId]);
    let depth = 0;
    let record = await this.repository.getByDocumentId(documentId);

    while (record?.supersededDocumentId && !visited.has(record.supersededDocumentId)) {
      if (depth >= this.maxChainDepth) {
        log.warn(`Chain behind ${documentId} exceeds ${this.maxChainDepth} documents, truncated`);
        break;
      }
      visited.add(record.supersededDocumentId);
      depth++;
      record = await this.repository.getByDocumentId(record.supersededDocumentId);
    }
    return depth;
  }

  private async walkForward(
    documentId: string,
    firstSuccessor: SupersessionRecord | null,
    signal?: AbortSignal,
  ): Promise<ForwardWalk> {
    const visited = new Set<string>([documentId]);
    let currentId = documentId;
    let position = 0;
    let successor = firstSuccessor;

    while (successor) {
      if (visited.has(successor.documentId)) {
        log.warn(`Supersession cycle detected at ${successor.documentId} (from ${documentId})`);
        return { currentId, position, cycleDetected: true, depthExceeded: false };
      }
      if (position >= this.maxChainDepth) {
        log.warn(`Chain ahead of ${documentId} exceeds ${this.maxChainDepth} documents, truncated`);
        return { currentId, position, cycleDetected: false, depthExceeded: true };
      }

      visited.add(successor.documentId);
      currentId = successor.documentId;
      position++;

      throwIfCancelled(signal, 'supersession lookup');
      successor = await this.repository.getSuccessor(currentId);
    }

    return { currentId, position, cycleDetected: false, depthExceeded: false };
  }

  private multiplierFor(walk: ForwardWalk): number {
    if (walk.cycleDetected) return 1.0;
    return Math.pow(this.decayFactor, walk.position);
  }

  private async demote(targetId: string, tag: string | null, path: string): Promise<void> {
    if (!this.demoteSuperseded) return;
    const level = parsePromotionLevel(tag);
    if (level === null || level === 'standard') return;

    await this.documents.updatePromotionLevel(targetId, 'standard');
    log.info(`Demoted superseded document ${path} from ${level} to standard`);
  }

  private findChainCycles(byDocument: Map<string, SupersessionRecord>): ChainIssue[] {
    const issues: ChainIssue[] = [];
    const settled = new Set<string>();

    for (const start of byDocument.keys()) {
      if (settled.has(start)) continue;

      const order: string[] = [];
      const onPath = new Set<string>();
      let cursor: string | null = start;

      while (cursor !== null && !settled.has(cursor)) {
        if (onPath.has(cursor)) {
          const members = order.slice(order.indexOf(cursor)).sort();
          issues.push({
            kind: 'cycle',
            documentIds: members,
            message: `Supersession cycle through ${members.join(', ')}`,
          });
          break;
        }
        onPath.add(cursor);
        order.push(cursor);
        cursor = byDocument.get(cursor)?.supersededDocumentId ?? null;
      }

      for (const id of order) settled.add(id);
    }
    return issues;
  }

  private findLongChains(byDocument: Map<string, SupersessionRecord>): ChainIssue[] {
    const hasSuccessor = new Set<string>();
    for (const record of byDocument.values()) {
      if (record.supersededDocumentId) hasSuccessor.add(record.supersededDocumentId);
    }

    const issues: ChainIssue[] = [];
    for (const head of byDocument.keys()) {
      if (hasSuccessor.has(head)) continue;

      const visited = new Set<string>([head]);
      let length = 0;
      let cursor = byDocument.get(head)?.supersededDocumentId ?? null;
      while (cursor !== null && !visited.has(cursor)) {
        visited.add(cursor);
        length++;
        cursor = byDocument.get(cursor)?.supersededDocumentId ?? null;
      }

      if (length > this.maxChainDepth) {
        issues.push({
          kind: 'depth-exceeded',
          documentIds: [head],
          message: `Chain ending at ${head} has ${length} superseded documents (limit ${this.maxChainDepth})`,
        });
      }
    }
    return issues;
  }
}
