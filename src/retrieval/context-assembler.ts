/**
 * Context assembly for retrieval-augmented generation.
 *
 * Pipeline: [critical fetch, relevance retrieval] → link expansion → dedup
 *           → supersession multipliers → order → size accounting
 *
 * The assembler never truncates to a size budget; `totalCharCount` lets the
 * caller apply its own (see trimToCharBudget).
 */

import type {
  LinkedDocument,
  LinkedRetrievalResult,
  RetrievalOptions,
  RetrievalResult,
  RetrievedDocument,
} from '../core/types.js';
import { DEFAULT_CONFIG, type EngineConfig } from '../config/engine-config.js';
import { assertValidRetrievalOptions } from '../config/retrieval-options.js';
import type { DocumentGraph } from '../graph/types.js';
import type { DocumentRepository, StoredDocument } from '../storage/types.js';
import type { SupersessionTracker } from '../supersession/supersession-tracker.js';
import type { SupersessionInfo } from '../supersession/types.js';
import { RetrievalError } from '../utils/errors.js';
import { isCancellation, throwIfCancelled } from '../utils/cancellation.js';
import { createLogger } from '../utils/logger.js';
import type { RelevanceRetriever } from './relevance-retriever.js';
import { resolvePromotionLevel, toRetrievedDocument } from './scoring.js';
import type { ContextEntry, RAGContext } from './types.js';

const log = createLogger('context-assembler');

export interface ContextAssemblerDeps {
  retriever: RelevanceRetriever;
  graph: DocumentGraph;
  tracker: SupersessionTracker;
  documents: DocumentRepository;
  config?: EngineConfig;
}

export class ContextAssembler {
  private readonly retriever: RelevanceRetriever;
  private readonly graph: DocumentGraph;
  private readonly tracker: SupersessionTracker;
  private readonly documents: DocumentRepository;
  private readonly config: EngineConfig;

  constructor(deps: ContextAssemblerDeps) {
    this.retriever = deps.retriever;
    this.graph = deps.graph;
    this.tracker = deps.tracker;
    this.documents = deps.documents;
    this.config = deps.config ?? DEFAULT_CONFIG;
  }

  /**
   * Ranked direct matches only: no critical injection, no link expansion.
   */
  async retrieveRelevantDocuments(
    queryEmbedding: readonly number[],
    options: RetrievalOptions,
    signal?: AbortSignal,
  ): Promise<RetrievalResult> {
    return this.retriever.retrieve(queryEmbedding, options, signal);
  }

  /**
   * Direct matches plus the documents they link to, depth-tagged.
   */
  async retrieveWithLinkedDocuments(
    queryEmbedding: readonly number[],
    options: RetrievalOptions,
    signal?: AbortSignal,
  ): Promise<LinkedRetrievalResult> {
    const direct = await this.retriever.retrieve(queryEmbedding, options, signal);
    const linkedDocuments = await this.expandLinks(direct.documents, options, signal);
    return { ...direct, linkedDocuments };
  }

  /**
   * Assemble the full context bundle.
   *
   * @throws ConfigError when options are out of range
   * @throws RetrievalError when the vector store or document repository fails
   * @throws SupersessionError when supersession lookups fail
   * @throws OperationCancelledError when signal is aborted
   */
  async assembleContext(
    queryEmbedding: readonly number[],
    options: RetrievalOptions,
    signal?: AbortSignal,
  ): Promise<RAGContext> {
    const startTime = Date.now();
    assertValidRetrievalOptions(options);
    throwIfCancelled(signal, 'assembleContext');

    // 1. Critical fetch and direct retrieval are independent
    const [criticalDocs, direct] = await Promise.all([
      options.includeCritical ? this.fetchCritical(options) : Promise.resolve([]),
      this.retriever.retrieve(queryEmbedding, options, signal),
    ]);
    throwIfCancelled(signal, 'assembleContext');

    // 2. Link expansion from direct matches
    const linked = await this.expandLinks(direct.documents, options, signal);

    // 3. Dedup by path: critical > direct > linked
    const seen = new Set<string>();
    const directByPath = new Map(direct.documents.map((doc) => [doc.path, doc]));

    const critical = criticalDocs.map((doc) => {
      seen.add(doc.path);
      // Keep similarity scores when the critical document also matched directly
      return directByPath.get(doc.path) ?? doc;
    });
    const directKept = direct.documents.filter((doc) => claim(seen, doc.path));
    const linkedKept = linked.filter((doc) => claim(seen, doc.path));

    // 4. Supersession lookups, fanned out over the surviving candidates
    const candidates: Array<RetrievedDocument | LinkedDocument> = [
      ...critical,
      ...directKept,
      ...linkedKept,
    ];
    const infos = await Promise.all(
      candidates.map((doc) => this.tracker.getInfo(doc.id, signal)),
    );
    const infoById = new Map<string, SupersessionInfo>();
    candidates.forEach((doc, i) => infoById.set(doc.id, infos[i]));
    const infoFor = (doc: RetrievedDocument): SupersessionInfo => {
      const info = infoById.get(doc.id);
      if (!info) {
        throw new RetrievalError(`Missing supersession info for ${doc.path}`, 'ASSEMBLY_FAILED');
      }
      return info;
    };

    // 5. Score and order each bucket
    const criticalEntries = critical
      .map((doc): ContextEntry => {
        const supersession = infoFor(doc);
        return {
          document: doc,
          source: 'critical',
          finalScore: this.config.criticalBaseScore * supersession.multiplier,
          linkedFrom: null,
          linkDepth: null,
          supersession,
        };
      })
      .sort(compareEntries);

    const directEntries = directKept
      .map((doc): ContextEntry => {
        const supersession = infoFor(doc);
        return {
          document: doc,
          source: 'direct',
          finalScore: (doc.boostedScore ?? 0) * supersession.multiplier,
          linkedFrom: null,
          linkDepth: null,
          supersession,
        };
      })
      .sort(compareEntries);

    // Traversal order is already depth ascending
    const linkedEntries = linkedKept.map(
      (doc): ContextEntry => ({
        document: doc,
        source: 'linked',
        finalScore: null,
        linkedFrom: doc.linkedFrom,
        linkDepth: doc.linkDepth,
        supersession: infoFor(doc),
      }),
    );

    const entries = [...criticalEntries, ...directEntries, ...linkedEntries];
    const totalCharCount = entries.reduce((sum, entry) => sum + entry.document.charCount, 0);

    log.debug(
      `Assembled ${entries.length} entries (${criticalEntries.length} critical, ` +
        `${directEntries.length} direct, ${linkedEntries.length} linked, ` +
        `${totalCharCount} chars) in ${Date.now() - startTime}ms`,
    );

    return {
      entries,
      criticalCount: criticalEntries.length,
      directCount: directEntries.length,
      linkedCount: linkedEntries.length,
      totalMatches: direct.totalMatches,
      totalCharCount,
    };
  }

  private async fetchCritical(options: RetrievalOptions): Promise<RetrievedDocument[]> {
    let stored: StoredDocument[];
    try {
      stored = await this.documents.getByPromotionLevel('critical', options.docTypes);
    } catch (error) {
      throw new RetrievalError('Critical document fetch failed', 'CRITICAL_FETCH_FAILED', error);
    }
    return stored.map((doc) => toRetrievedDocument(doc, 'critical', null, null));
  }

  private async expandLinks(
    direct: readonly RetrievedDocument[],
    options: RetrievalOptions,
    signal?: AbortSignal,
  ): Promise<LinkedDocument[]> {
    if (direct.length === 0 || options.maxLinkDepth === 0 || options.maxLinkedDocs === 0) {
      return [];
    }

    const hits = await this.graph.traverse(
      direct.map((doc) => doc.path),
      options.maxLinkDepth,
      options.maxLinkedDocs,
      signal,
    );
    if (hits.length === 0) return [];
    throwIfCancelled(signal, 'expand links');

    let stored: Map<string, StoredDocument>;
    try {
      stored = await this.documents.getByPaths(hits.map((hit) => hit.path));
    } catch (error) {
      if (isCancellation(error)) throw error;
      throw new RetrievalError('Linked document lookup failed', 'HYDRATION_FAILED', error);
    }

    const linked: LinkedDocument[] = [];
    for (const hit of hits) {
      const doc = stored.get(hit.path);
      if (!doc) {
        log.debug(`Linked path ${hit.path} is in the graph but not indexed, skipping`);
        continue;
      }
      if (options.docTypes !== undefined && !options.docTypes.includes(doc.docType)) continue;

      linked.push(
        Object.freeze({
          ...toRetrievedDocument(doc, resolvePromotionLevel(doc), null, null),
          linkedFrom: hit.linkedFrom,
          linkDepth: hit.depth,
        }),
      );
    }
    return linked;
  }
}

/** Add path to seen; false when it was already there. */
function claim(seen: Set<string>, path: string): boolean {
  if (seen.has(path)) return false;
  seen.add(path);
  return true;
}

/** Final score desc, then raw score desc, then path asc. */
function compareEntries(a: ContextEntry, b: ContextEntry): number {
  const score = (b.finalScore ?? 0) - (a.finalScore ?? 0);
  if (score !== 0) return score;
  const raw = (b.document.rawScore ?? 0) - (a.document.rawScore ?? 0);
  if (raw !== 0) return raw;
  return a.document.path.localeCompare(b.document.path);
}
