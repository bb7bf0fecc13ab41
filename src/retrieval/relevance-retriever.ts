/**
 * Relevance-filtered vector retrieval.
 *
 * Pipeline: over-fetch → relevance floor → promotion boost → re-rank → truncate.
 *
 * Stateless: each call issues exactly one vector store search.
 */

import type { RetrievalOptions, RetrievalResult, RetrievedDocument, TenantKey } from '../core/types.js';
import { DEFAULT_CONFIG, type EngineConfig } from '../config/engine-config.js';
import { assertValidRetrievalOptions } from '../config/retrieval-options.js';
import type { VectorSearchHit, VectorStore } from '../storage/types.js';
import { RetrievalError } from '../utils/errors.js';
import { isCancellation, throwIfCancelled } from '../utils/cancellation.js';
import { createLogger } from '../utils/logger.js';
import { boostScore, compareByScore, resolvePromotionLevel, toRetrievedDocument } from './scoring.js';

const log = createLogger('relevance-retriever');

export interface RelevanceRetrieverDeps {
  vectorStore: VectorStore;
  tenant: TenantKey;
  config?: EngineConfig;
}

export class RelevanceRetriever {
  private readonly vectorStore: VectorStore;
  private readonly tenant: TenantKey;
  private readonly config: EngineConfig;

  constructor(deps: RelevanceRetrieverDeps) {
    this.vectorStore = deps.vectorStore;
    this.tenant = deps.tenant;
    this.config = deps.config ?? DEFAULT_CONFIG;
  }

  /**
   * Number of candidates requested from the vector store for a given maxResults.
   */
  fetchSize(maxResults: number): number {
    return Math.ceil(maxResults * this.config.overFetchFactor);
  }

  /**
   * Retrieve documents relevant to the query embedding.
   *
   * `totalMatches` counts hits at or above the relevance floor before truncation.
   *
   * @throws ConfigError when options are out of range
   * @throws RetrievalError (VECTOR_STORE_UNAVAILABLE) when the search fails
   * @throws OperationCancelledError when signal is aborted
   */
  async retrieve(
    queryEmbedding: readonly number[],
    options: RetrievalOptions,
    signal?: AbortSignal,
  ): Promise<RetrievalResult> {
    assertValidRetrievalOptions(options);
    if (queryEmbedding.length === 0) {
      throw new RetrievalError('Query embedding is empty', 'EMPTY_QUERY_EMBEDDING');
    }
    throwIfCancelled(signal, 'retrieve');

    const topN = this.fetchSize(options.maxResults);

    let hits: VectorSearchHit[];
    try {
      hits = await this.vectorStore.search(queryEmbedding, topN, {
        tenant: this.tenant,
        minPromotionLevel: options.minPromotionLevel,
        docTypes: options.docTypes,
      });
    } catch (error) {
      if (isCancellation(error)) throw error;
      throw new RetrievalError('Vector store search failed', 'VECTOR_STORE_UNAVAILABLE', error);
    }
    throwIfCancelled(signal, 'retrieve');

    const matches: RetrievedDocument[] = [];
    for (const hit of hits) {
      if (hit.score < options.minRelevanceScore) continue;

      const level = resolvePromotionLevel(hit.document);
      const boosted = options.applyRelevanceBoosting
        ? boostScore(hit.score, level, this.config.promotionBoosts)
        : hit.score;
      matches.push(toRetrievedDocument(hit.document, level, hit.score, boosted));
    }

    matches.sort(compareByScore);

    log.debug(
      `Retrieved ${Math.min(matches.length, options.maxResults)} of ${matches.length} matches ` +
        `(${hits.length} candidates, floor ${options.minRelevanceScore})`,
    );

    return {
      documents: matches.slice(0, options.maxResults),
      totalMatches: matches.length,
    };
  }
}
