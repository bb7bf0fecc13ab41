/**
 * One tenant's retrieval engine: storage, link graph, supersession tracker,
 * retriever and assembler wired together, plus the indexer-facing write path.
 *
 * The link graph lives in memory. Indexers populate it through
 * indexDocument() or rebuildGraph() after a process start.
 */

import type { RetrievalOptions, RetrievalResult, LinkedRetrievalResult, TenantKey } from '../core/types.js';
import { DEFAULT_CONFIG, type EngineConfig } from '../config/engine-config.js';
import { resolveRetrievalOptions } from '../config/retrieval-options.js';
import { LinkGraph } from '../graph/link-graph.js';
import type { DocumentGraph, DocumentLinks, EdgeUpdateResult } from '../graph/types.js';
import { createGraphHooks, type GraphHooks } from '../hooks/graph-hooks.js';
import {
  createSupersessionHooks,
  type SupersessionHookResult,
  type SupersessionHooks,
} from '../hooks/supersession-hooks.js';
import { runIntegrityCheck, type IntegrityReport } from '../maintenance/integrity-check.js';
import { ContextAssembler } from '../retrieval/context-assembler.js';
import { RelevanceRetriever } from '../retrieval/relevance-retriever.js';
import type { RAGContext } from '../retrieval/types.js';
import type { getDb } from '../storage/db.js';
import { SqliteDocumentStore } from '../storage/document-store.js';
import { SqliteSupersessionStore } from '../storage/supersession-store.js';
import type { DocumentInput } from '../storage/types.js';
import { SqliteVectorStore } from '../storage/vector-store.js';
import type { RemovalResult } from '../supersession/types.js';
import { SupersessionTracker } from '../supersession/supersession-tracker.js';
import { formatTenantKey } from '../core/tenant.js';
import { createLogger } from '../utils/logger.js';

export interface KnowledgeEngineOptions {
  tenant: TenantKey;
  /**
   * Database handle; the shared connection when omitted. Engines on one
   * handle share the vector index, so each sees the others' writes.
   */
  db?: ReturnType<typeof getDb>;
  config?: EngineConfig;
}

/**
 * A document as handed over by an indexer.
 */
export interface IndexDocumentInput extends DocumentInput {
  embedding: readonly number[];
  /** Relative paths extracted from the content */
  links?: readonly string[];
  /** Relative path of the document this one replaces */
  supersedes?: string | null;
}

export interface IndexDocumentResult {
  id: string;
  edges: EdgeUpdateResult;
  supersession: SupersessionHookResult;
}

export interface DeleteDocumentResult {
  id: string;
  supersession: RemovalResult;
}

export interface KnowledgeEngine {
  readonly tenant: TenantKey;
  readonly config: EngineConfig;
  readonly documents: SqliteDocumentStore;
  readonly vectors: SqliteVectorStore;
  readonly graph: DocumentGraph;
  readonly tracker: SupersessionTracker;
  readonly retriever: RelevanceRetriever;
  readonly assembler: ContextAssembler;
  readonly graphHooks: GraphHooks;
  readonly supersessionHooks: SupersessionHooks;

  /** Missing options fall back to config.retrieval. */
  assembleContext(
    queryEmbedding: readonly number[],
    options?: Partial<RetrievalOptions>,
    signal?: AbortSignal,
  ): Promise<RAGContext>;
  retrieveRelevantDocuments(
    queryEmbedding: readonly number[],
    options?: Partial<RetrievalOptions>,
    signal?: AbortSignal,
  ): Promise<RetrievalResult>;
  retrieveWithLinkedDocuments(
    queryEmbedding: readonly number[],
    options?: Partial<RetrievalOptions>,
    signal?: AbortSignal,
  ): Promise<LinkedRetrievalResult>;

  indexDocument(input: IndexDocumentInput): Promise<IndexDocumentResult>;
  /** Returns null when the path was not indexed. */
  deleteDocument(path: string): Promise<DeleteDocumentResult | null>;
  rebuildGraph(documents: Iterable<DocumentLinks>): Promise<void>;
  runIntegrityCheck(): Promise<IntegrityReport>;
}

export function createKnowledgeEngine(options: KnowledgeEngineOptions): KnowledgeEngine {
  const { tenant, db } = options;
  const config = options.config ?? DEFAULT_CONFIG;
  const log = createLogger('engine', { tenant: formatTenantKey(tenant) });

  const documents = new SqliteDocumentStore(tenant, db);
  const vectors = new SqliteVectorStore(db);
  const supersessions = new SqliteSupersessionStore(tenant, db);
  const graph = new LinkGraph();
  const tracker = new SupersessionTracker({ repository: supersessions, documents, config });
  const retriever = new RelevanceRetriever({ vectorStore: vectors, tenant, config });
  const assembler = new ContextAssembler({ retriever, graph, tracker, documents, config });
  const graphHooks = createGraphHooks(graph);
  const supersessionHooks = createSupersessionHooks(tracker);

  const resolve = (partial?: Partial<RetrievalOptions>): RetrievalOptions =>
    resolveRetrievalOptions(partial, config.retrieval);

  log.debug('Engine ready');

  return {
    tenant,
    config,
    documents,
    vectors,
    graph,
    tracker,
    retriever,
    assembler,
    graphHooks,
    supersessionHooks,

    assembleContext: (queryEmbedding, partial, signal) =>
      assembler.assembleContext(queryEmbedding, resolve(partial), signal),
    retrieveRelevantDocuments: (queryEmbedding, partial, signal) =>
      assembler.retrieveRelevantDocuments(queryEmbedding, resolve(partial), signal),
    retrieveWithLinkedDocuments: (queryEmbedding, partial, signal) =>
      assembler.retrieveWithLinkedDocuments(queryEmbedding, resolve(partial), signal),

    async indexDocument(input) {
      const { embedding, links = [], supersedes = null, ...document } = input;

      const id = await documents.upsertDocument(document);
      await vectors.upsertEmbedding(id, embedding);
      const edges = await graphHooks.onDocumentIndexed(document.path, links);
      const supersession = await supersessionHooks.onDocumentIndexed(id, supersedes);

      log.debug(`Indexed ${document.path}`, { id, links: links.length });
      return { id, edges, supersession };
    },

    async deleteDocument(path) {
      const existing = await documents.getByPath(path);
      if (!existing) return null;

      // Splice first: the chain walk needs the document's own record
      const supersession = await supersessionHooks.onDocumentDeleted(existing.id);
      await documents.deleteDocument(path);
      await vectors.removeEmbedding(existing.id);
      await graphHooks.onDocumentDeleted(path);

      log.debug(`Deleted ${path}`, { id: existing.id, reconnected: supersession.chainReconnected });
      return { id: existing.id, supersession };
    },

    rebuildGraph: (entries) => graphHooks.onFullRebuild(entries),

    runIntegrityCheck: () => runIntegrityCheck({ graph, tracker }),
  };
}
