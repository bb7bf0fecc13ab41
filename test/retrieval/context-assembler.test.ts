/**
 * Tests for context assembly.
 *
 * Documents, supersessions and the link graph are real (in-memory SQLite and
 * LinkGraph); only the vector store is replaced, so each similarity score is
 * fixed by the test.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3-multiple-ciphers';
import { ContextAssembler } from '../../src/retrieval/context-assembler.js';
import { RelevanceRetriever } from '../../src/retrieval/relevance-retriever.js';
import { LinkGraph } from '../../src/graph/link-graph.js';
import { SupersessionTracker } from '../../src/supersession/supersession-tracker.js';
import { SqliteDocumentStore } from '../../src/storage/document-store.js';
import { SqliteSupersessionStore } from '../../src/storage/supersession-store.js';
import { resolveRetrievalOptions } from '../../src/config/retrieval-options.js';
import { ConfigError, OperationCancelledError, RetrievalError } from '../../src/utils/errors.js';
import type { RAGContext } from '../../src/retrieval/types.js';
import { createTestDb, createSampleDocument, TEST_TENANT } from '../storage/test-utils.js';
import { ScoredVectorStore } from '../helpers/fakes.js';

const query = [1, 0];

function summarize(context: RAGContext): Array<[string, string]> {
  return context.entries.map((entry) => [entry.source, entry.document.path]);
}

describe('ContextAssembler', () => {
  let db: Database.Database;
  let documents: SqliteDocumentStore;
  let vectors: ScoredVectorStore;
  let graph: LinkGraph;
  let tracker: SupersessionTracker;
  let assembler: ContextAssembler;

  async function indexDoc(id: string, overrides: { promotionTag?: string; docType?: string } = {}) {
    await documents.upsertDocument(createSampleDocument(`${id}.md`, { id, ...overrides }));
  }

  beforeEach(async () => {
    db = createTestDb();
    documents = new SqliteDocumentStore(TEST_TENANT, db);
    // Separate store instance so spies on `documents` leave search untouched
    vectors = new ScoredVectorStore(new SqliteDocumentStore(TEST_TENANT, db));
    graph = new LinkGraph();
    tracker = new SupersessionTracker({
      repository: new SqliteSupersessionStore(TEST_TENANT, db),
      documents,
    });
    const retriever = new RelevanceRetriever({ vectorStore: vectors, tenant: TEST_TENANT });
    assembler = new ContextAssembler({ retriever, graph, tracker, documents });

    await indexDoc('rules', { promotionTag: 'critical' });
    await indexDoc('a');
    await indexDoc('b', { promotionTag: 'important' });
    await indexDoc('c');
    await indexDoc('d');
    await indexDoc('e');
    await indexDoc('x');

    vectors.setScore('a.md', 0.9).setScore('b.md', 0.7).setScore('c.md', 0.4);

    await graph.rebuild([
      { path: 'rules.md', links: [] },
      { path: 'a.md', links: ['c.md', 'd.md'] },
      { path: 'b.md', links: [] },
      { path: 'c.md', links: [] },
      { path: 'd.md', links: ['e.md'] },
      { path: 'e.md', links: [] },
      { path: 'x.md', links: [] },
    ]);
  });

  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  describe('assembleContext', () => {
    it('orders critical, then direct by score, then linked by depth', async () => {
      const context = await assembler.assembleContext(query, resolveRetrievalOptions());

      expect(summarize(context)).toEqual([
        ['critical', 'rules.md'],
        ['direct', 'a.md'],
        ['direct', 'b.md'],
        ['linked', 'c.md'],
        ['linked', 'd.md'],
        ['linked', 'e.md'],
      ]);
      expect(context.criticalCount).toBe(1);
      expect(context.directCount).toBe(2);
      expect(context.linkedCount).toBe(3);
      expect(context.totalMatches).toBe(2);
      // 'Content of rules.md' is 19 chars, each 'Content of ?.md' is 15
      expect(context.totalCharCount).toBe(94);
    });

    it('scores each bucket', async () => {
      const { entries } = await assembler.assembleContext(query, resolveRetrievalOptions());

      expect(entries[0].finalScore).toBe(1);
      expect(entries[1].finalScore).toBe(0.9);
      expect(entries[2].finalScore).toBeCloseTo(0.8, 10);
      expect(entries[3].finalScore).toBeNull();
    });

    it('attributes linked entries to the document that linked them', async () => {
      const { entries } = await assembler.assembleContext(query, resolveRetrievalOptions());

      expect(entries.slice(3).map((e) => [e.document.path, e.linkedFrom, e.linkDepth])).toEqual([
        ['c.md', 'a.md', 1],
        ['d.md', 'a.md', 1],
        ['e.md', 'd.md', 2],
      ]);
      expect(entries[3].document.rawScore).toBeNull();
      expect(entries[1].linkedFrom).toBeNull();
    });

    it('limits link expansion to maxLinkDepth', async () => {
      const context = await assembler.assembleContext(query, resolveRetrievalOptions({ maxLinkDepth: 1 }));

      expect(context.entries.filter((e) => e.source === 'linked').map((e) => e.document.path)).toEqual([
        'c.md',
        'd.md',
      ]);
    });

    it('skips link expansion when maxLinkedDocs is zero', async () => {
      const context = await assembler.assembleContext(query, resolveRetrievalOptions({ maxLinkedDocs: 0 }));
      expect(context.linkedCount).toBe(0);
    });

    it('keeps the similarity scores of a critical document that also matched', async () => {
      vectors.setScore('rules.md', 0.6);

      const context = await assembler.assembleContext(query, resolveRetrievalOptions());

      expect(summarize(context).slice(0, 3)).toEqual([
        ['critical', 'rules.md'],
        ['direct', 'a.md'],
        ['direct', 'b.md'],
      ]);
      expect(context.entries[0].document.rawScore).toBe(0.6);
      expect(context.entries[0].finalScore).toBe(1);
      expect(context.totalMatches).toBe(3);
    });

    it('drops linked documents already present as critical', async () => {
      await graph.replaceOutgoingEdges('a.md', ['rules.md', 'c.md']);

      const context = await assembler.assembleContext(query, resolveRetrievalOptions());

      expect(summarize(context)).toEqual([
        ['critical', 'rules.md'],
        ['direct', 'a.md'],
        ['direct', 'b.md'],
        ['linked', 'c.md'],
      ]);
    });

    it('applies the supersession multiplier to direct matches', async () => {
      vectors.setScore('c.md', 0.55);
      await tracker.register('x', 'b.md');

      const { entries } = await assembler.assembleContext(query, resolveRetrievalOptions());
      const direct = entries.filter((e) => e.source === 'direct');

      expect(direct.map((e) => e.document.path)).toEqual(['a.md', 'c.md', 'b.md']);
      // b was demoted on registration, so it carries no boost: 0.7 * 0.5
      expect(direct[2].finalScore).toBeCloseTo(0.35, 10);
      expect(direct[2].document.promotionLevel).toBe('standard');
      expect(direct[2].supersession).toMatchObject({ supersededById: 'x', multiplier: 0.5 });
    });

    it('drops a superseded critical document from the critical set', async () => {
      await tracker.register('x', 'rules.md');

      const context = await assembler.assembleContext(query, resolveRetrievalOptions());
      expect(context.criticalCount).toBe(0);
    });

    it('omits critical documents when includeCritical is false', async () => {
      const fetch = vi.spyOn(documents, 'getByPromotionLevel');

      const context = await assembler.assembleContext(
        query,
        resolveRetrievalOptions({ includeCritical: false }),
      );

      expect(context.criticalCount).toBe(0);
      expect(context.entries[0].document.path).toBe('a.md');
      expect(fetch).not.toHaveBeenCalled();
    });

    it('still injects critical documents when nothing matches', async () => {
      const context = await assembler.assembleContext(
        query,
        resolveRetrievalOptions({ minRelevanceScore: 0.95 }),
      );

      expect(summarize(context)).toEqual([['critical', 'rules.md']]);
      expect(context.totalMatches).toBe(0);
    });

    it('applies the doc type filter to every bucket', async () => {
      await indexDoc('d', { docType: 'note' });

      const context = await assembler.assembleContext(
        query,
        resolveRetrievalOptions({ docTypes: ['guide'] }),
      );

      expect(context.entries.filter((e) => e.source === 'linked').map((e) => e.document.path)).toEqual([
        'c.md',
        'e.md',
      ]);
    });

    it('skips linked paths with no indexed document', async () => {
      await graph.replaceOutgoingEdges('a.md', ['c.md', 'ghost.md']);
      await graph.addVertex('ghost.md');

      const context = await assembler.assembleContext(query, resolveRetrievalOptions());

      expect(context.entries.filter((e) => e.source === 'linked').map((e) => e.document.path)).toEqual([
        'c.md',
      ]);
    });

    it('fails with CRITICAL_FETCH_FAILED when the critical lookup fails', async () => {
      vi.spyOn(documents, 'getByPromotionLevel').mockRejectedValue(new Error('disk I/O error'));

      await expect(assembler.assembleContext(query, resolveRetrievalOptions())).rejects.toMatchObject({
        name: 'RetrievalError',
        code: 'CRITICAL_FETCH_FAILED',
      });
    });

    it('fails with HYDRATION_FAILED when linked documents cannot be loaded', async () => {
      vi.spyOn(documents, 'getByPaths').mockRejectedValue(new Error('disk I/O error'));

      await expect(assembler.assembleContext(query, resolveRetrievalOptions())).rejects.toMatchObject({
        name: 'RetrievalError',
        code: 'HYDRATION_FAILED',
      });
    });

    it('propagates vector store failures', async () => {
      vectors.failure = new Error('connection refused');

      const attempt = assembler.assembleContext(query, resolveRetrievalOptions());
      await expect(attempt).rejects.toBeInstanceOf(RetrievalError);
      await expect(assembler.assembleContext(query, resolveRetrievalOptions())).rejects.toMatchObject({
        code: 'VECTOR_STORE_UNAVAILABLE',
      });
    });

    it('rejects invalid options', async () => {
      await expect(
        assembler.assembleContext(query, resolveRetrievalOptions({ maxLinkDepth: -1 })),
      ).rejects.toBeInstanceOf(ConfigError);
    });

    it('honours an aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        assembler.assembleContext(query, resolveRetrievalOptions(), controller.signal),
      ).rejects.toBeInstanceOf(OperationCancelledError);
      expect(vectors.calls).toHaveLength(0);
    });
  });

  describe('retrieveWithLinkedDocuments', () => {
    it('returns direct matches and their linked documents', async () => {
      const result = await assembler.retrieveWithLinkedDocuments(query, resolveRetrievalOptions());

      expect(result.documents.map((d) => d.path)).toEqual(['a.md', 'b.md']);
      expect(result.totalMatches).toBe(2);
      expect(result.linkedDocuments.map((d) => [d.path, d.linkedFrom, d.linkDepth])).toEqual([
        ['c.md', 'a.md', 1],
        ['d.md', 'a.md', 1],
        ['e.md', 'd.md', 2],
      ]);
      expect(Object.isFrozen(result.linkedDocuments[0])).toBe(true);
    });
  });

  describe('retrieveRelevantDocuments', () => {
    it('returns direct matches only', async () => {
      const result = await assembler.retrieveRelevantDocuments(query, resolveRetrievalOptions());

      expect(result.documents.map((d) => d.path)).toEqual(['a.md', 'b.md']);
      expect(result.totalMatches).toBe(2);
    });
  });
});
