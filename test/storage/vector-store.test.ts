/**
 * Tests for the SQLite-backed vector store.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3-multiple-ciphers';
import { SqliteDocumentStore } from '../../src/storage/document-store.js';
import { SqliteVectorStore } from '../../src/storage/vector-store.js';
import type { VectorSearchFilter } from '../../src/storage/types.js';
import { serializeEmbedding } from '../../src/utils/embedding-utils.js';
import {
  angleVector,
  createSampleDocument,
  createTestDb,
  OTHER_TENANT,
  TEST_TENANT,
} from './test-utils.js';

const QUERY = [1, 0];
const ALL: VectorSearchFilter = { tenant: TEST_TENANT, minPromotionLevel: 'standard' };

describe('SqliteVectorStore', () => {
  let db: Database.Database;
  let documents: SqliteDocumentStore;
  let store: SqliteVectorStore;

  async function index(
    id: string,
    embedding: number[],
    overrides: Parameters<typeof createSampleDocument>[1] = {},
  ): Promise<void> {
    await documents.upsertDocument(createSampleDocument(`${id}.md`, { id, ...overrides }));
    await store.upsertEmbedding(id, embedding);
  }

  beforeEach(async () => {
    db = createTestDb();
    documents = new SqliteDocumentStore(TEST_TENANT, db);
    store = new SqliteVectorStore(db);

    await index('doc-a', [1, 0], { promotionTag: 'critical' });
    await index('doc-b', angleVector(60), { promotionTag: 'promoted', docType: 'reference' });
    await index('doc-c', [0, 1], { promotionTag: 'standard' });
    await index('doc-d', [-1, 0], { promotionTag: null });
  });

  afterEach(() => {
    db.close();
  });

  it('ranks by similarity with negative cosine floored at zero', async () => {
    const hits = await store.search(QUERY, 10, ALL);

    expect(hits.map((h) => h.document.id)).toEqual(['doc-a', 'doc-b', 'doc-c', 'doc-d']);
    expect(hits[0].score).toBeCloseTo(1, 5);
    expect(hits[1].score).toBeCloseTo(0.5, 5);
    expect(hits[2].score).toBe(0);
    expect(hits[3].score).toBe(0);
  });

  it('returns at most topN hits', async () => {
    const hits = await store.search(QUERY, 2, ALL);
    expect(hits.map((h) => h.document.id)).toEqual(['doc-a', 'doc-b']);
  });

  it('returns nothing for topN 0', async () => {
    expect(await store.search(QUERY, 0, ALL)).toEqual([]);
  });

  it('filters by promotion floor including aliases', async () => {
    const hits = await store.search(QUERY, 10, { ...ALL, minPromotionLevel: 'important' });
    expect(hits.map((h) => h.document.id)).toEqual(['doc-a', 'doc-b']);

    const critical = await store.search(QUERY, 10, { ...ALL, minPromotionLevel: 'critical' });
    expect(critical.map((h) => h.document.id)).toEqual(['doc-a']);
  });

  it('filters by doc type before truncation', async () => {
    const hits = await store.search(QUERY, 1, { ...ALL, docTypes: ['reference'] });
    expect(hits.map((h) => h.document.id)).toEqual(['doc-b']);
  });

  it('returns nothing for an empty doc type filter', async () => {
    expect(await store.search(QUERY, 10, { ...ALL, docTypes: [] })).toEqual([]);
  });

  it('never returns documents of another tenant', async () => {
    const other = new SqliteDocumentStore(OTHER_TENANT, db);
    await other.upsertDocument(createSampleDocument('x.md', { id: 'other-doc' }));
    await store.upsertEmbedding('other-doc', [1, 0]);

    const hits = await store.search(QUERY, 10, ALL);
    expect(hits.map((h) => h.document.id)).not.toContain('other-doc');

    const otherHits = await store.search(QUERY, 10, { ...ALL, tenant: OTHER_TENANT });
    expect(otherHits.map((h) => h.document.id)).toEqual(['other-doc']);
  });

  it('replaces and removes embeddings', async () => {
    await store.upsertEmbedding('doc-d', [1, 0]);
    let hits = await store.search(QUERY, 2, ALL);
    expect(hits.map((h) => h.document.id)).toEqual(['doc-a', 'doc-d']);

    expect(await store.removeEmbedding('doc-d')).toBe(true);
    expect(await store.removeEmbedding('doc-d')).toBe(false);
    expect(await store.count()).toBe(3);
    hits = await store.search(QUERY, 10, ALL);
    expect(hits.map((h) => h.document.id)).toEqual(['doc-a', 'doc-b', 'doc-c']);
  });

  it('loads persisted vectors in a fresh instance', async () => {
    const fresh = new SqliteVectorStore(db);
    expect(await fresh.count()).toBe(4);
  });

  it('shares its index with other stores on the same connection', async () => {
    const other = new SqliteVectorStore(db);
    expect(await other.count()).toBe(4);

    await index('doc-e', angleVector(30));

    const hits = await other.search(QUERY, 2, ALL);
    expect(hits.map((h) => h.document.id)).toEqual(['doc-a', 'doc-e']);
    expect(await other.count()).toBe(5);
  });

  it('picks up external writes after reload', async () => {
    await documents.upsertDocument(createSampleDocument('e.md', { id: 'doc-e' }));
    db.prepare('INSERT INTO document_vectors (document_id, embedding) VALUES (?, ?)').run(
      'doc-e',
      serializeEmbedding([1, 0]),
    );

    expect(await store.count()).toBe(4);
    store.reload();
    expect(await store.count()).toBe(5);
  });
});
