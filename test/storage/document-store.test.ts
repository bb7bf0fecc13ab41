/**
 * Tests for the tenant-scoped document store.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3-multiple-ciphers';
import { SqliteDocumentStore } from '../../src/storage/document-store.js';
import { StorageError } from '../../src/utils/errors.js';
import { createTestDb, createSampleDocument, TEST_TENANT, OTHER_TENANT } from './test-utils.js';

describe('SqliteDocumentStore', () => {
  let db: Database.Database;
  let store: SqliteDocumentStore;

  beforeEach(() => {
    db = createTestDb();
    store = new SqliteDocumentStore(TEST_TENANT, db);
  });

  afterEach(() => {
    db.close();
  });

  describe('upsertDocument', () => {
    it('inserts a document and derives charCount from content', async () => {
      const id = await store.upsertDocument(createSampleDocument('guides/setup.md'));

      const doc = await store.getById(id);
      expect(doc).not.toBeNull();
      expect(doc?.path).toBe('guides/setup.md');
      expect(doc?.title).toBe('Title of guides/setup.md');
      expect(doc?.charCount).toBe(26);
      expect(doc?.promotionTag).toBe('standard');
      expect(doc?.tenantKey).toBe('handbook:main:abc123');
    });

    it('uses the caller-supplied id for new documents', async () => {
      const id = await store.upsertDocument(createSampleDocument('a.md', { id: 'doc-a' }));
      expect(id).toBe('doc-a');
    });

    it('keeps the existing id when the path is re-indexed', async () => {
      const first = await store.upsertDocument(createSampleDocument('a.md', { id: 'doc-a' }));
      const second = await store.upsertDocument(
        createSampleDocument('a.md', { id: 'ignored', content: 'changed', promotionTag: 'critical' }),
      );

      expect(second).toBe(first);
      const doc = await store.getByPath('a.md');
      expect(doc?.content).toBe('changed');
      expect(doc?.charCount).toBe(7);
      expect(doc?.promotionTag).toBe('critical');
    });

    it('refuses an id that belongs to another tenant', async () => {
      const other = new SqliteDocumentStore(OTHER_TENANT, db);
      await store.upsertDocument(createSampleDocument('a.md', { id: 'doc-1' }));

      await expect(other.upsertDocument(createSampleDocument('b.md', { id: 'doc-1' }))).rejects.toMatchObject({
        name: 'StorageError',
        code: 'ID_CONFLICT',
        message: 'Document id doc-1 is already used by another document',
      });
      expect((await store.getByPath('a.md'))?.content).toBe('Content of a.md');
      expect(await other.getByPath('b.md')).toBeNull();
    });

    it('refuses an id that belongs to another path of the same tenant', async () => {
      await store.upsertDocument(createSampleDocument('a.md', { id: 'doc-1' }));

      await expect(store.upsertDocument(createSampleDocument('b.md', { id: 'doc-1' }))).rejects.toBeInstanceOf(
        StorageError,
      );
      expect((await store.getById('doc-1'))?.path).toBe('a.md');
      expect(await store.exists('b.md')).toBe(false);
    });

    it('stores missing optional fields as null', async () => {
      const id = await store.upsertDocument({
        path: 'bare.md',
        title: 'Bare',
        content: 'x',
        docType: 'note',
      });
      const doc = await store.getById(id);
      expect(doc?.summary).toBeNull();
      expect(doc?.promotionTag).toBeNull();
      expect(doc?.date).toBeNull();
    });
  });

  describe('lookups', () => {
    it('returns null for unknown paths and ids', async () => {
      expect(await store.getByPath('missing.md')).toBeNull();
      expect(await store.getById('missing')).toBeNull();
      expect(await store.exists('missing.md')).toBe(false);
    });

    it('isolates tenants sharing a path', async () => {
      const other = new SqliteDocumentStore(OTHER_TENANT, db);
      await store.upsertDocument(createSampleDocument('shared.md', { id: 'main-doc' }));
      await other.upsertDocument(createSampleDocument('shared.md', { id: 'branch-doc' }));

      expect((await store.getByPath('shared.md'))?.id).toBe('main-doc');
      expect((await other.getByPath('shared.md'))?.id).toBe('branch-doc');
      expect(await other.getById('main-doc')).toBeNull();
    });

    it('getByPaths returns only indexed paths', async () => {
      await store.upsertDocument(createSampleDocument('a.md'));
      await store.upsertDocument(createSampleDocument('b.md'));

      const found = await store.getByPaths(['a.md', 'b.md', 'c.md', 'a.md']);
      expect([...found.keys()].sort()).toEqual(['a.md', 'b.md']);
    });

    it('getByPaths with no paths returns an empty map', async () => {
      expect((await store.getByPaths([])).size).toBe(0);
    });
  });

  describe('getByPromotionLevel', () => {
    beforeEach(async () => {
      await store.upsertDocument(createSampleDocument('z-rules.md', { promotionTag: 'critical' }));
      await store.upsertDocument(createSampleDocument('a-pinned.md', { promotionTag: ' Pinned ' }));
      await store.upsertDocument(
        createSampleDocument('policy.md', { promotionTag: 'CRITICAL', docType: 'policy' }),
      );
      await store.upsertDocument(createSampleDocument('notes.md', { promotionTag: 'important' }));
      await store.upsertDocument(createSampleDocument('untagged.md', { promotionTag: null }));
    });

    it('matches tags case-insensitively, with aliases, ordered by path', async () => {
      const docs = await store.getByPromotionLevel('critical');
      expect(docs.map((d) => d.path)).toEqual(['a-pinned.md', 'policy.md', 'z-rules.md']);
    });

    it('applies the doc type filter', async () => {
      const docs = await store.getByPromotionLevel('critical', ['policy']);
      expect(docs.map((d) => d.path)).toEqual(['policy.md']);
    });

    it('returns nothing for an empty doc type filter', async () => {
      expect(await store.getByPromotionLevel('critical', [])).toEqual([]);
    });
  });

  describe('updatePromotionLevel', () => {
    it('rewrites the stored tag', async () => {
      const id = await store.upsertDocument(createSampleDocument('a.md', { promotionTag: 'pinned' }));
      await store.updatePromotionLevel(id, 'standard');
      expect((await store.getById(id))?.promotionTag).toBe('standard');
    });
  });

  describe('deleteDocument', () => {
    it('returns the deleted id and removes the row', async () => {
      const id = await store.upsertDocument(createSampleDocument('a.md'));
      expect(await store.deleteDocument('a.md')).toBe(id);
      expect(await store.exists('a.md')).toBe(false);
    });

    it('returns null for unknown paths', async () => {
      expect(await store.deleteDocument('missing.md')).toBeNull();
    });
  });

  it('listPaths returns sorted paths for the tenant', async () => {
    await store.upsertDocument(createSampleDocument('b.md'));
    await store.upsertDocument(createSampleDocument('a.md'));
    expect(await store.listPaths()).toEqual(['a.md', 'b.md']);
  });

  it('wraps database failures in StorageError', async () => {
    const closed = createTestDb();
    closed.close();
    const broken = new SqliteDocumentStore(TEST_TENANT, closed);

    await expect(broken.getByPath('a.md')).rejects.toBeInstanceOf(StorageError);
    await expect(broken.getByPath('a.md')).rejects.toMatchObject({ code: 'DB_QUERY_FAILED' });
  });
});
