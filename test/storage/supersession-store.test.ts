/**
 * Tests for the supersession record store.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3-multiple-ciphers';
import { SqliteSupersessionStore } from '../../src/storage/supersession-store.js';
import { createTestDb, OTHER_TENANT, TEST_TENANT } from './test-utils.js';

describe('SqliteSupersessionStore', () => {
  let db: Database.Database;
  let store: SqliteSupersessionStore;

  beforeEach(() => {
    db = createTestDb();
    store = new SqliteSupersessionStore(TEST_TENANT, db);
  });

  afterEach(() => {
    db.close();
  });

  it('saves and reads a record by document and by target', async () => {
    await store.save({ documentId: 'v2', supersededPath: 'v1.md', supersededDocumentId: 'v1' });

    const own = await store.getByDocumentId('v2');
    expect(own).toMatchObject({ documentId: 'v2', supersededPath: 'v1.md', supersededDocumentId: 'v1' });
    expect(typeof own?.createdAt).toBe('string');

    expect((await store.getSuccessor('v1'))?.documentId).toBe('v2');
    expect(await store.getSuccessor('v2')).toBeNull();
  });

  it('overwrites the previous declaration of a document', async () => {
    await store.save({ documentId: 'v2', supersededPath: 'old.md', supersededDocumentId: null });
    await store.save({ documentId: 'v2', supersededPath: 'v1.md', supersededDocumentId: 'v1' });

    expect(await store.getAll()).toHaveLength(1);
    expect((await store.getByDocumentId('v2'))?.supersededPath).toBe('v1.md');
  });

  it('allows at most one successor per target', async () => {
    await store.save({ documentId: 'v2', supersededPath: 'v1.md', supersededDocumentId: 'v1' });
    await expect(
      store.save({ documentId: 'v3', supersededPath: 'v1.md', supersededDocumentId: 'v1' }),
    ).rejects.toMatchObject({ code: 'DB_QUERY_FAILED' });
  });

  it('lists unresolved records and resolves them', async () => {
    await store.save({ documentId: 'b', supersededPath: 'later.md', supersededDocumentId: null });
    await store.save({ documentId: 'a', supersededPath: 'v1.md', supersededDocumentId: 'v1' });

    expect((await store.getUnresolved()).map((r) => r.documentId)).toEqual(['b']);

    await store.resolveTarget('b', 'later');
    expect(await store.getUnresolved()).toEqual([]);
    expect((await store.getSuccessor('later'))?.documentId).toBe('b');
  });

  it('scopes records to the tenant', async () => {
    const other = new SqliteSupersessionStore(OTHER_TENANT, db);
    await other.save({ documentId: 'v2', supersededPath: 'v1.md', supersededDocumentId: null });

    expect(await store.getByDocumentId('v2')).toBeNull();
    expect(await store.getAll()).toEqual([]);
  });

  it('delete reports whether a record existed', async () => {
    await store.save({ documentId: 'v2', supersededPath: 'v1.md', supersededDocumentId: 'v1' });
    expect(await store.delete('v2')).toBe(true);
    expect(await store.delete('v2')).toBe(false);
  });

  describe('splice', () => {
    beforeEach(async () => {
      // v1 <- v2 <- v3
      await store.save({ documentId: 'v2', supersededPath: 'v1.md', supersededDocumentId: 'v1' });
      await store.save({ documentId: 'v3', supersededPath: 'v2.md', supersededDocumentId: 'v2' });
    });

    it('reconnects the successor to the target of the removed document', async () => {
      const result = await store.splice('v2');

      expect(result).toEqual({ chainReconnected: true, orphanedSuccessorId: null });
      expect(await store.getByDocumentId('v2')).toBeNull();
      expect(await store.getByDocumentId('v3')).toMatchObject({
        supersededPath: 'v1.md',
        supersededDocumentId: 'v1',
      });
    });

    it('leaves the successor dangling when the oldest document is removed', async () => {
      const result = await store.splice('v1');

      expect(result).toEqual({ chainReconnected: false, orphanedSuccessorId: 'v2' });
      expect(await store.getByDocumentId('v2')).toMatchObject({
        supersededPath: 'v1.md',
        supersededDocumentId: null,
      });
    });

    it('drops only the own record for the newest document', async () => {
      const result = await store.splice('v3');

      expect(result).toEqual({ chainReconnected: false, orphanedSuccessorId: null });
      expect((await store.getAll()).map((r) => r.documentId)).toEqual(['v2']);
    });
  });
});
