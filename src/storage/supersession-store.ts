/**
 * Tenant-scoped supersession persistence.
 *
 * One row per superseding document. The partial unique index on
 * superseded_document_id keeps at most one successor per target.
 */

import { getDb } from './db.js';
import type { SpliceResult, SupersessionRecord, SupersessionRepository } from './types.js';
import type { TenantKey } from '../core/types.js';
import { formatTenantKey } from '../core/tenant.js';
import { StorageError } from '../utils/errors.js';

interface SupersessionRow {
  document_id: string;
  superseded_path: string;
  superseded_document_id: string | null;
  created_at: string;
}

const COLUMNS = 'document_id, superseded_path, superseded_document_id, created_at';

function rowToRecord(row: SupersessionRow): SupersessionRecord {
  return {
    documentId: row.document_id,
    supersededPath: row.superseded_path,
    supersededDocumentId: row.superseded_document_id,
    createdAt: row.created_at,
  };
}

export class SqliteSupersessionStore implements SupersessionRepository {
  private readonly tenantKey: string;

  constructor(
    tenant: TenantKey,
    private db?: ReturnType<typeof getDb>,
  ) {
    this.tenantKey = formatTenantKey(tenant);
  }

  private getDatabase() {
    return this.db ?? getDb();
  }

  private query<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new StorageError(`Supersession store ${operation} failed`, 'DB_QUERY_FAILED', error);
    }
  }

  private selectOne(where: string, value: string): SupersessionRecord | null {
    const row = this.getDatabase()
      .prepare(`SELECT ${COLUMNS} FROM supersessions WHERE tenant_key = ? AND ${where} = ?`)
      .get(this.tenantKey, value) as SupersessionRow | undefined;
    return row ? rowToRecord(row) : null;
  }

  async getByDocumentId(documentId: string): Promise<SupersessionRecord | null> {
    return this.query('getByDocumentId', () => this.selectOne('document_id', documentId));
  }

  async getSuccessor(documentId: string): Promise<SupersessionRecord | null> {
    return this.query('getSuccessor', () => this.selectOne('superseded_document_id', documentId));
  }

  async getAll(): Promise<SupersessionRecord[]> {
    return this.query('getAll', () => {
      const rows = this.getDatabase()
        .prepare(`SELECT ${COLUMNS} FROM supersessions WHERE tenant_key = ? ORDER BY document_id`)
        .all(this.tenantKey) as SupersessionRow[];
      return rows.map(rowToRecord);
    });
  }

  async getUnresolved(): Promise<SupersessionRecord[]> {
    return this.query('getUnresolved', () => {
      const rows = this.getDatabase()
        .prepare(
          `SELECT ${COLUMNS} FROM supersessions
           WHERE tenant_key = ? AND superseded_document_id IS NULL
           ORDER BY document_id`,
        )
        .all(this.tenantKey) as SupersessionRow[];
      return rows.map(rowToRecord);
    });
  }

  async save(record: Omit<SupersessionRecord, 'createdAt'>): Promise<void> {
    this.query('save', () => {
      this.getDatabase()
        .prepare(
          `INSERT INTO supersessions (document_id, tenant_key, superseded_path, superseded_document_id)
           VALUES (?, ?, ?, ?)
           ON CONFLICT(document_id) DO UPDATE SET
             superseded_path = excluded.superseded_path,
             superseded_document_id = excluded.superseded_document_id,
             created_at = CURRENT_TIMESTAMP`,
        )
        .run(record.documentId, this.tenantKey, record.supersededPath, record.supersededDocumentId);
    });
  }

  async resolveTarget(documentId: string, supersededDocumentId: string): Promise<void> {
    this.query('resolveTarget', () => {
      this.getDatabase()
        .prepare(
          `UPDATE supersessions SET superseded_document_id = ?
           WHERE tenant_key = ? AND document_id = ?`,
        )
        .run(supersededDocumentId, this.tenantKey, documentId);
    });
  }

  async delete(documentId: string): Promise<boolean> {
    return this.query('delete', () => {
      const result = this.getDatabase()
        .prepare('DELETE FROM supersessions WHERE tenant_key = ? AND document_id = ?')
        .run(this.tenantKey, documentId);
      return result.changes > 0;
    });
  }

  async splice(documentId: string): Promise<SpliceResult> {
    return this.query('splice', () => {
      const db = this.getDatabase();

      const run = db.transaction((id: string): SpliceResult => {
        const own = this.selectOne('document_id', id);
        const successor = this.selectOne('superseded_document_id', id);

        if (own) {
          db.prepare('DELETE FROM supersessions WHERE tenant_key = ? AND document_id = ?').run(
            this.tenantKey,
            id,
          );
        }

        if (!successor) {
          return { chainReconnected: false, orphanedSuccessorId: null };
        }

        if (own) {
          // Successor now supersedes whatever the removed document superseded
          db.prepare(
            `UPDATE supersessions SET superseded_path = ?, superseded_document_id = ?
             WHERE tenant_key = ? AND document_id = ?`,
          ).run(own.supersededPath, own.supersededDocumentId, this.tenantKey, successor.documentId);
          return { chainReconnected: true, orphanedSuccessorId: null };
        }

        // Removed the oldest document: successor keeps the path, target becomes dangling
        db.prepare(
          `UPDATE supersessions SET superseded_document_id = NULL
           WHERE tenant_key = ? AND document_id = ?`,
        ).run(this.tenantKey, successor.documentId);
        return { chainReconnected: false, orphanedSuccessorId: successor.documentId };
      });

      return run(documentId);
    });
  }
}
