/**
 * Tenant-scoped document persistence.
 *
 * Implements the DocumentRepository lookups used by the retriever, the
 * assembler and the supersession tracker, plus the write path the indexer
 * calls when a document is created, changed or removed.
 */

import { getDb, generateId } from './db.js';
import type { DocumentInput, DocumentRepository, StoredDocument } from './types.js';
import type { PromotionLevel, TenantKey } from '../core/types.js';
import { formatTenantKey } from '../core/tenant.js';
import { tagsForLevels } from '../core/promotion.js';
import { StorageError } from '../utils/errors.js';

/** SQLite caps bound parameters per statement */
const MAX_BATCH = 500;

const DOCUMENT_COLUMNS = `id, tenant_key, relative_path, title, summary, content, char_count,
  doc_type, promotion_level, document_date, indexed_at`;

export interface DocumentRow {
  id: string;
  tenant_key: string;
  relative_path: string;
  title: string;
  summary: string | null;
  content: string;
  char_count: number;
  doc_type: string;
  promotion_level: string | null;
  document_date: string | null;
  indexed_at: string;
}

export function rowToDocument(row: DocumentRow): StoredDocument {
  return {
    id: row.id,
    tenantKey: row.tenant_key,
    path: row.relative_path,
    title: row.title,
    summary: row.summary,
    content: row.content,
    charCount: row.char_count,
    docType: row.doc_type,
    promotionTag: row.promotion_level,
    date: row.document_date,
    indexedAt: row.indexed_at,
  };
}

export class SqliteDocumentStore implements DocumentRepository {
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
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Document store ${operation} failed`, 'DB_QUERY_FAILED', error);
    }
  }

  async getByPath(path: string): Promise<StoredDocument | null> {
    return this.query('getByPath', () => {
      const row = this.getDatabase()
        .prepare(
          `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE tenant_key = ? AND relative_path = ?`,
        )
        .get(this.tenantKey, path) as DocumentRow | undefined;
      return row ? rowToDocument(row) : null;
    });
  }

  async getById(id: string): Promise<StoredDocument | null> {
    return this.query('getById', () => {
      const row = this.getDatabase()
        .prepare(`SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE tenant_key = ? AND id = ?`)
        .get(this.tenantKey, id) as DocumentRow | undefined;
      return row ? rowToDocument(row) : null;
    });
  }

  async getByPaths(paths: readonly string[]): Promise<Map<string, StoredDocument>> {
    const unique = [...new Set(paths)];
    const result = new Map<string, StoredDocument>();
    if (unique.length === 0) return result;

    return this.query('getByPaths', () => {
      const db = this.getDatabase();
      for (let i = 0; i < unique.length; i += MAX_BATCH) {
        const batch = unique.slice(i, i + MAX_BATCH);
        const placeholders = batch.map(() => '?').join(',');
        const rows = db
          .prepare(
            `SELECT ${DOCUMENT_COLUMNS} FROM documents
             WHERE tenant_key = ? AND relative_path IN (${placeholders})`,
          )
          .all(this.tenantKey, ...batch) as DocumentRow[];
        for (const row of rows) {
          result.set(row.relative_path, rowToDocument(row));
        }
      }
      return result;
    });
  }

  async exists(path: string): Promise<boolean> {
    return this.query('exists', () => {
      const row = this.getDatabase()
        .prepare('SELECT 1 FROM documents WHERE tenant_key = ? AND relative_path = ?')
        .get(this.tenantKey, path);
      return row !== undefined;
    });
  }

  async getByPromotionLevel(
    level: PromotionLevel,
    docTypes?: readonly string[],
  ): Promise<StoredDocument[]> {
    const tags = tagsForLevels([level]);
    const tagPlaceholders = tags.map(() => '?').join(',');
    const params: string[] = [this.tenantKey, ...tags];

    let typeClause = '';
    if (docTypes !== undefined) {
      if (docTypes.length === 0) return [];
      typeClause = ` AND doc_type IN (${docTypes.map(() => '?').join(',')})`;
      params.push(...docTypes);
    }

    return this.query('getByPromotionLevel', () => {
      const rows = this.getDatabase()
        .prepare(
          `SELECT ${DOCUMENT_COLUMNS} FROM documents
           WHERE tenant_key = ? AND LOWER(TRIM(promotion_level)) IN (${tagPlaceholders})${typeClause}
           ORDER BY relative_path`,
        )
        .all(...params) as DocumentRow[];
      return rows.map(rowToDocument);
    });
  }

  async updatePromotionLevel(id: string, level: PromotionLevel): Promise<void> {
    this.query('updatePromotionLevel', () => {
      this.getDatabase()
        .prepare('UPDATE documents SET promotion_level = ? WHERE tenant_key = ? AND id = ?')
        .run(level, this.tenantKey, id);
    });
  }

  /**
   * Insert or update a document by path. The existing id is kept on update.
   * A caller-supplied id for a new path must not be taken by any other
   * document, in this tenant or another (ID_CONFLICT).
   * Returns the document id.
   */
  async upsertDocument(input: DocumentInput): Promise<string> {
    return this.query('upsertDocument', () => {
      const db = this.getDatabase();

      const write = db.transaction((doc: DocumentInput): string => {
        const existing = db
          .prepare('SELECT id FROM documents WHERE tenant_key = ? AND relative_path = ?')
          .get(this.tenantKey, doc.path) as { id: string } | undefined;
        if (!existing && doc.id !== undefined) {
          const taken = db.prepare('SELECT 1 FROM documents WHERE id = ?').get(doc.id);
          if (taken !== undefined) {
            throw new StorageError(
              `Document id ${doc.id} is already used by another document`,
              'ID_CONFLICT',
            );
          }
        }
        const id = existing?.id ?? doc.id ?? generateId();

        db.prepare(
          `INSERT INTO documents (
             id, tenant_key, relative_path, title, summary, content, char_count,
             doc_type, promotion_level, document_date, indexed_at
           ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, CURRENT_TIMESTAMP)
           ON CONFLICT(id) DO UPDATE SET
             title = excluded.title,
             summary = excluded.summary,
             content = excluded.content,
             char_count = excluded.char_count,
             doc_type = excluded.doc_type,
             promotion_level = excluded.promotion_level,
             document_date = excluded.document_date,
             indexed_at = CURRENT_TIMESTAMP
           WHERE documents.tenant_key = excluded.tenant_key
             AND documents.relative_path = excluded.relative_path`,
        ).run(
          id,
          this.tenantKey,
          doc.path,
          doc.title,
          doc.summary ?? null,
          doc.content,
          doc.content.length,
          doc.docType,
          doc.promotionTag ?? null,
          doc.date ?? null,
        );

        return id;
      });

      return write(input);
    });
  }

  /**
   * Delete a document (and its embedding) by path.
   * Returns the deleted id, or null when the path wasn't indexed.
   */
  async deleteDocument(path: string): Promise<string | null> {
    return this.query('deleteDocument', () => {
      const db = this.getDatabase();
      const row = db
        .prepare('SELECT id FROM documents WHERE tenant_key = ? AND relative_path = ?')
        .get(this.tenantKey, path) as { id: string } | undefined;
      if (!row) return null;

      db.prepare('DELETE FROM documents WHERE id = ?').run(row.id);
      return row.id;
    });
  }

  /**
   * All indexed paths for this tenant, sorted.
   */
  async listPaths(): Promise<string[]> {
    return this.query('listPaths', () => {
      const rows = this.getDatabase()
        .prepare('SELECT relative_path FROM documents WHERE tenant_key = ? ORDER BY relative_path')
        .all(this.tenantKey) as Array<{ relative_path: string }>;
      return rows.map((r) => r.relative_path);
    });
  }
}
