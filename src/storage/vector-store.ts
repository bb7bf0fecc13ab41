/**
 * In-memory vector index with SQLite persistence.
 *
 * Document embeddings are stored as Float32Array blobs in `document_vectors`
 * and loaded into memory on first access for brute-force search.
 *
 * ## Architecture
 *
 * ```
 * ┌─────────────────────────────────────────────────────────────┐
 * │                  SqliteVectorStore                          │
 * │  ┌─────────────────────┐    ┌─────────────────────────────┐ │
 * │  │  In-Memory Index    │    │    SQLite Persistence       │ │
 * │  │  Map<id, number[]>  │ ◄──┤  document_vectors           │ │
 * │  └─────────────────────┘    │  documents (filter columns) │ │
 * │                             └─────────────────────────────┘ │
 * └─────────────────────────────────────────────────────────────┘
 * ```
 *
 * Filtering by tenant, promotion floor and doc type runs in SQL before
 * scoring, so topN always counts eligible documents only.
 *
 * ## Score
 *
 * Cosine similarity with negative values floored at 0, giving [0, 1]:
 * - `1.0`: identical direction
 * - `0.0`: orthogonal or opposite
 *
 * ## Cache
 *
 * The in-memory index is shared by every store on the same connection, so
 * two engines for one database see each other's writes. Commits from other
 * connections bump SQLite's `data_version`, which triggers a reload on next
 * use. Raw SQL writes on the same connection are not seen until `reload()`.
 *
 * @module storage/vector-store
 */

import { getDb } from './db.js';
import { rowToDocument, type DocumentRow } from './document-store.js';
import type { VectorSearchFilter, VectorSearchHit, VectorStore } from './types.js';
import { formatTenantKey } from '../core/tenant.js';
import { levelsAtOrAbove, tagsForLevels } from '../core/promotion.js';
import { serializeEmbedding, deserializeEmbedding, similarityScore } from '../utils/embedding-utils.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('vector-store');

interface VectorCache {
  vectors: Map<string, number[]>;
  /** data_version at load time; null until loaded */
  dataVersion: number | null;
}

const caches = new WeakMap<ReturnType<typeof getDb>, VectorCache>();

export class SqliteVectorStore implements VectorStore {
  constructor(private db?: ReturnType<typeof getDb>) {}

  private getDatabase() {
    return this.db ?? getDb();
  }

  private get cache(): VectorCache {
    const db = this.getDatabase();
    let cache = caches.get(db);
    if (!cache) {
      cache = { vectors: new Map(), dataVersion: null };
      caches.set(db, cache);
    }
    return cache;
  }

  private get vectors(): Map<string, number[]> {
    return this.cache.vectors;
  }

  private dataVersion(): number {
    const version = this.getDatabase().pragma('data_version', { simple: true });
    return typeof version === 'number' ? version : 0;
  }

  /**
   * Load vectors from database into memory, unless the cache is current.
   */
  async load(): Promise<void> {
    const cache = this.cache;
    const version = this.dataVersion();
    if (cache.dataVersion === version) return;

    const rows = this.getDatabase()
      .prepare('SELECT document_id, embedding FROM document_vectors')
      .all() as Array<{ document_id: string; embedding: Buffer }>;

    cache.vectors.clear();
    for (const row of rows) {
      cache.vectors.set(row.document_id, deserializeEmbedding(row.embedding));
    }

    cache.dataVersion = version;
    log.debug(`Loaded ${rows.length} vectors`);
  }

  /**
   * Drop the in-memory index; the next operation reloads it.
   */
  reload(): void {
    const cache = this.cache;
    cache.vectors.clear();
    cache.dataVersion = null;
  }

  /**
   * Insert or replace the embedding of an indexed document.
   */
  async upsertEmbedding(documentId: string, embedding: readonly number[]): Promise<void> {
    await this.load();

    this.getDatabase()
      .prepare(
        `INSERT OR REPLACE INTO document_vectors (document_id, embedding, updated_at)
         VALUES (?, ?, CURRENT_TIMESTAMP)`,
      )
      .run(documentId, serializeEmbedding(embedding));

    this.vectors.set(documentId, [...embedding]);
  }

  /**
   * Remove a document's embedding.
   */
  async removeEmbedding(documentId: string): Promise<boolean> {
    await this.load();

    const result = this.getDatabase()
      .prepare('DELETE FROM document_vectors WHERE document_id = ?')
      .run(documentId);

    this.vectors.delete(documentId);
    return result.changes > 0;
  }

  /**
   * Get vector count.
   */
  async count(): Promise<number> {
    await this.load();
    return this.vectors.size;
  }

  /**
   * Search eligible documents by similarity.
   *
   * @returns Up to topN hits, score descending (ties by document id)
   */
  async search(
    embedding: readonly number[],
    topN: number,
    filter: VectorSearchFilter,
  ): Promise<VectorSearchHit[]> {
    await this.load();
    if (topN <= 0) return [];

    const db = this.getDatabase();
    const eligibleIds = this.eligibleDocumentIds(filter);

    const scored: Array<{ id: string; score: number }> = [];
    for (const id of eligibleIds) {
      const vector = this.vectors.get(id);
      if (!vector) continue;
      scored.push({ id, score: similarityScore(embedding, vector) });
    }

    scored.sort((a, b) => b.score - a.score || a.id.localeCompare(b.id));
    const top = scored.slice(0, topN);
    if (top.length === 0) return [];

    const placeholders = top.map(() => '?').join(',');
    const rows = db
      .prepare(
        `SELECT id, tenant_key, relative_path, title, summary, content, char_count,
                doc_type, promotion_level, document_date, indexed_at
         FROM documents WHERE id IN (${placeholders})`,
      )
      .all(...top.map((t) => t.id)) as DocumentRow[];
    const byId = new Map(rows.map((row) => [row.id, rowToDocument(row)]));

    const hits: VectorSearchHit[] = [];
    for (const { id, score } of top) {
      const document = byId.get(id);
      if (document) hits.push({ document, score });
    }
    return hits;
  }

  private eligibleDocumentIds(filter: VectorSearchFilter): string[] {
    const clauses = ['tenant_key = ?'];
    const params: string[] = [formatTenantKey(filter.tenant)];

    // Untagged and malformed documents count as standard, so a standard floor admits everything
    if (filter.minPromotionLevel !== 'standard') {
      const tags = tagsForLevels(levelsAtOrAbove(filter.minPromotionLevel));
      clauses.push(`LOWER(TRIM(promotion_level)) IN (${tags.map(() => '?').join(',')})`);
      params.push(...tags);
    }

    if (filter.docTypes !== undefined) {
      if (filter.docTypes.length === 0) return [];
      clauses.push(`doc_type IN (${filter.docTypes.map(() => '?').join(',')})`);
      params.push(...filter.docTypes);
    }

    const rows = this.getDatabase()
      .prepare(`SELECT id FROM documents WHERE ${clauses.join(' AND ')}`)
      .all(...params) as Array<{ id: string }>;
    return rows.map((r) => r.id);
  }
}
