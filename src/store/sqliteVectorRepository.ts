/**
 * Local vector index on better-sqlite3. Embeddings are Float32 blobs; cosine is computed in process
 * over the rows that survive the indexed label/date/thread filters.
 */

import type { SqliteDatabase } from '../db';
import { RepositoryUnavailableError } from '../errors';
import type { Chunk, MetadataFilter, ScoredChunk } from '../indexing/types';
import { safeParseStringArray } from '../safeJson';
import {
  compareScored,
  cosineSimilarity,
  groupByMessage,
  type RepositoryHealth,
  type VectorRepository,
} from './vectorRepository';

interface ChunkRow {
  chunk_id: string;
  message_id: string;
  chunk_index: number;
  thread_id: string;
  subject: string;
  sender: string;
  internal_date: number;
  label_ids: string;
  text: string;
  content_hash: string;
  embedding: Buffer;
}

function encodeEmbedding(embedding: number[]): Buffer {
  return Buffer.from(new Float32Array(embedding).buffer);
}

function decodeEmbedding(blob: Buffer): Float32Array {
  // copy: the Buffer may be a view into a shared pool and unaligned for Float32Array
  const bytes = blob.buffer.slice(blob.byteOffset, blob.byteOffset + blob.byteLength);
  return new Float32Array(bytes);
}

function rowToChunk(r: ChunkRow, embedding: Float32Array): Chunk {
  return {
    chunkId: r.chunk_id,
    messageId: r.message_id,
    chunkIndex: r.chunk_index,
    text: r.text,
    embedding: Array.from(embedding),
    contentHash: r.content_hash,
    metadata: {
      subject: r.subject,
      sender: r.sender,
      timestamp: r.internal_date,
      labels: safeParseStringArray(r.label_ids),
      threadId: r.thread_id,
    },
  };
}

export function buildFilterClause(filter: MetadataFilter | undefined): { where: string; params: (string | number)[] } {
  const clauses: string[] = [];
  const params: (string | number)[] = [];
  if (filter?.after !== undefined) {
    clauses.push('c.internal_date >= ?');
    params.push(filter.after);
  }
  if (filter?.before !== undefined) {
    clauses.push('c.internal_date < ?');
    params.push(filter.before);
  }
  if (filter?.threadId !== undefined) {
    clauses.push('c.thread_id = ?');
    params.push(filter.threadId);
  }
  const labels = [...new Set(filter?.labels ?? [])];
  if (labels.length > 0) {
    clauses.push(
      `c.chunk_id IN (SELECT chunk_id FROM chunk_labels WHERE label IN (${labels.map(() => '?').join(', ')})
        GROUP BY chunk_id HAVING COUNT(*) = ?)`
    );
    params.push(...labels, labels.length);
  }
  return { where: clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '', params };
}

export class SqliteVectorRepository implements VectorRepository {
  readonly backend = 'local';

  constructor(private readonly db: SqliteDatabase) {}

  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      throw new RepositoryUnavailableError(this.backend, { cause: e });
    }
  }

  async upsert(chunks: Chunk[]): Promise<void> {
    if (chunks.length === 0) return;
    const now = Date.now();
    this.guard(() => {
      const deleteLabels = this.db.prepare(
        'DELETE FROM chunk_labels WHERE chunk_id IN (SELECT chunk_id FROM chunks WHERE message_id = ?)'
      );
      const deleteChunks = this.db.prepare('DELETE FROM chunks WHERE message_id = ?');
      const insertChunk = this.db.prepare(`
        INSERT INTO chunks (chunk_id, message_id, chunk_index, thread_id, subject, sender, internal_date,
                            label_ids, text, content_hash, embedding, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);
      const insertLabel = this.db.prepare('INSERT OR IGNORE INTO chunk_labels (label, chunk_id) VALUES (?, ?)');
      const replaceMessage = this.db.transaction((messageId: string, group: Chunk[]) => {
        deleteLabels.run(messageId);
        deleteChunks.run(messageId);
        for (const c of group) {
          insertChunk.run(
            c.chunkId,
            c.messageId,
            c.chunkIndex,
            c.metadata.threadId,
            c.metadata.subject,
            c.metadata.sender,
            c.metadata.timestamp,
            JSON.stringify(c.metadata.labels),
            c.text,
            c.contentHash,
            encodeEmbedding(c.embedding),
            now
          );
          for (const label of c.metadata.labels) insertLabel.run(label, c.chunkId);
        }
      });
      for (const [messageId, group] of groupByMessage(chunks)) {
        replaceMessage(messageId, group);
      }
    });
  }

  async query(embedding: number[], k: number, filter?: MetadataFilter): Promise<ScoredChunk[]> {
    if (k <= 0) return [];
    const { where, params } = buildFilterClause(filter);
    const rows = this.guard(
      () =>
        this.db
          .prepare(
            `SELECT c.chunk_id, c.message_id, c.chunk_index, c.thread_id, c.subject, c.sender, c.internal_date,
                    c.label_ids, c.text, c.content_hash, c.embedding
             FROM chunks c ${where}`
          )
          .all(...params) as ChunkRow[]
    );
    const scored = rows.map((r) => {
      const vector = decodeEmbedding(r.embedding);
      return { chunk: rowToChunk(r, vector), score: cosineSimilarity(embedding, vector) };
    });
    return scored.sort(compareScored).slice(0, k);
  }

  async deleteByMessageId(messageId: string): Promise<number> {
    return this.guard(() =>
      this.db.transaction(() => {
        this.db
          .prepare('DELETE FROM chunk_labels WHERE chunk_id IN (SELECT chunk_id FROM chunks WHERE message_id = ?)')
          .run(messageId);
        return this.db.prepare('DELETE FROM chunks WHERE message_id = ?').run(messageId).changes;
      })()
    );
  }

  async getContentHashes(messageIds: string[]): Promise<Map<string, string>> {
    const out = new Map<string, string>();
    if (messageIds.length === 0) return out;
    this.guard(() => {
      const stmt = this.db.prepare('SELECT content_hash FROM chunks WHERE message_id = ? LIMIT 1');
      for (const id of new Set(messageIds)) {
        const row = stmt.get(id) as { content_hash: string } | undefined;
        if (row) out.set(id, row.content_hash);
      }
    });
    return out;
  }

  async countChunks(messageId: string): Promise<number> {
    const row = this.guard(
      () => this.db.prepare('SELECT COUNT(*) AS n FROM chunks WHERE message_id = ?').get(messageId) as { n: number }
    );
    return row.n;
  }

  async clear(): Promise<void> {
    this.guard(() => this.db.exec('DELETE FROM chunk_labels; DELETE FROM chunks;'));
  }

  async healthCheck(): Promise<RepositoryHealth> {
    try {
      const row = this.db.prepare('SELECT COUNT(*) AS n FROM chunks').get() as { n: number };
      return { ok: true, backend: this.backend, chunkCount: row.n };
    } catch (e) {
      return { ok: false, backend: this.backend, detail: e instanceof Error ? e.message : String(e) };
    }
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}
