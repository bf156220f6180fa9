/**
 * Postgres + pgvector vector repository. Lazy schema setup on first use; all calls go through a Pool.
 */

import type { Pool, PoolClient } from 'pg';
import { RepositoryUnavailableError } from '../errors';
import type { Chunk, MetadataFilter, ScoredChunk } from '../indexing/types';
import { compareScored, groupByMessage, type RepositoryHealth, type VectorRepository } from './vectorRepository';

type PgChunkRow = {
  chunk_id: string;
  message_id: string;
  chunk_index: number;
  thread_id: string;
  subject: string;
  sender: string;
  internal_date: string;
  label_ids: string[];
  body_text: string;
  content_hash: string;
  embedding: string;
  score: number | string;
};

export function toVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(',')}]`;
}

/** pgvector text output (`[1,2,3]`) back to numbers. */
export function parseVectorLiteral(text: string): number[] {
  const inner = text.trim().replace(/^\[/, '').replace(/\]$/, '');
  if (!inner) return [];
  return inner.split(',').map((x) => Number(x));
}

/**
 * WHERE clause for the metadata filter. Placeholders start at `$firstParam`.
 * Labels use array containment so the GIN index applies.
 */
export function buildPgFilter(
  filter: MetadataFilter | undefined,
  firstParam: number
): { where: string; params: (string | number | string[])[] } {
  const clauses: string[] = [];
  const params: (string | number | string[])[] = [];
  const next = (value: string | number | string[]): string => {
    params.push(value);
    return `$${firstParam + params.length - 1}`;
  };
  if (filter?.after !== undefined) clauses.push(`internal_date >= ${next(filter.after)}`);
  if (filter?.before !== undefined) clauses.push(`internal_date < ${next(filter.before)}`);
  if (filter?.threadId !== undefined) clauses.push(`thread_id = ${next(filter.threadId)}`);
  if (filter?.labels && filter.labels.length > 0) {
    clauses.push(`label_ids @> ${next([...new Set(filter.labels)])}::text[]`);
  }
  return { where: clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '', params };
}

/** pgvector's default and maximum `hnsw.ef_search`. */
const DEFAULT_EF_SEARCH = 40;
const MAX_EF_SEARCH = 1000;

/**
 * Planner settings for one similarity query. An HNSW scan yields at most `ef_search` rows
 * before the WHERE clause applies, so filtered queries and k above the ef_search ceiling
 * skip the vector index and rank every matching row.
 */
export function scanSettings(k: number, filter: MetadataFilter | undefined): string[] {
  const filtered = buildPgFilter(filter, 1).params.length > 0;
  if (filtered || k > MAX_EF_SEARCH) return ['SET LOCAL enable_indexscan = off'];
  return [`SET LOCAL hnsw.ef_search = ${Math.max(Math.trunc(k), DEFAULT_EF_SEARCH)}`];
}

/** The part of a pooled client a transaction needs. */
export interface TransactionClient {
  query(text: string, values?: unknown[]): Promise<unknown>;
  release(err?: Error | boolean): void;
}

/**
 * Run `fn` between BEGIN and COMMIT, then release the client. A failed rollback destroys
 * the connection instead of returning it to the pool; the original error is rethrown.
 */
export async function withTransaction<C extends TransactionClient, T>(
  client: C,
  fn: (client: C) => Promise<T>
): Promise<T> {
  let result: T;
  try {
    await client.query('BEGIN');
    result = await fn(client);
    await client.query('COMMIT');
  } catch (e) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      console.error('[store] rollback failed, dropping the connection', rollbackErr);
      client.release(rollbackErr instanceof Error ? rollbackErr : true);
      throw e;
    }
    client.release();
    throw e;
  }
  client.release();
  return result;
}

function rowToScored(r: PgChunkRow): ScoredChunk {
  return {
    chunk: {
      chunkId: r.chunk_id,
      messageId: r.message_id,
      chunkIndex: r.chunk_index,
      text: r.body_text,
      embedding: parseVectorLiteral(r.embedding),
      contentHash: r.content_hash,
      metadata: {
        subject: r.subject,
        sender: r.sender,
        timestamp: parseInt(r.internal_date, 10) || 0,
        labels: r.label_ids ?? [],
        threadId: r.thread_id,
      },
    },
    score: Number(r.score) || 0,
  };
}

export class PostgresVectorRepository implements VectorRepository {
  readonly backend = 'postgres';

  constructor(
    private readonly pool: Pool,
    private readonly ready: () => Promise<void>
  ) {}

  private async guard<T>(fn: () => Promise<T>): Promise<T> {
    try {
      await this.ready();
      return await fn();
    } catch (e) {
      throw new RepositoryUnavailableError(this.backend, { cause: e });
    }
  }

  private async replaceMessage(client: PoolClient, messageId: string, group: Chunk[]): Promise<void> {
    await client.query('DELETE FROM mail_chunks WHERE message_id = $1', [messageId]);
    for (const c of group) {
      await client.query(
        `INSERT INTO mail_chunks (chunk_id, message_id, chunk_index, thread_id, subject, sender, internal_date,
                                  label_ids, body_text, content_hash, embedding, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11::vector, NOW())`,
        [
          c.chunkId,
          c.messageId,
          c.chunkIndex,
          c.metadata.threadId,
          c.metadata.subject,
          c.metadata.sender,
          c.metadata.timestamp,
          c.metadata.labels,
          c.text,
          c.contentHash,
          toVectorLiteral(c.embedding),
        ]
      );
    }
  }

  async upsert(chunks: Chunk[]): Promise<void> {
    if (chunks.length === 0) return;
    await this.guard(async () => {
      for (const [messageId, group] of groupByMessage(chunks)) {
        await withTransaction(await this.pool.connect(), (client) => this.replaceMessage(client, messageId, group));
      }
    });
  }

  async query(embedding: number[], k: number, filter?: MetadataFilter): Promise<ScoredChunk[]> {
    if (k <= 0) return [];
    const { where, params } = buildPgFilter(filter, 2);
    const rows = await this.guard(async () =>
      withTransaction(await this.pool.connect(), async (client) => {
        for (const setting of scanSettings(k, filter)) await client.query(setting);
        const res = await client.query<PgChunkRow>(
          `SELECT chunk_id, message_id, chunk_index, thread_id, subject, sender, internal_date::text AS internal_date,
                  label_ids, body_text, content_hash, embedding::text AS embedding,
                  (1 - (embedding <=> $1::vector)) AS score
           FROM mail_chunks
           ${where}
           ORDER BY embedding <=> $1::vector, mail_chunks.internal_date DESC, chunk_id
           LIMIT $${params.length + 2}`,
          [toVectorLiteral(embedding), ...params, k]
        );
        return res.rows;
      })
    );
    return rows.map(rowToScored).sort(compareScored);
  }

  async deleteByMessageId(messageId: string): Promise<number> {
    const res = await this.guard(() => this.pool.query('DELETE FROM mail_chunks WHERE message_id = $1', [messageId]));
    return res.rowCount ?? 0;
  }

  async getContentHashes(messageIds: string[]): Promise<Map<string, string>> {
    const out = new Map<string, string>();
    if (messageIds.length === 0) return out;
    const res = await this.guard(() =>
      this.pool.query<{ message_id: string; content_hash: string }>(
        'SELECT DISTINCT ON (message_id) message_id, content_hash FROM mail_chunks WHERE message_id = ANY($1)',
        [[...new Set(messageIds)]]
      )
    );
    for (const r of res.rows) out.set(r.message_id, r.content_hash);
    return out;
  }

  async countChunks(messageId: string): Promise<number> {
    const res = await this.guard(() =>
      this.pool.query<{ n: string }>('SELECT COUNT(*)::text AS n FROM mail_chunks WHERE message_id = $1', [messageId])
    );
    return parseInt(res.rows[0]?.n ?? '0', 10);
  }

  async clear(): Promise<void> {
    await this.guard(() => this.pool.query('DELETE FROM mail_chunks'));
  }

  async healthCheck(): Promise<RepositoryHealth> {
    try {
      await this.ready();
      const res = await this.pool.query<{ n: string }>('SELECT COUNT(*)::text AS n FROM mail_chunks');
      return { ok: true, backend: this.backend, chunkCount: parseInt(res.rows[0]?.n ?? '0', 10) };
    } catch (e) {
      return { ok: false, backend: this.backend, detail: e instanceof Error ? e.message : String(e) };
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
