/**
 * Vector repository contract shared by the write path (sync/ingest) and the read path (retrieval).
 */

import type { Chunk, MetadataFilter, ScoredChunk } from '../indexing/types';

export interface RepositoryHealth {
  ok: boolean;
  backend: string;
  chunkCount?: number;
  detail?: string;
}

export interface VectorRepository {
  readonly backend: string;
  /** Per message, in one transaction: drop every stored chunk of that message, then insert the new ones. */
  upsert(chunks: Chunk[]): Promise<void>;
  /** Top `k` by cosine similarity; ties go to the newer message, then the lower chunk id. */
  query(embedding: number[], k: number, filter?: MetadataFilter): Promise<ScoredChunk[]>;
  /** Returns the number of chunks removed. */
  deleteByMessageId(messageId: string): Promise<number>;
  getContentHashes(messageIds: string[]): Promise<Map<string, string>>;
  countChunks(messageId: string): Promise<number>;
  clear(): Promise<void>;
  healthCheck(): Promise<RepositoryHealth>;
  close(): Promise<void>;
}

/** Throws RangeError when the lengths differ (an index built with another embedding dimension). */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new RangeError(`embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }
  const n = a.length;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function compareScored(a: ScoredChunk, b: ScoredChunk): number {
  if (b.score !== a.score) return b.score - a.score;
  if (b.chunk.metadata.timestamp !== a.chunk.metadata.timestamp) {
    return b.chunk.metadata.timestamp - a.chunk.metadata.timestamp;
  }
  return a.chunk.chunkId < b.chunk.chunkId ? -1 : a.chunk.chunkId > b.chunk.chunkId ? 1 : 0;
}

/** Chunks grouped by message id, in first-seen order. */
export function groupByMessage(chunks: Chunk[]): Map<string, Chunk[]> {
  const groups = new Map<string, Chunk[]>();
  for (const c of chunks) {
    const list = groups.get(c.messageId);
    if (list) list.push(c);
    else groups.set(c.messageId, [c]);
  }
  return groups;
}
