import { describe, it, expect } from 'vitest';
import { openDatabase } from '../db';
import { getMetrics } from '../indexing/metrics';
import { RetryPolicy } from '../lib/retryPolicy';
import { SqliteVectorRepository } from '../store/sqliteVectorRepository';
import { HashingEmbedder, hashEmbedding } from '../testing/fakeEmbedder';
import type { Chunk } from '../indexing/types';
import { SearchService } from './searchService';

function chunk(messageId: string, text: string): Chunk {
  return {
    chunkId: `${messageId}_0`,
    messageId,
    chunkIndex: 0,
    text,
    embedding: hashEmbedding(text),
    contentHash: 'h',
    metadata: { subject: '', sender: '', timestamp: 1000, labels: ['INBOX'], threadId: messageId },
  };
}

describe('SearchService', () => {
  const retry = new RetryPolicy({ maxAttempts: 1, baseDelayMs: 1, maxDelayMs: 1, timeoutMs: 1000 });

  it('embeds the query as a query and returns the nearest chunks', async () => {
    const repository = new SqliteVectorRepository(openDatabase(':memory:'));
    await repository.upsert([chunk('invoice', 'invoice payment due march'), chunk('lunch', 'lunch on friday')]);
    const embedder = new HashingEmbedder();
    const search = new SearchService(embedder, repository, retry);
    const before = getMetrics().queryCount;

    const hits = await search.semanticSearch('invoice payment', 1);
    expect(hits.map((h) => h.chunk.messageId)).toEqual(['invoice']);
    expect(embedder.calls).toEqual([{ texts: ['invoice payment'], inputType: 'query' }]);
    expect(getMetrics().queryCount).toBe(before + 1);
  });

  it('returns nothing for a blank query without calling the embedder', async () => {
    const embedder = new HashingEmbedder();
    const search = new SearchService(embedder, new SqliteVectorRepository(openDatabase(':memory:')), retry);
    expect(await search.semanticSearch('   ', 5)).toEqual([]);
    expect(embedder.calls).toEqual([]);
  });
});
