/**
 * Semantic search: embed the question, then nearest-neighbour query over the vector repository.
 */

import type { EmbeddingProvider } from '../indexing/embedder';
import { recordQueryLatencyMs } from '../indexing/metrics';
import type { MetadataFilter, ScoredChunk } from '../indexing/types';
import type { RetryPolicy } from '../lib/retryPolicy';
import type { VectorRepository } from '../store/vectorRepository';

export class SearchService {
  constructor(
    private readonly embedder: EmbeddingProvider,
    private readonly repository: VectorRepository,
    private readonly retry: RetryPolicy
  ) {}

  async semanticSearch(query: string, k: number, filter?: MetadataFilter): Promise<ScoredChunk[]> {
    if (!query.trim() || k <= 0) return [];
    const t0 = Date.now();
    const [embedding] = await this.retry.run('embed query', (signal) =>
      this.embedder.embed([query], { inputType: 'query', signal })
    );
    if (!embedding) throw new Error('embedding provider returned no vector for the query');
    const results = await this.repository.query(embedding, k, filter);
    recordQueryLatencyMs(Date.now() - t0); // full request: embed + vector query
    return results;
  }
}
