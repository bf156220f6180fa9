/**
 * Ingestion for one record: chunk -> embed (batched, retried) -> Chunk[] ready for upsert.
 */

import type { EmailRecord } from '../mail/types';
import { EmbeddingFailedError } from '../errors';
import type { RetryPolicy } from '../lib/retryPolicy';
import { chunkText, type ChunkOptions } from './chunker';
import type { EmbeddingProvider } from './embedder';
import { recordEmbedLatencyMs } from './metrics';
import { chunkIdFor, type Chunk } from './types';

export interface PipelineOptions extends ChunkOptions {
  /** Texts per embedding request; capped at the provider's own limit. */
  batchSize: number;
}

export function embeddingInput(record: Pick<EmailRecord, 'subject' | 'sender'>, text: string): string {
  return `Subject: ${record.subject}\nFrom: ${record.sender}\n\n${text}`;
}

export class ChunkEmbedPipeline {
  private readonly batchSize: number;

  constructor(
    private readonly embedder: EmbeddingProvider,
    private readonly retry: RetryPolicy,
    private readonly options: PipelineOptions
  ) {
    this.batchSize = Math.max(1, Math.min(options.batchSize, embedder.maxBatchSize));
  }

  /** Throws EmbeddingFailedError when any batch fails; partial chunk sets are never returned. */
  async process(record: EmailRecord): Promise<Chunk[]> {
    const texts = chunkText(record.bodyText, this.options);
    const inputs = texts.map((t) => embeddingInput(record, t));
    const embeddings: number[][] = [];
    const started = Date.now();
    try {
      for (let i = 0; i < inputs.length; i += this.batchSize) {
        const batch = inputs.slice(i, i + this.batchSize);
        const vectors = await this.retry.run(`embed ${record.messageId}`, (signal) =>
          this.embedder.embed(batch, { inputType: 'document', signal })
        );
        if (vectors.length !== batch.length) {
          throw new Error(`expected ${batch.length} embeddings, got ${vectors.length}`);
        }
        embeddings.push(...vectors);
      }
    } catch (e) {
      throw new EmbeddingFailedError(record.messageId, { cause: e });
    }
    recordEmbedLatencyMs(Date.now() - started);

    return texts.map((text, chunkIndex) => ({
      chunkId: chunkIdFor(record.messageId, chunkIndex),
      messageId: record.messageId,
      chunkIndex,
      text,
      embedding: embeddings[chunkIndex],
      contentHash: record.contentHash,
      metadata: {
        subject: record.subject,
        sender: record.sender,
        timestamp: record.timestamp,
        labels: record.labels,
        threadId: record.threadId,
      },
    }));
  }
}
