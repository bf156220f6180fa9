import { describe, it, expect } from 'vitest';
import { ChunkEmbedPipeline, embeddingInput } from './pipeline';
import { EmbeddingFailedError, TransientProviderError } from '../errors';
import { RetryPolicy } from '../lib/retryPolicy';
import { HashingEmbedder, hashEmbedding } from '../testing/fakeEmbedder';
import type { EmailRecord } from '../mail/types';

function record(bodyText: string): EmailRecord {
  return {
    messageId: 'm1',
    threadId: 't1',
    subject: 'Invoice #42',
    sender: 'billing@example.com',
    recipients: ['me@example.com'],
    timestamp: 1_700_000_000_000,
    labels: ['INBOX'],
    snippet: bodyText.slice(0, 20),
    bodyText,
    hasAttachments: false,
    contentHash: 'hash-1',
  };
}

const retry = new RetryPolicy({
  maxAttempts: 3,
  baseDelayMs: 1,
  maxDelayMs: 1,
  timeoutMs: 1000,
  sleep: async () => {},
});

const LONG_BODY = 'Alpha beta gamma. Delta epsilon zeta. Eta theta iota. Kappa lambda mu.';

describe('ChunkEmbedPipeline', () => {
  it('turns a short body into one chunk carrying the record metadata', async () => {
    const embedder = new HashingEmbedder();
    const pipeline = new ChunkEmbedPipeline(embedder, retry, { size: 200, overlap: 20, batchSize: 8 });
    const r = record('Payment due March 1');
    const chunks = await pipeline.process(r);
    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toEqual({
      chunkId: 'm1_0',
      messageId: 'm1',
      chunkIndex: 0,
      text: 'Payment due March 1',
      embedding: hashEmbedding(embeddingInput(r, 'Payment due March 1')),
      contentHash: 'hash-1',
      metadata: {
        subject: 'Invoice #42',
        sender: 'billing@example.com',
        timestamp: 1_700_000_000_000,
        labels: ['INBOX'],
        threadId: 't1',
      },
    });
    expect(embedder.calls[0].inputType).toBe('document');
  });

  it('prefixes subject and sender to the embedded text', () => {
    expect(embeddingInput({ subject: 'Hi', sender: 'a@example.com' }, 'body')).toBe(
      'Subject: Hi\nFrom: a@example.com\n\nbody'
    );
  });

  it('embeds in batches of the configured size', async () => {
    const embedder = new HashingEmbedder();
    const pipeline = new ChunkEmbedPipeline(embedder, retry, { size: 40, overlap: 20, batchSize: 2 });
    const chunks = await pipeline.process(record(LONG_BODY));
    expect(chunks.map((c) => c.chunkId)).toEqual(['m1_0', 'm1_1', 'm1_2']);
    expect(embedder.calls.map((c) => c.texts.length)).toEqual([2, 1]);
  });

  it('caps the batch size at the provider limit', async () => {
    const embedder = new HashingEmbedder(1);
    const pipeline = new ChunkEmbedPipeline(embedder, retry, { size: 40, overlap: 20, batchSize: 32 });
    await pipeline.process(record(LONG_BODY));
    expect(embedder.calls.map((c) => c.texts.length)).toEqual([1, 1, 1]);
  });

  it('throws EmbeddingFailedError once retries are exhausted', async () => {
    const embedder = new HashingEmbedder();
    embedder.failWhen = () => true;
    const pipeline = new ChunkEmbedPipeline(embedder, retry, { size: 200, overlap: 20, batchSize: 8 });
    const err = await pipeline.process(record('Payment due March 1')).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EmbeddingFailedError);
    expect(err instanceof EmbeddingFailedError && err.messageId).toBe('m1');
    expect(err instanceof EmbeddingFailedError && err.cause).toBeInstanceOf(TransientProviderError);
    expect(embedder.calls).toHaveLength(3);
  });
});
