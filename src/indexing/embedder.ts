/**
 * Text embeddings for semantic search.
 * Voyage AI over HTTP; callers batch and retry through the pipeline's RetryPolicy.
 */

import { requireSetting, type AppConfig } from '../config';

const VOYAGE_EMBED_URL = 'https://api.voyageai.com/v1/embeddings';
const MAX_INPUT_CHARS = 32000;
/** Voyage accepts up to 128 inputs per request. */
const VOYAGE_MAX_BATCH = 128;

export type EmbedInputType = 'document' | 'query';

export interface EmbedOptions {
  inputType: EmbedInputType;
  signal?: AbortSignal;
}

export interface EmbeddingProvider {
  readonly model: string;
  readonly dimension: number;
  /** Upper bound on texts per `embed` call. */
  readonly maxBatchSize: number;
  embed(texts: string[], options: EmbedOptions): Promise<number[][]>;
}

/** Non-2xx response from the embedding API; `status` drives retry classification. */
export class EmbeddingHttpError extends Error {
  constructor(
    readonly status: number,
    body: string
  ) {
    super(`Voyage embed failed: ${status} ${body.slice(0, 500)}`);
    this.name = 'EmbeddingHttpError';
  }
}

export interface VoyageEmbedderOptions {
  apiKey: string;
  model: string;
  dimension: number;
  maxBatchSize?: number;
  fetchImpl?: typeof fetch;
}

export class VoyageEmbedder implements EmbeddingProvider {
  readonly model: string;
  readonly dimension: number;
  readonly maxBatchSize: number;
  private readonly apiKey: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: VoyageEmbedderOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.dimension = options.dimension;
    this.maxBatchSize = Math.min(options.maxBatchSize ?? VOYAGE_MAX_BATCH, VOYAGE_MAX_BATCH);
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async embed(texts: string[], options: EmbedOptions): Promise<number[][]> {
    if (texts.length === 0) return [];
    if (texts.length > this.maxBatchSize) {
      throw new RangeError(`embed called with ${texts.length} texts; limit is ${this.maxBatchSize}`);
    }
    const res = await this.fetchImpl(VOYAGE_EMBED_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        input: texts.map((t) => t.slice(0, MAX_INPUT_CHARS)),
        model: this.model,
        input_type: options.inputType,
      }),
      signal: options.signal,
    });
    if (!res.ok) {
      throw new EmbeddingHttpError(res.status, await res.text());
    }
    const data = (await res.json()) as { data?: { embedding?: unknown; index?: number }[] };
    const rows = [...(data.data ?? [])].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    if (rows.length !== texts.length) {
      throw new Error(`Voyage returned ${rows.length} embeddings for ${texts.length} inputs`);
    }
    return rows.map((row) => {
      const embedding = row.embedding;
      if (
        !Array.isArray(embedding) ||
        embedding.length !== this.dimension ||
        !embedding.every((x): x is number => typeof x === 'number')
      ) {
        throw new Error(`Voyage returned invalid embedding (length ${Array.isArray(embedding) ? embedding.length : 0})`);
      }
      return embedding;
    });
  }
}

export function createEmbedder(config: AppConfig['embedding']): EmbeddingProvider {
  return new VoyageEmbedder({
    apiKey: requireSetting(config.apiKey, 'VOYAGE_API_KEY'),
    model: config.model,
    dimension: config.dimension,
    maxBatchSize: config.batchSize,
  });
}
