/**
 * Chunk model shared by the ingestion pipeline, the vector repositories and search.
 */

export interface ChunkMetadata {
  subject: string;
  sender: string;
  /** Epoch milliseconds of the parent message. */
  timestamp: number;
  labels: string[];
  threadId: string;
}

export interface Chunk {
  /** `${messageId}_${chunkIndex}` */
  chunkId: string;
  messageId: string;
  /** 0-based position within the parent message */
  chunkIndex: number;
  text: string;
  embedding: number[];
  /** Content hash of the parent record at ingest time. */
  contentHash: string;
  metadata: ChunkMetadata;
}

export interface ScoredChunk {
  chunk: Chunk;
  /** Cosine similarity in [-1, 1]; higher is closer. */
  score: number;
}

export interface MetadataFilter {
  /** Message must carry every listed label. */
  labels?: string[];
  /** Inclusive lower bound, epoch ms. */
  after?: number;
  /** Exclusive upper bound, epoch ms. */
  before?: number;
  threadId?: string;
}

export function chunkIdFor(messageId: string, chunkIndex: number): string {
  return `${messageId}_${chunkIndex}`;
}
