/**
 * Postgres + pgvector schema for mail chunks and sync checkpoints.
 */

import type { Pool } from 'pg';

export async function ensureSchema(pool: Pool, dimension: number): Promise<void> {
  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw new RangeError(`invalid embedding dimension ${dimension}`);
  }
  await pool.query('CREATE EXTENSION IF NOT EXISTS vector');
  await pool.query(`
    CREATE TABLE IF NOT EXISTS mail_chunks (
      chunk_id TEXT PRIMARY KEY,
      message_id TEXT NOT NULL,
      chunk_index INT NOT NULL,
      thread_id TEXT NOT NULL,
      subject TEXT NOT NULL DEFAULT '',
      sender TEXT NOT NULL DEFAULT '',
      internal_date BIGINT NOT NULL,
      label_ids TEXT[] NOT NULL DEFAULT '{}',
      body_text TEXT NOT NULL,
      content_hash TEXT NOT NULL,
      embedding vector(${dimension}) NOT NULL,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
  await pool.query('CREATE INDEX IF NOT EXISTS idx_mail_chunks_message ON mail_chunks (message_id)');
  await pool.query('CREATE INDEX IF NOT EXISTS idx_mail_chunks_internal_date ON mail_chunks (internal_date)');
  await pool.query('CREATE INDEX IF NOT EXISTS idx_mail_chunks_labels ON mail_chunks USING GIN (label_ids)');
  await pool.query(
    'CREATE INDEX IF NOT EXISTS idx_mail_chunks_embedding ON mail_chunks USING hnsw (embedding vector_cosine_ops)'
  );
  await pool.query(`
    CREATE TABLE IF NOT EXISTS sync_checkpoints (
      mailbox_id TEXT PRIMARY KEY,
      last_history_id TEXT,
      last_synced_message_ids TEXT[] NOT NULL DEFAULT '{}',
      backfill_page_token TEXT,
      updated_at BIGINT NOT NULL,
      lock_owner TEXT,
      locked_at BIGINT
    )
  `);
}

/** Run `ensureSchema` at most once per pool; a failed attempt is retried on the next call. */
export function createSchemaGate(pool: Pool, dimension: number): () => Promise<void> {
  let pending: Promise<void> | null = null;
  return () => {
    if (!pending) {
      pending = ensureSchema(pool, dimension).catch((e: unknown) => {
        pending = null;
        throw e;
      });
    }
    return pending;
  };
}
