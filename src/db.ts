import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export type SqliteDatabase = Database.Database;

/**
 * Open (creating if needed) the local index database and bring its schema up to date.
 * `:memory:` is accepted for tests.
 */
export function openDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  db.exec(`
    CREATE TABLE IF NOT EXISTS kv (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);
  runMigrations(db);
  return db;
}

/** Sync checkpoints (migration v1). The row doubles as the per-mailbox run lock. */
function createCheckpointTables(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS sync_checkpoints (
      mailbox_id TEXT PRIMARY KEY,
      last_history_id TEXT,
      last_synced_message_ids TEXT NOT NULL DEFAULT '[]',
      backfill_page_token TEXT,
      updated_at INTEGER NOT NULL,
      lock_owner TEXT,
      locked_at INTEGER
    );
  `);
}

/** Vector index tables (migration v2). Label and date filters are served by indexes. */
function createChunkTables(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS chunks (
      chunk_id TEXT PRIMARY KEY,
      message_id TEXT NOT NULL,
      chunk_index INTEGER NOT NULL,
      thread_id TEXT NOT NULL,
      subject TEXT NOT NULL DEFAULT '',
      sender TEXT NOT NULL DEFAULT '',
      internal_date INTEGER NOT NULL,
      label_ids TEXT NOT NULL DEFAULT '[]',
      text TEXT NOT NULL,
      content_hash TEXT NOT NULL,
      embedding BLOB NOT NULL,
      updated_at INTEGER NOT NULL
    );
    CREATE TABLE IF NOT EXISTS chunk_labels (
      label TEXT NOT NULL,
      chunk_id TEXT NOT NULL,
      PRIMARY KEY (label, chunk_id)
    );
    CREATE INDEX IF NOT EXISTS idx_chunks_message ON chunks(message_id);
    CREATE INDEX IF NOT EXISTS idx_chunks_internal_date ON chunks(internal_date);
    CREATE INDEX IF NOT EXISTS idx_chunks_thread ON chunks(thread_id);
    CREATE INDEX IF NOT EXISTS idx_chunk_labels_chunk ON chunk_labels(chunk_id);
  `);
}

const SCHEMA_VERSION_KEY = 'schema_version';

export function getSchemaVersion(db: SqliteDatabase): number {
  const row = db.prepare('SELECT value FROM kv WHERE key = ?').get(SCHEMA_VERSION_KEY) as { value: string } | undefined;
  if (!row) return 0;
  const n = parseInt(row.value, 10);
  return Number.isFinite(n) ? n : 0;
}

function setSchemaVersion(db: SqliteDatabase, version: number): void {
  db.prepare('INSERT OR REPLACE INTO kv (key, value) VALUES (?, ?)').run(SCHEMA_VERSION_KEY, String(version));
}

/** Versioned migrations. Add new migrations when schema changes. */
function runMigrations(db: SqliteDatabase): void {
  let v = getSchemaVersion(db);
  if (v < 1) {
    createCheckpointTables(db);
    setSchemaVersion(db, 1);
    v = 1;
  }
  if (v < 2) {
    createChunkTables(db);
    setSchemaVersion(db, 2);
  }
}
