/**
 * Durable per-mailbox sync position. The checkpoint row doubles as the run lock.
 */

import type { SqliteDatabase } from '../db';
import { CheckpointRegressionError, SyncAlreadyRunningError } from '../errors';
import { compareHistoryIds } from '../mail/historyIds';
import { safeParseStringArray } from '../safeJson';

export interface MailboxCheckpoint {
  mailboxId: string;
  /** Mailbox history position covered so far. Never moves backwards. */
  lastHistoryId: string;
  /** Ids of the last committed batch. */
  lastSyncedMessageIds: string[];
  /** Non-null while a backfill has pages left. */
  backfillPageToken: string | null;
  updatedAt: number;
}

export interface CheckpointPosition {
  lastHistoryId: string;
  backfillPageToken: string | null;
}

export interface CheckpointStore {
  load(mailboxId: string): Promise<MailboxCheckpoint | null>;
  /**
   * Run `write` (the durable upsert for the batch) and only then advance the checkpoint.
   * A rejected `write` leaves the checkpoint untouched.
   * `owner` must hold the mailbox lock; each commit renews it. A lost lock throws
   * SyncAlreadyRunningError and the checkpoint does not move.
   */
  commit(
    mailboxId: string,
    owner: string,
    next: CheckpointPosition,
    batchIds: string[],
    write: () => Promise<void>
  ): Promise<MailboxCheckpoint>;
  /** False when another owner holds an unexpired lock. */
  acquireLock(mailboxId: string, owner: string, ttlMs: number): Promise<boolean>;
  releaseLock(mailboxId: string, owner: string): Promise<void>;
  /** Forget the checkpoint. Throws SyncAlreadyRunningError while an unexpired lock is held. */
  reset(mailboxId: string, lockTtlMs: number): Promise<void>;
}

export function assertNoRegression(
  mailboxId: string,
  current: MailboxCheckpoint | null,
  next: CheckpointPosition
): void {
  if (current && compareHistoryIds(next.lastHistoryId, current.lastHistoryId) < 0) {
    throw new CheckpointRegressionError(mailboxId, current.lastHistoryId, next.lastHistoryId);
  }
}

interface CheckpointRow {
  mailbox_id: string;
  last_history_id: string | null;
  last_synced_message_ids: string;
  backfill_page_token: string | null;
  updated_at: number;
}

export class SqliteCheckpointStore implements CheckpointStore {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly now: () => number = Date.now
  ) {}

  async load(mailboxId: string): Promise<MailboxCheckpoint | null> {
    const row = this.db
      .prepare(
        `SELECT mailbox_id, last_history_id, last_synced_message_ids, backfill_page_token, updated_at
         FROM sync_checkpoints WHERE mailbox_id = ?`
      )
      .get(mailboxId) as CheckpointRow | undefined;
    if (!row || row.last_history_id == null) return null;
    return {
      mailboxId: row.mailbox_id,
      lastHistoryId: row.last_history_id,
      lastSyncedMessageIds: safeParseStringArray(row.last_synced_message_ids),
      backfillPageToken: row.backfill_page_token,
      updatedAt: row.updated_at,
    };
  }

  async commit(
    mailboxId: string,
    owner: string,
    next: CheckpointPosition,
    batchIds: string[],
    write: () => Promise<void>
  ): Promise<MailboxCheckpoint> {
    assertNoRegression(mailboxId, await this.load(mailboxId), next);
    this.renewLock(mailboxId, owner);
    await write();
    const checkpoint: MailboxCheckpoint = {
      mailboxId,
      lastHistoryId: next.lastHistoryId,
      lastSyncedMessageIds: [...batchIds],
      backfillPageToken: next.backfillPageToken,
      updatedAt: this.now(),
    };
    const result = this.db
      .prepare(
        `UPDATE sync_checkpoints SET
           last_history_id = ?, last_synced_message_ids = ?, backfill_page_token = ?, updated_at = ?, locked_at = ?
         WHERE mailbox_id = ? AND lock_owner = ?`
      )
      .run(
        checkpoint.lastHistoryId,
        JSON.stringify(checkpoint.lastSyncedMessageIds),
        checkpoint.backfillPageToken,
        checkpoint.updatedAt,
        checkpoint.updatedAt,
        mailboxId,
        owner
      );
    if (result.changes === 0) throw new SyncAlreadyRunningError(mailboxId);
    return checkpoint;
  }

  private renewLock(mailboxId: string, owner: string): void {
    const result = this.db
      .prepare('UPDATE sync_checkpoints SET locked_at = ? WHERE mailbox_id = ? AND lock_owner = ?')
      .run(this.now(), mailboxId, owner);
    if (result.changes === 0) throw new SyncAlreadyRunningError(mailboxId);
  }

  async acquireLock(mailboxId: string, owner: string, ttlMs: number): Promise<boolean> {
    const now = this.now();
    const result = this.db
      .prepare(
        `INSERT INTO sync_checkpoints (mailbox_id, updated_at, lock_owner, locked_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(mailbox_id) DO UPDATE SET
           lock_owner = excluded.lock_owner,
           locked_at = excluded.locked_at
         WHERE sync_checkpoints.lock_owner IS NULL
            OR sync_checkpoints.lock_owner = excluded.lock_owner
            OR sync_checkpoints.locked_at <= ?`
      )
      .run(mailboxId, now, owner, now, now - ttlMs);
    return result.changes > 0;
  }

  async releaseLock(mailboxId: string, owner: string): Promise<void> {
    this.db
      .prepare('UPDATE sync_checkpoints SET lock_owner = NULL, locked_at = NULL WHERE mailbox_id = ? AND lock_owner = ?')
      .run(mailboxId, owner);
  }

  async reset(mailboxId: string, lockTtlMs: number): Promise<void> {
    const removed = this.db
      .prepare(
        `DELETE FROM sync_checkpoints
         WHERE mailbox_id = ? AND (lock_owner IS NULL OR locked_at <= ?)`
      )
      .run(mailboxId, this.now() - lockTtlMs);
    if (removed.changes > 0) return;
    const locked = this.db.prepare('SELECT 1 FROM sync_checkpoints WHERE mailbox_id = ?').get(mailboxId);
    if (locked !== undefined) throw new SyncAlreadyRunningError(mailboxId);
  }
}
