/**
 * Checkpoint store in the same Postgres database as the pgvector index.
 */

import type { Pool } from 'pg';
import { SyncAlreadyRunningError } from '../errors';
import {
  assertNoRegression,
  type CheckpointPosition,
  type CheckpointStore,
  type MailboxCheckpoint,
} from './checkpointStore';

type PgCheckpointRow = {
  mailbox_id: string;
  last_history_id: string | null;
  last_synced_message_ids: string[];
  backfill_page_token: string | null;
  updated_at: string;
};

export class PostgresCheckpointStore implements CheckpointStore {
  constructor(
    private readonly pool: Pool,
    private readonly ready: () => Promise<void>,
    private readonly now: () => number = Date.now
  ) {}

  async load(mailboxId: string): Promise<MailboxCheckpoint | null> {
    await this.ready();
    const res = await this.pool.query<PgCheckpointRow>(
      `SELECT mailbox_id, last_history_id, last_synced_message_ids, backfill_page_token, updated_at::text AS updated_at
       FROM sync_checkpoints WHERE mailbox_id = $1`,
      [mailboxId]
    );
    const row = res.rows[0];
    if (!row || row.last_history_id == null) return null;
    return {
      mailboxId: row.mailbox_id,
      lastHistoryId: row.last_history_id,
      lastSyncedMessageIds: row.last_synced_message_ids ?? [],
      backfillPageToken: row.backfill_page_token,
      updatedAt: parseInt(row.updated_at, 10) || 0,
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
    await this.renewLock(mailboxId, owner);
    await write();
    const checkpoint: MailboxCheckpoint = {
      mailboxId,
      lastHistoryId: next.lastHistoryId,
      lastSyncedMessageIds: [...batchIds],
      backfillPageToken: next.backfillPageToken,
      updatedAt: this.now(),
    };
    const res = await this.pool.query(
      `UPDATE sync_checkpoints SET
         last_history_id = $1, last_synced_message_ids = $2, backfill_page_token = $3, updated_at = $4, locked_at = $4
       WHERE mailbox_id = $5 AND lock_owner = $6`,
      [
        checkpoint.lastHistoryId,
        checkpoint.lastSyncedMessageIds,
        checkpoint.backfillPageToken,
        checkpoint.updatedAt,
        mailboxId,
        owner,
      ]
    );
    if ((res.rowCount ?? 0) === 0) throw new SyncAlreadyRunningError(mailboxId);
    return checkpoint;
  }

  private async renewLock(mailboxId: string, owner: string): Promise<void> {
    const res = await this.pool.query(
      'UPDATE sync_checkpoints SET locked_at = $1 WHERE mailbox_id = $2 AND lock_owner = $3',
      [this.now(), mailboxId, owner]
    );
    if ((res.rowCount ?? 0) === 0) throw new SyncAlreadyRunningError(mailboxId);
  }

  async acquireLock(mailboxId: string, owner: string, ttlMs: number): Promise<boolean> {
    await this.ready();
    const now = this.now();
    const res = await this.pool.query(
      `INSERT INTO sync_checkpoints (mailbox_id, updated_at, lock_owner, locked_at)
       VALUES ($1, $2, $3, $2)
       ON CONFLICT (mailbox_id) DO UPDATE SET
         lock_owner = EXCLUDED.lock_owner,
         locked_at = EXCLUDED.locked_at
       WHERE sync_checkpoints.lock_owner IS NULL
          OR sync_checkpoints.lock_owner = EXCLUDED.lock_owner
          OR sync_checkpoints.locked_at <= $4`,
      [mailboxId, now, owner, now - ttlMs]
    );
    return (res.rowCount ?? 0) > 0;
  }

  async releaseLock(mailboxId: string, owner: string): Promise<void> {
    await this.ready();
    await this.pool.query(
      'UPDATE sync_checkpoints SET lock_owner = NULL, locked_at = NULL WHERE mailbox_id = $1 AND lock_owner = $2',
      [mailboxId, owner]
    );
  }

  async reset(mailboxId: string, lockTtlMs: number): Promise<void> {
    await this.ready();
    const removed = await this.pool.query(
      `DELETE FROM sync_checkpoints
       WHERE mailbox_id = $1 AND (lock_owner IS NULL OR locked_at <= $2)`,
      [mailboxId, this.now() - lockTtlMs]
    );
    if ((removed.rowCount ?? 0) > 0) return;
    const locked = await this.pool.query('SELECT 1 FROM sync_checkpoints WHERE mailbox_id = $1', [mailboxId]);
    if ((locked.rowCount ?? 0) > 0) throw new SyncAlreadyRunningError(mailboxId);
  }
}
