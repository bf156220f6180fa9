/**
 * Mailbox sync: backfill via the message list, then deltas via the history feed.
 * Each page is normalized, embedded and upserted before its checkpoint is committed.
 */

import { randomUUID } from 'crypto';
import {
  EmbeddingFailedError,
  HistoryIdExpiredError,
  MalformedMessageError,
  SyncAlreadyRunningError,
} from '../errors';
import type { ChunkEmbedPipeline } from '../indexing/pipeline';
import { recordIndexFailure, recordIndexSuccess, recordSyncEnd, recordSyncStart } from '../indexing/metrics';
import type { Chunk } from '../indexing/types';
import type { RetryPolicy } from '../lib/retryPolicy';
import { normalizeMessage } from '../mail/normalizer';
import type { EmailRecord, MailboxProvider, MessageChange } from '../mail/types';
import type { VectorRepository } from '../store/vectorRepository';
import type { CheckpointPosition, CheckpointStore, MailboxCheckpoint } from './checkpointStore';

export type SyncMode = 'backfill' | 'delta';

export interface SyncFailure {
  messageId: string;
  reason: string;
}

export interface SyncReport {
  mailboxId: string;
  mode: SyncMode;
  /** Messages fetched and normalized (unchanged ones included). */
  fetched: number;
  skippedUnchanged: number;
  failed: number;
  /** Messages whose chunks were removed. */
  deleted: number;
  /** Pages committed. */
  pages: number;
  cancelled: boolean;
  /** An embedding failure held the checkpoint; the next run re-fetches that page. */
  stoppedEarly: boolean;
  failures: SyncFailure[];
  checkpoint: MailboxCheckpoint | null;
}

export interface SyncOptions {
  /** Provider search query; backfill only. */
  queryFilter?: string;
  /** Caps a backfill. A capped backfill counts as finished and later runs go to delta. */
  maxMessages?: number;
  /** Checked between pages. */
  signal?: AbortSignal;
}

export interface SyncEngineDeps {
  provider: MailboxProvider;
  checkpoints: CheckpointStore;
  repository: VectorRepository;
  pipeline: ChunkEmbedPipeline;
  retry: RetryPolicy;
}

export interface SyncEngineOptions {
  pageSize: number;
  maxMessages: number;
  lockTtlMs: number;
}

interface PageOutcome {
  chunks: Chunk[];
  deleteIds: string[];
  /** Ids of every record that reached the pipeline or the delete list. */
  batchIds: string[];
  stopped: boolean;
}

function reasonOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export class MailboxSyncEngine {
  private readonly running = new Set<string>();

  constructor(
    private readonly deps: SyncEngineDeps,
    private readonly options: SyncEngineOptions
  ) {}

  isRunning(mailboxId: string): boolean {
    return this.running.has(mailboxId);
  }

  async sync(mailboxId: string, options: SyncOptions = {}): Promise<SyncReport> {
    if (this.running.has(mailboxId)) throw new SyncAlreadyRunningError(mailboxId);
    this.running.add(mailboxId);
    try {
      const owner = randomUUID();
      const locked = await this.deps.checkpoints.acquireLock(mailboxId, owner, this.options.lockTtlMs);
      if (!locked) throw new SyncAlreadyRunningError(mailboxId);
      try {
        return await this.run(mailboxId, owner, options);
      } finally {
        await this.deps.checkpoints.releaseLock(mailboxId, owner);
      }
    } finally {
      this.running.delete(mailboxId);
    }
  }

  private async run(mailboxId: string, owner: string, options: SyncOptions): Promise<SyncReport> {
    recordSyncStart();
    const checkpoint = await this.deps.checkpoints.load(mailboxId);
    const report: SyncReport = {
      mailboxId,
      mode: !checkpoint || checkpoint.backfillPageToken ? 'backfill' : 'delta',
      fetched: 0,
      skippedUnchanged: 0,
      failed: 0,
      deleted: 0,
      pages: 0,
      cancelled: false,
      stoppedEarly: false,
      failures: [],
      checkpoint,
    };
    try {
      if (report.mode === 'backfill') {
        await this.backfill(mailboxId, owner, checkpoint, report, options);
      } else if (checkpoint) {
        try {
          await this.delta(mailboxId, owner, checkpoint, report, options);
        } catch (e) {
          if (!(e instanceof HistoryIdExpiredError)) throw e;
          console.warn('[syncEngine] history expired for', mailboxId, '- running a fresh backfill');
          report.mode = 'backfill';
          await this.backfill(mailboxId, owner, null, report, options);
        }
      }
    } catch (e) {
      console.error('[syncEngine] sync aborted for', mailboxId, e);
      throw e;
    } finally {
      recordIndexFailure(report.failed);
      recordSyncEnd();
    }
    console.info(
      `[syncEngine] ${mailboxId} ${report.mode}: fetched=${report.fetched} unchanged=${report.skippedUnchanged} ` +
        `failed=${report.failed} deleted=${report.deleted} pages=${report.pages}` +
        (report.cancelled ? ' (cancelled)' : '') +
        (report.stoppedEarly ? ' (stopped early)' : '')
    );
    return report;
  }

  private async backfill(
    mailboxId: string,
    owner: string,
    checkpoint: MailboxCheckpoint | null,
    report: SyncReport,
    options: SyncOptions
  ): Promise<void> {
    const { provider, retry } = this.deps;
    const resuming = checkpoint?.backfillPageToken ? checkpoint : null;
    const startPosition = resuming
      ? resuming.lastHistoryId
      : await retry.run('getCurrentPosition', (signal) => provider.getCurrentPosition(signal));
    let pageToken = resuming?.backfillPageToken ?? undefined;
    let remaining = options.maxMessages ?? this.options.maxMessages;

    while (remaining > 0) {
      if (options.signal?.aborted) {
        report.cancelled = true;
        return;
      }
      const token = pageToken;
      const page = await retry.run('listMessages', (signal) =>
        provider.listMessages({
          query: options.queryFilter,
          pageSize: Math.min(this.options.pageSize, remaining),
          pageToken: token,
          signal,
        })
      );
      const changes: MessageChange[] = page.messageIds.map((messageId) => ({ messageId, kind: 'added' }));
      remaining -= page.messageIds.length;
      // a backfill cut short by the message limit is finished; later runs go to delta
      const next: CheckpointPosition = {
        lastHistoryId: startPosition,
        backfillPageToken: remaining > 0 ? page.nextPageToken ?? null : null,
      };
      if (!(await this.applyPage(mailboxId, owner, changes, next, report))) return;
      if (!next.backfillPageToken) return;
      pageToken = page.nextPageToken;
    }
  }

  private async delta(
    mailboxId: string,
    owner: string,
    checkpoint: MailboxCheckpoint,
    report: SyncReport,
    options: SyncOptions
  ): Promise<void> {
    const { provider, retry } = this.deps;
    const startPosition = checkpoint.lastHistoryId;
    let pageToken: string | undefined;
    for (;;) {
      if (options.signal?.aborted) {
        report.cancelled = true;
        return;
      }
      const token = pageToken;
      const page = await retry.run('listChanges', (signal) =>
        provider.listChanges({ startPosition, pageSize: this.options.pageSize, pageToken: token, signal })
      );
      const next: CheckpointPosition = { lastHistoryId: page.pagePosition, backfillPageToken: null };
      if (!(await this.applyPage(mailboxId, owner, page.changes, next, report))) return;
      if (!page.nextPageToken) return;
      pageToken = page.nextPageToken;
    }
  }

  /** Process and persist one page. Returns false when the run must stop. */
  private async applyPage(
    mailboxId: string,
    owner: string,
    changes: MessageChange[],
    next: CheckpointPosition,
    report: SyncReport
  ): Promise<boolean> {
    const current = report.checkpoint;
    if (
      changes.length === 0 &&
      current &&
      current.lastHistoryId === next.lastHistoryId &&
      current.backfillPageToken === next.backfillPageToken
    ) {
      return true;
    }
    const outcome = await this.processPage(changes, report);
    const write = async (): Promise<void> => {
      const { repository } = this.deps;
      if (outcome.chunks.length > 0) {
        await repository.upsert(outcome.chunks);
        recordIndexSuccess(outcome.chunks.length);
      }
      for (const id of outcome.deleteIds) {
        if ((await repository.deleteByMessageId(id)) > 0) report.deleted++;
      }
    };
    if (outcome.stopped) {
      await write();
      report.stoppedEarly = true;
      return false;
    }
    report.checkpoint = await this.deps.checkpoints.commit(mailboxId, owner, next, outcome.batchIds, write);
    report.pages++;
    return true;
  }

  private async processPage(changes: MessageChange[], report: SyncReport): Promise<PageOutcome> {
    const { provider, retry, repository, pipeline } = this.deps;
    const outcome: PageOutcome = { chunks: [], deleteIds: [], batchIds: [], stopped: false };
    const records: EmailRecord[] = [];
    // one action per message: the last change wins, and added/labels both mean a full fetch
    const latest = new Map<string, MessageChange['kind']>();
    for (const { messageId, kind } of changes) {
      latest.delete(messageId);
      latest.set(messageId, kind);
    }

    for (const [messageId, kind] of latest) {
      if (kind === 'deleted') {
        outcome.deleteIds.push(messageId);
        outcome.batchIds.push(messageId);
        continue;
      }
      const raw = await retry.run('getMessage', (signal) => provider.getMessage(messageId, signal));
      if (raw === null) {
        outcome.deleteIds.push(messageId);
        outcome.batchIds.push(messageId);
        continue;
      }
      try {
        records.push(await normalizeMessage(raw));
        report.fetched++;
      } catch (e) {
        if (!(e instanceof MalformedMessageError)) throw e;
        report.failed++;
        report.failures.push({ messageId, reason: reasonOf(e) });
        console.warn('[syncEngine] skipping malformed message', messageId, reasonOf(e));
      }
    }

    const stored = await repository.getContentHashes(records.map((r) => r.messageId));
    for (const record of records) {
      outcome.batchIds.push(record.messageId);
      if (stored.get(record.messageId) === record.contentHash) {
        report.skippedUnchanged++;
        continue;
      }
      try {
        outcome.chunks.push(...(await pipeline.process(record)));
      } catch (e) {
        if (!(e instanceof EmbeddingFailedError)) throw e;
        report.failed++;
        report.failures.push({ messageId: record.messageId, reason: reasonOf(e.cause ?? e) });
        console.warn('[syncEngine] embedding failed for', record.messageId, reasonOf(e.cause ?? e));
        outcome.stopped = true;
      }
    }
    return outcome;
  }
}
