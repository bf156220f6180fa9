/**
 * mailchat: conversational search over your own mailbox.
 *
 * `createMailChat` wires the sync engine, the chunk/embed pipeline, the vector repository
 * and the retrieval chain from an {@link AppConfig}. Provider clients are built on first use,
 * so `health()` and `resetMailbox()` work without API keys.
 */

import { RetrievalChain, type ChatAnswer } from './chat/retrievalChain';
import { createLanguageModel, type LanguageModel } from './chat/claude';
import type { AppConfig } from './config';
import { SyncAlreadyRunningError } from './errors';
import { createEmbedder, type EmbeddingProvider } from './indexing/embedder';
import { getMetrics, type IndexingMetrics } from './indexing/metrics';
import { ChunkEmbedPipeline } from './indexing/pipeline';
import type { MetadataFilter } from './indexing/types';
import { RetryPolicy } from './lib/retryPolicy';
import { createGmailApi, createGmailAuth, GmailMailboxProvider } from './mail/gmail';
import type { MailboxProvider } from './mail/types';
import { SearchService } from './search/searchService';
import { createStores, type Stores } from './store/factory';
import type { RepositoryHealth } from './store/vectorRepository';
import { MailboxSyncEngine, type SyncReport } from './sync/syncEngine';

export { loadConfig, type AppConfig } from './config';
export * from './errors';
export type { ChatAnswer, SessionState } from './chat/retrievalChain';
export type { Citation } from './chat/prompt';
export type { LanguageModel, CompletionRequest } from './chat/claude';
export type { EmbeddingProvider } from './indexing/embedder';
export type { IndexingMetrics } from './indexing/metrics';
export type { MetadataFilter } from './indexing/types';
export type { MailboxProvider } from './mail/types';
export type { RepositoryHealth, VectorRepository } from './store/vectorRepository';
export type { SyncReport } from './sync/syncEngine';

/** Replacements for the network-backed components (tests, alternative providers). */
export interface MailChatOverrides {
  provider?: MailboxProvider;
  embedder?: EmbeddingProvider;
  model?: LanguageModel;
  stores?: Stores;
}

export interface MailChatHealth {
  repository: RepositoryHealth;
  metrics: IndexingMetrics;
}

export interface MailChat {
  ask(sessionId: string, question: string, filters?: MetadataFilter): Promise<ChatAnswer>;
  triggerSync(mailboxId: string, queryFilter?: string, limit?: number, signal?: AbortSignal): Promise<SyncReport>;
  /** Forget the checkpoint so the next sync backfills; `purge` also empties the index. */
  resetMailbox(mailboxId: string, options?: { purge?: boolean }): Promise<void>;
  endSession(sessionId: string): boolean;
  health(): Promise<MailChatHealth>;
  close(): Promise<void>;
}

interface Lazy<T> {
  (): T;
  /** The value if it was already built. */
  peek(): T | undefined;
}

function lazy<T>(build: () => T): Lazy<T> {
  let value: T | undefined;
  const get = (): T => {
    if (value === undefined) value = build();
    return value;
  };
  return Object.assign(get, { peek: () => value });
}

export function createMailChat(config: AppConfig, overrides: MailChatOverrides = {}): MailChat {
  const retry = new RetryPolicy(config.retry);
  const { repository, checkpoints } = overrides.stores ?? createStores(config.store, config.embedding.dimension);

  const embedder = lazy(() => overrides.embedder ?? createEmbedder(config.embedding));
  const provider = lazy(
    () =>
      overrides.provider ??
      new GmailMailboxProvider(createGmailApi(createGmailAuth(config.gmail)), config.gmail.userId)
  );
  const engine = lazy(
    () =>
      new MailboxSyncEngine(
        {
          provider: provider(),
          checkpoints,
          repository,
          pipeline: new ChunkEmbedPipeline(embedder(), retry, { ...config.chunking, batchSize: config.embedding.batchSize }),
          retry,
        },
        config.sync
      )
  );
  const chain = lazy(
    () =>
      new RetrievalChain(
        new SearchService(embedder(), repository, retry),
        overrides.model ?? createLanguageModel(config.llm),
        retry,
        config.retrieval
      )
  );

  return {
    async ask(sessionId, question, filters) {
      return chain().ask(sessionId, question, filters);
    },

    async triggerSync(mailboxId, queryFilter, limit, signal) {
      return engine().sync(mailboxId, { queryFilter, maxMessages: limit, signal });
    },

    async resetMailbox(mailboxId, options = {}) {
      if (engine.peek()?.isRunning(mailboxId)) throw new SyncAlreadyRunningError(mailboxId);
      await checkpoints.reset(mailboxId, config.sync.lockTtlMs);
      if (options.purge) await repository.clear();
      console.info('[mailchat] reset', mailboxId, options.purge ? '(index purged)' : '');
    },

    endSession: (sessionId) => chain.peek()?.endSession(sessionId) ?? false,

    async health() {
      return { repository: await repository.healthCheck(), metrics: getMetrics() };
    },

    close: () => repository.close(),
  };
}
