/**
 * Error taxonomy shared by the sync, indexing and retrieval paths.
 * Every class sets a stable `name` so callers can branch without instanceof across bundles.
 */

/** A raw provider message lacks a required field (id, timestamp) or cannot be parsed. */
export class MalformedMessageError extends Error {
  constructor(
    readonly messageId: string | null,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Malformed message ${messageId ?? '<no id>'}: ${reason}`, options);
    this.name = 'MalformedMessageError';
  }
}

/** Rate limit, 5xx, timeout or network failure that outlived the retry policy. */
export class TransientProviderError extends Error {
  constructor(
    readonly operation: string,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(`${operation} failed after ${attempts} attempt(s)`, options);
    this.name = 'TransientProviderError';
  }
}

/** Thrown when the mailbox history position is too old; caller should run a full backfill. */
export class HistoryIdExpiredError extends Error {
  constructor(readonly startHistoryId: string) {
    super(`History id ${startHistoryId} expired`);
    this.name = 'HistoryIdExpiredError';
  }
}

export class EmbeddingFailedError extends Error {
  constructor(
    readonly messageId: string,
    options?: { cause?: unknown }
  ) {
    super(`Embedding failed for message ${messageId}`, options);
    this.name = 'EmbeddingFailedError';
  }
}

export class RepositoryUnavailableError extends Error {
  constructor(
    readonly backend: string,
    options?: { cause?: unknown }
  ) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Vector repository (${backend}) unavailable${detail}`, options);
    this.name = 'RepositoryUnavailableError';
  }
}

export class SyncAlreadyRunningError extends Error {
  constructor(readonly mailboxId: string) {
    super(`A sync is already running for mailbox ${mailboxId}`);
    this.name = 'SyncAlreadyRunningError';
  }
}

export class CheckpointRegressionError extends Error {
  constructor(
    readonly mailboxId: string,
    readonly current: string,
    readonly attempted: string
  ) {
    super(`Checkpoint for ${mailboxId} cannot move back from ${current} to ${attempted}`);
    this.name = 'CheckpointRegressionError';
  }
}

export type RetrievalStage = 'retrieval' | 'generation';

export class RetrievalFailedError extends Error {
  constructor(
    readonly stage: RetrievalStage,
    options?: { cause?: unknown }
  ) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Answer could not be produced (${stage} failed)${detail}`, options);
    this.name = 'RetrievalFailedError';
  }
}

export class SessionBusyError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} is still answering a previous question`);
    this.name = 'SessionBusyError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';
  }
}
