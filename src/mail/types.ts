/**
 * Canonical email record and the mailbox provider contract consumed by the sync engine.
 */

import type { gmail_v1 } from 'googleapis';

/** Provider message as fetched with `format: 'raw'`. */
export type RawMessage = gmail_v1.Schema$Message;

export interface EmailRecord {
  messageId: string;
  threadId: string;
  subject: string;
  sender: string;
  recipients: string[];
  /** Epoch milliseconds. */
  timestamp: number;
  /** Sorted, de-duplicated. */
  labels: string[];
  snippet: string;
  bodyText: string;
  hasAttachments: boolean;
  /** SHA-256 over the content fields; equal hashes mean nothing to re-embed. */
  contentHash: string;
}

export interface MessagePage {
  messageIds: string[];
  nextPageToken?: string;
}

export type MessageChangeKind = 'added' | 'deleted' | 'labels';

export interface MessageChange {
  messageId: string;
  kind: MessageChangeKind;
}

export interface ChangePage {
  changes: MessageChange[];
  /** Highest history position covered by this page. */
  pagePosition: string;
  nextPageToken?: string;
}

export interface ListMessagesOptions {
  query?: string;
  pageSize: number;
  pageToken?: string;
  signal?: AbortSignal;
}

export interface ListChangesOptions {
  startPosition: string;
  pageSize: number;
  pageToken?: string;
  signal?: AbortSignal;
}

export interface MailboxProvider {
  /** Current mailbox history position (taken before a backfill starts). */
  getCurrentPosition(signal?: AbortSignal): Promise<string>;
  listMessages(options: ListMessagesOptions): Promise<MessagePage>;
  /** Throws HistoryIdExpiredError when `startPosition` is too old. */
  listChanges(options: ListChangesOptions): Promise<ChangePage>;
  /** Full message, or null when it no longer exists. */
  getMessage(messageId: string, signal?: AbortSignal): Promise<RawMessage | null>;
}
