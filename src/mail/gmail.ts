/**
 * Gmail implementation of MailboxProvider.
 * Credentials come from a stored refresh token; the OAuth2 client refreshes access tokens itself.
 */

import { google, type Auth, type gmail_v1 } from 'googleapis';
import { requireSetting, type AppConfig } from '../config';
import { HistoryIdExpiredError } from '../errors';
import { statusOf } from '../lib/retryPolicy';
import { compareHistoryIds } from './historyIds';
import type {
  ChangePage,
  ListChangesOptions,
  ListMessagesOptions,
  MailboxProvider,
  MessageChange,
  MessagePage,
  RawMessage,
} from './types';

const HISTORY_TYPES = ['messageAdded', 'messageDeleted', 'labelAdded', 'labelRemoved'];
const MAX_PAGE_SIZE = 500;

/**
 * Build the auto-refreshing credential for the configured account.
 * The interactive consent flow that produced the refresh token is out of scope.
 */
export function createGmailAuth(config: AppConfig['gmail']): Auth.OAuth2Client {
  const clientId = requireSetting(config.clientId, 'GOOGLE_CLIENT_ID');
  const clientSecret = requireSetting(config.clientSecret, 'GOOGLE_CLIENT_SECRET');
  const refreshToken = requireSetting(config.refreshToken, 'GOOGLE_REFRESH_TOKEN');
  const oauth2Client = new google.auth.OAuth2(clientId, clientSecret);
  oauth2Client.setCredentials({ refresh_token: refreshToken });
  return oauth2Client;
}

/**
 * Flatten history records into per-message changes, last event per message wins.
 * A message added and deleted inside the same window ends up as a delete.
 */
export function historyToChanges(records: gmail_v1.Schema$History[]): MessageChange[] {
  const byMessage = new Map<string, MessageChange['kind']>();
  const mark = (id: string | null | undefined, kind: MessageChange['kind']): void => {
    if (!id) return;
    const previous = byMessage.get(id);
    // a label change after an add still needs the full message, which 'added' already fetches
    if (kind === 'labels' && previous === 'added') return;
    byMessage.delete(id);
    byMessage.set(id, kind);
  };
  for (const record of records) {
    for (const entry of record.messagesAdded ?? []) mark(entry.message?.id, 'added');
    for (const entry of record.labelsAdded ?? []) mark(entry.message?.id, 'labels');
    for (const entry of record.labelsRemoved ?? []) mark(entry.message?.id, 'labels');
    for (const entry of record.messagesDeleted ?? []) mark(entry.message?.id, 'deleted');
  }
  return [...byMessage].map(([messageId, kind]) => ({ messageId, kind }));
}

function maxHistoryId(records: gmail_v1.Schema$History[], fallback: string): string {
  let max = fallback;
  for (const r of records) {
    if (r.id && compareHistoryIds(String(r.id), max) > 0) max = String(r.id);
  }
  return max;
}

/** The Gmail endpoints the provider calls. */
export interface GmailApi {
  getProfile(params: gmail_v1.Params$Resource$Users$Getprofile, signal?: AbortSignal): Promise<gmail_v1.Schema$Profile>;
  listMessages(
    params: gmail_v1.Params$Resource$Users$Messages$List,
    signal?: AbortSignal
  ): Promise<gmail_v1.Schema$ListMessagesResponse>;
  listHistory(
    params: gmail_v1.Params$Resource$Users$History$List,
    signal?: AbortSignal
  ): Promise<gmail_v1.Schema$ListHistoryResponse>;
  getMessage(params: gmail_v1.Params$Resource$Users$Messages$Get, signal?: AbortSignal): Promise<gmail_v1.Schema$Message>;
}

export function createGmailApi(auth: Auth.OAuth2Client): GmailApi {
  const gmail = google.gmail({ version: 'v1', auth });
  return {
    getProfile: async (params, signal) => (await gmail.users.getProfile(params, { signal })).data,
    listMessages: async (params, signal) => (await gmail.users.messages.list(params, { signal })).data,
    listHistory: async (params, signal) => (await gmail.users.history.list(params, { signal })).data,
    getMessage: async (params, signal) => (await gmail.users.messages.get(params, { signal })).data,
  };
}

export class GmailMailboxProvider implements MailboxProvider {
  constructor(
    private readonly api: GmailApi,
    private readonly userId: string = 'me'
  ) {}

  async getCurrentPosition(signal?: AbortSignal): Promise<string> {
    const profile = await this.api.getProfile({ userId: this.userId }, signal);
    if (!profile.historyId) throw new Error('Gmail profile has no historyId');
    return String(profile.historyId);
  }

  async listMessages(options: ListMessagesOptions): Promise<MessagePage> {
    const data = await this.api.listMessages(
      {
        userId: this.userId,
        q: options.query || undefined,
        maxResults: Math.min(options.pageSize, MAX_PAGE_SIZE),
        pageToken: options.pageToken || undefined,
      },
      options.signal
    );
    const messageIds = (data.messages ?? [])
      .map((m) => m.id)
      .filter((id): id is string => typeof id === 'string' && id.length > 0);
    return { messageIds, nextPageToken: data.nextPageToken || undefined };
  }

  async listChanges(options: ListChangesOptions): Promise<ChangePage> {
    try {
      const data = await this.api.listHistory(
        {
          userId: this.userId,
          startHistoryId: options.startPosition,
          historyTypes: HISTORY_TYPES,
          maxResults: Math.min(options.pageSize, MAX_PAGE_SIZE),
          pageToken: options.pageToken || undefined,
        },
        options.signal
      );
      const records = data.history ?? [];
      const nextPageToken = data.nextPageToken || undefined;
      // The response historyId is the mailbox's current position; only the last page may claim it.
      const pagePosition = nextPageToken
        ? maxHistoryId(records, options.startPosition)
        : data.historyId
          ? String(data.historyId)
          : maxHistoryId(records, options.startPosition);
      return { changes: historyToChanges(records), pagePosition, nextPageToken };
    } catch (err) {
      if (statusOf(err) === 404) throw new HistoryIdExpiredError(options.startPosition);
      throw err;
    }
  }

  async getMessage(messageId: string, signal?: AbortSignal): Promise<RawMessage | null> {
    try {
      return await this.api.getMessage({ userId: this.userId, id: messageId, format: 'raw' }, signal);
    } catch (err) {
      if (statusOf(err) === 404) return null;
      throw err;
    }
  }
}
