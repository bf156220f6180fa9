/**
 * Conversational retrieval: question -> ranked candidate emails -> grounded, cited answer.
 * One state machine per session: idle -> retrieving -> composing -> idle.
 */

import { RetrievalFailedError, SessionBusyError } from '../errors';
import { recordCitationsDropped } from '../indexing/metrics';
import type { MetadataFilter } from '../indexing/types';
import type { RetryPolicy } from '../lib/retryPolicy';
import type { SearchService } from '../search/searchService';
import type { LanguageModel } from './claude';
import { ConversationMemory, type ConversationTurn } from './memory';
import {
  buildPrompt,
  groupCandidates,
  NO_MATCH_ANSWER,
  parseCitations,
  toCitation,
  type Candidate,
  type Citation,
} from './prompt';

export type SessionState = 'idle' | 'retrieving' | 'composing';

export interface ChatAnswer {
  answer: string;
  citations: Citation[];
}

export interface RetrievalChainOptions {
  k: number;
  memoryMaxTurns: number;
  memoryMaxTokens: number;
  /** Idle sessions beyond this are forgotten, least recently used first. */
  maxSessions: number;
}

interface Session {
  state: SessionState;
  memory: ConversationMemory;
}

export class RetrievalChain {
  private readonly sessions = new Map<string, Session>();

  constructor(
    private readonly search: SearchService,
    private readonly model: LanguageModel,
    private readonly retry: RetryPolicy,
    private readonly options: RetrievalChainOptions
  ) {}

  sessionState(sessionId: string): SessionState {
    return this.sessions.get(sessionId)?.state ?? 'idle';
  }

  history(sessionId: string): ConversationTurn[] {
    return this.sessions.get(sessionId)?.memory.window() ?? [];
  }

  /** Forget a session's history. Returns false when it did not exist. */
  endSession(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (session && session.state !== 'idle') throw new SessionBusyError(sessionId);
    return this.sessions.delete(sessionId);
  }

  /** Sessions are kept in use order, most recent last. */
  private session(sessionId: string): Session {
    let session = this.sessions.get(sessionId);
    if (session) {
      this.sessions.delete(sessionId);
    } else {
      this.evictIdle();
      session = {
        state: 'idle',
        memory: new ConversationMemory(this.options.memoryMaxTurns, this.options.memoryMaxTokens),
      };
    }
    this.sessions.set(sessionId, session);
    return session;
  }

  private evictIdle(): void {
    for (const [id, session] of this.sessions) {
      if (this.sessions.size < this.options.maxSessions) return;
      if (session.state === 'idle') {
        this.sessions.delete(id);
        console.info('[retrievalChain] evicted idle session', id);
      }
    }
  }

  async ask(sessionId: string, question: string, filters?: MetadataFilter): Promise<ChatAnswer> {
    const session = this.session(sessionId);
    if (session.state !== 'idle') throw new SessionBusyError(sessionId);
    session.state = 'retrieving';
    try {
      const candidates = await this.retrieve(question, filters);
      let result: ChatAnswer;
      if (candidates.length === 0) {
        result = { answer: NO_MATCH_ANSWER, citations: [] };
      } else {
        session.state = 'composing';
        result = await this.compose(question, session.memory.window(), candidates);
      }
      session.memory.append(
        { role: 'user', text: question, citedMessageIds: [] },
        { role: 'assistant', text: result.answer, citedMessageIds: result.citations.map((c) => c.messageId) }
      );
      return result;
    } finally {
      session.state = 'idle';
    }
  }

  private async retrieve(question: string, filters: MetadataFilter | undefined): Promise<Candidate[]> {
    try {
      const hits = await this.search.semanticSearch(question, this.options.k, filters);
      return groupCandidates(hits);
    } catch (e) {
      console.error('[retrievalChain] retrieval failed', e);
      throw new RetrievalFailedError('retrieval', { cause: e });
    }
  }

  private async compose(question: string, history: ConversationTurn[], candidates: Candidate[]): Promise<ChatAnswer> {
    const request = buildPrompt(question, history, candidates);
    let text: string;
    try {
      text = await this.retry.run('generate answer', (signal) => this.model.complete(request, signal));
    } catch (e) {
      console.error('[retrievalChain] generation failed', e);
      throw new RetrievalFailedError('generation', { cause: e });
    }
    const byId = new Map(candidates.map((c) => [c.messageId, c]));
    const parsed = parseCitations(text, new Set(byId.keys()));
    if (parsed.dropped.length > 0) recordCitationsDropped(parsed.dropped.length);
    const citations = parsed.cited.flatMap((id) => {
      const c = byId.get(id);
      return c ? [toCitation(c)] : [];
    });
    return { answer: parsed.answer, citations };
  }
}
