/**
 * Prompt assembly for grounded answers and parsing of the `[id:<messageId>]` citation markers.
 */

import type { ScoredChunk } from '../indexing/types';
import type { CompletionRequest } from './claude';
import type { ConversationTurn } from './memory';

const MAX_EXCERPT_CHARS = 2000;
const MARKER_RE = /\[id:([^\]]+)\]/g;
const MARKER_STRIP_RE = /\s*\[id:[^\]]+\]/g;

export const SYSTEM_PROMPT = [
  'You are a helpful assistant that answers questions about the user’s own mailbox.',
  'Use only the emails provided with the question. Each email starts with a marker of the form [id:<messageId>].',
  'Cite every email you rely on by repeating its marker exactly, right after the statement it supports.',
  'Never invent markers for emails that were not provided.',
  'If the answer cannot be determined from the emails, say so explicitly.',
].join('\n');

export const NO_MATCH_ANSWER =
  'No matching emails were found for that question. Try rephrasing it or widening the filters.';

/** Retrieved message, best chunk score kept. */
export interface Candidate {
  messageId: string;
  threadId: string;
  subject: string;
  sender: string;
  timestamp: number;
  score: number;
  excerpt: string;
}

export interface Citation {
  messageId: string;
  subject: string;
  /** ISO 8601 */
  date: string;
  link: string;
}

export interface ParsedAnswer {
  answer: string;
  /** Cited ids present in the candidate set, in order of first citation. */
  cited: string[];
  /** Cited ids outside the candidate set. */
  dropped: string[];
}

export function messageLink(messageId: string): string {
  return `https://mail.google.com/mail/u/0/#all/${encodeURIComponent(messageId)}`;
}

/** Group ranked chunks into one candidate per message, ordered by best score. */
export function groupCandidates(hits: ScoredChunk[]): Candidate[] {
  const byMessage = new Map<string, { candidate: Candidate; parts: Map<number, string> }>();
  for (const { chunk, score } of hits) {
    let entry = byMessage.get(chunk.messageId);
    if (!entry) {
      entry = {
        candidate: {
          messageId: chunk.messageId,
          threadId: chunk.metadata.threadId,
          subject: chunk.metadata.subject,
          sender: chunk.metadata.sender,
          timestamp: chunk.metadata.timestamp,
          score,
          excerpt: '',
        },
        parts: new Map(),
      };
      byMessage.set(chunk.messageId, entry);
    }
    entry.candidate.score = Math.max(entry.candidate.score, score);
    entry.parts.set(chunk.chunkIndex, chunk.text);
  }
  return [...byMessage.values()]
    .map(({ candidate, parts }) => {
      const text = [...parts.entries()]
        .sort(([a], [b]) => a - b)
        .map(([, t]) => t)
        .join('\n…\n');
      return { ...candidate, excerpt: text.slice(0, MAX_EXCERPT_CHARS) };
    })
    .sort((a, b) => b.score - a.score || b.timestamp - a.timestamp);
}

export function formatCandidate(c: Candidate): string {
  return [
    `[id:${c.messageId}]`,
    `Subject: ${c.subject || '(no subject)'}`,
    `From: ${c.sender}`,
    `Date: ${new Date(c.timestamp).toISOString()}`,
    `Link: ${messageLink(c.messageId)}`,
    '',
    c.excerpt,
  ].join('\n');
}

export function buildPrompt(question: string, history: ConversationTurn[], candidates: Candidate[]): CompletionRequest {
  const context = candidates.map(formatCandidate).join('\n\n---\n\n');
  return {
    system: SYSTEM_PROMPT,
    messages: [
      ...history.map((t) => ({ role: t.role, content: t.text })),
      { role: 'user', content: `Emails:\n\n${context}\n\nQuestion: ${question}` },
    ],
  };
}

export function parseCitations(text: string, candidateIds: ReadonlySet<string>): ParsedAnswer {
  const cited: string[] = [];
  const dropped: string[] = [];
  for (const match of text.matchAll(MARKER_RE)) {
    const id = match[1].trim();
    const bucket = candidateIds.has(id) ? cited : dropped;
    if (!bucket.includes(id)) bucket.push(id);
  }
  return { answer: text.replace(MARKER_STRIP_RE, '').trim(), cited, dropped };
}

export function toCitation(c: Candidate): Citation {
  return {
    messageId: c.messageId,
    subject: c.subject,
    date: new Date(c.timestamp).toISOString(),
    link: messageLink(c.messageId),
  };
}
