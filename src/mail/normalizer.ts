/**
 * Raw provider message -> canonical EmailRecord.
 * MIME decoding (transfer encodings, charsets, RFC 2047 headers) is delegated to mailparser.
 */

import { createHash } from 'crypto';
import { simpleParser, type AddressObject, type EmailAddress, type ParsedMail } from 'mailparser';
import { MalformedMessageError } from '../errors';
import type { EmailRecord, RawMessage } from './types';

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === '#') {
      const code = entity[1] === 'x' || entity[1] === 'X' ? parseInt(entity.slice(2), 16) : parseInt(entity.slice(1), 10);
      return Number.isFinite(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

export function stripHtml(html: string): string {
  const text = html
    .replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, '')
    .replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, '')
    .replace(/<[^>]+>/g, ' ');
  return decodeEntities(text).replace(/\s+/g, ' ').trim();
}

function flattenAddresses(field: AddressObject | AddressObject[] | undefined): string[] {
  if (!field) return [];
  const objects = Array.isArray(field) ? field : [field];
  const out: string[] = [];
  const visit = (addr: EmailAddress): void => {
    if (addr.address) out.push(addr.address);
    for (const member of addr.group ?? []) visit(member);
  };
  for (const obj of objects) {
    for (const addr of obj.value) visit(addr);
  }
  return out;
}

function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, '\n').trim();
}

export function contentHash(record: Omit<EmailRecord, 'contentHash'>): string {
  const canonical = JSON.stringify([
    record.messageId,
    record.threadId,
    record.subject,
    record.sender,
    record.recipients,
    record.timestamp,
    record.labels,
    record.bodyText,
    record.hasAttachments,
  ]);
  return createHash('sha256').update(canonical).digest('hex');
}

/**
 * Body preference: text/plain part, else text/html with markup stripped, else the provider snippet.
 */
function selectBody(parsed: ParsedMail | null, snippet: string): string {
  const plain = parsed?.text ? normalizeNewlines(parsed.text) : '';
  if (plain) return plain;
  const html = parsed && typeof parsed.html === 'string' ? stripHtml(parsed.html) : '';
  if (html) return html;
  return snippet;
}

async function parseRaw(messageId: string, raw: string): Promise<ParsedMail> {
  try {
    return await simpleParser(Buffer.from(raw, 'base64url'), {
      skipHtmlToText: true,
      skipTextToHtml: true,
      skipImageLinks: true,
      skipTextLinks: true,
    });
  } catch (e) {
    throw new MalformedMessageError(messageId, 'MIME source could not be parsed', { cause: e });
  }
}

export async function normalizeMessage(raw: RawMessage): Promise<EmailRecord> {
  const messageId = raw.id?.trim();
  if (!messageId) {
    throw new MalformedMessageError(null, 'missing message id');
  }
  const timestamp = raw.internalDate != null ? Number(raw.internalDate) : NaN;
  if (!raw.internalDate || !Number.isFinite(timestamp)) {
    throw new MalformedMessageError(messageId, 'missing timestamp');
  }

  const parsed = raw.raw ? await parseRaw(messageId, raw.raw) : null;
  const snippet = decodeEntities(raw.snippet ?? '').trim();
  const recipients = [...flattenAddresses(parsed?.to), ...flattenAddresses(parsed?.cc)];

  const base = {
    messageId,
    threadId: raw.threadId || messageId,
    subject: parsed?.subject?.trim() ?? '',
    sender: parsed?.from?.text.trim() ?? '',
    recipients,
    timestamp,
    labels: [...new Set(raw.labelIds ?? [])].sort(),
    snippet,
    bodyText: selectBody(parsed, snippet),
    hasAttachments: (parsed?.attachments.length ?? 0) > 0,
  };
  return { ...base, contentHash: contentHash(base) };
}
