#!/usr/bin/env node
/**
 * mailchat command line: sync, ask, health, reset.
 */

import { parseArgs } from 'node:util';
import { loadConfig } from './config';
import type { MetadataFilter } from './indexing/types';
import { createMailChat, type MailChat } from './index';

const USAGE = `Usage:
  mailchat sync   [--mailbox <id>] [--query <q>] [--limit <n>]
  mailchat ask    <question> [--label <id>]... [--after <date>] [--before <date>]
  mailchat health
  mailchat reset  [--mailbox <id>] [--purge]`;

function parseDate(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) throw new Error(`--${flag} is not a date: ${value}`);
  return ms;
}

function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`--limit must be a positive integer: ${value}`);
  return n;
}

async function run(chat: MailChat, command: string, args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      mailbox: { type: 'string', default: 'me' },
      query: { type: 'string' },
      limit: { type: 'string' },
      label: { type: 'string', multiple: true },
      after: { type: 'string' },
      before: { type: 'string' },
      purge: { type: 'boolean', default: false },
    },
  });
  const mailbox = values.mailbox ?? 'me';

  switch (command) {
    case 'sync': {
      const controller = new AbortController();
      process.once('SIGINT', () => controller.abort());
      const report = await chat.triggerSync(mailbox, values.query, parseLimit(values.limit), controller.signal);
      const { checkpoint, ...summary } = report;
      console.log(JSON.stringify({ ...summary, lastHistoryId: checkpoint?.lastHistoryId ?? null }, null, 2));
      return;
    }
    case 'ask': {
      const question = positionals.join(' ').trim();
      if (!question) throw new Error('ask needs a question');
      const filters: MetadataFilter = {
        labels: values.label,
        after: parseDate(values.after, 'after'),
        before: parseDate(values.before, 'before'),
      };
      const { answer, citations } = await chat.ask('cli', question, filters);
      console.log(answer);
      if (citations.length > 0) {
        console.log('\nSources:');
        for (const c of citations) console.log(`  - ${c.subject || '(no subject)'} (${c.date.slice(0, 10)}) ${c.link}`);
      }
      return;
    }
    case 'health': {
      const health = await chat.health();
      console.log(JSON.stringify(health, null, 2));
      if (!health.repository.ok) process.exitCode = 1;
      return;
    }
    case 'reset':
      await chat.resetMailbox(mailbox, { purge: values.purge });
      console.log(`Checkpoint for ${mailbox} cleared${values.purge ? ' and index purged' : ''}.`);
      return;
    default:
      console.error(USAGE);
      process.exitCode = 2;
  }
}

async function main(): Promise<void> {
  const [command = '', ...rest] = process.argv.slice(2);
  if (command === '' || command === '--help' || command === '-h') {
    console.log(USAGE);
    return;
  }
  const chat = createMailChat(loadConfig());
  try {
    await run(chat, command, rest);
  } finally {
    await chat.close();
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
