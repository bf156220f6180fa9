import { describe, it, expect, beforeEach, vi } from 'vitest';
import { openDatabase } from '../db';
import { RetrievalFailedError, SessionBusyError } from '../errors';
import { getMetrics } from '../indexing/metrics';
import { ChunkEmbedPipeline } from '../indexing/pipeline';
import { RetryPolicy } from '../lib/retryPolicy';
import { normalizeMessage } from '../mail/normalizer';
import { SearchService } from '../search/searchService';
import { SqliteVectorRepository } from '../store/sqliteVectorRepository';
import { HashingEmbedder } from '../testing/fakeEmbedder';
import { buildRawMessage, type RawMessageSpec } from '../testing/rawMessages';
import { ScriptedModel } from '../testing/scriptedModel';
import type { CompletionRequest } from './claude';
import { NO_MATCH_ANSWER } from './prompt';
import { RetrievalChain } from './retrievalChain';

const retry = new RetryPolicy({ maxAttempts: 1, baseDelayMs: 1, maxDelayMs: 1, timeoutMs: 1000 });

const INVOICE: RawMessageSpec = {
  id: 'inv',
  subject: 'Invoice #42',
  from: 'billing@example.com',
  body: 'Payment due March 1',
};
const LUNCH: RawMessageSpec = { id: 'lunch', subject: 'Lunch plans', body: 'Shall we have lunch on Friday?' };

async function setup(model: ScriptedModel, specs: RawMessageSpec[] = [INVOICE, LUNCH], maxSessions = 1000) {
  const repository = new SqliteVectorRepository(openDatabase(':memory:'));
  const embedder = new HashingEmbedder();
  const pipeline = new ChunkEmbedPipeline(embedder, retry, { size: 500, overlap: 50, batchSize: 8 });
  for (const spec of specs) {
    await repository.upsert(await pipeline.process(await normalizeMessage(buildRawMessage(spec))));
  }
  const chain = new RetrievalChain(new SearchService(embedder, repository, retry), model, retry, {
    k: 6,
    memoryMaxTurns: 10,
    memoryMaxTokens: 3000,
    maxSessions,
  });
  return { chain, repository };
}

describe('RetrievalChain', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
  });

  it('answers from the indexed emails and cites the source', async () => {
    const model = new ScriptedModel('The invoice is due on March 1 [id:inv].');
    const { chain } = await setup(model);

    const result = await chain.ask('s1', 'when is the invoice due?');
    expect(result.answer).toBe('The invoice is due on March 1.');
    expect(result.citations).toEqual([
      {
        messageId: 'inv',
        subject: 'Invoice #42',
        date: '2026-02-02T09:00:00.000Z',
        link: 'https://mail.google.com/mail/u/0/#all/inv',
      },
    ]);
    const prompt = model.requests[0].messages[0].content;
    expect(prompt).toContain('[id:inv]\nSubject: Invoice #42\nFrom: billing@example.com');
    expect(prompt.endsWith('Question: when is the invoice due?')).toBe(true);
    expect(chain.sessionState('s1')).toBe('idle');
  });

  it('drops citations of emails that were not retrieved', async () => {
    const model = new ScriptedModel('Due March 1 [id:inv], as confirmed in [id:made-up].');
    const { chain } = await setup(model);
    const before = getMetrics().citationsDropped;

    const result = await chain.ask('s1', 'when is the invoice due?');
    expect(result.citations.map((c) => c.messageId)).toEqual(['inv']);
    expect(result.answer).toBe('Due March 1, as confirmed in.');
    expect(getMetrics().citationsDropped).toBe(before + 1);
  });

  it('answers without the model when nothing matches', async () => {
    const model = new ScriptedModel();
    const { chain } = await setup(model, []);

    const result = await chain.ask('s1', 'when is the invoice due?');
    expect(result).toEqual({ answer: NO_MATCH_ANSWER, citations: [] });
    expect(model.requests).toHaveLength(0);
    expect(chain.history('s1').map((t) => t.role)).toEqual(['user', 'assistant']);
  });

  it('carries earlier turns into the next prompt', async () => {
    const model = new ScriptedModel('Due March 1 [id:inv].', 'It came from billing [id:inv].');
    const { chain } = await setup(model);

    await chain.ask('s1', 'when is the invoice due?');
    await chain.ask('s1', 'who sent it?');
    expect(model.requests[1].messages.slice(0, 2)).toEqual([
      { role: 'user', content: 'when is the invoice due?' },
      { role: 'assistant', content: 'Due March 1.' },
    ]);
    expect(chain.history('s1')[1].citedMessageIds).toEqual(['inv']);
  });

  it('reports a retrieval failure and leaves the session untouched', async () => {
    const model = new ScriptedModel('unused');
    const { chain, repository } = await setup(model);
    await repository.close();

    const err = await chain.ask('s1', 'when is the invoice due?').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetrievalFailedError);
    expect(err instanceof RetrievalFailedError && err.stage).toBe('retrieval');
    expect(chain.history('s1')).toEqual([]);
    expect(chain.sessionState('s1')).toBe('idle');
  });

  it('reports a generation failure', async () => {
    const model = new ScriptedModel(Object.assign(new Error('invalid request'), { status: 400 }));
    const { chain } = await setup(model);

    const err = await chain.ask('s1', 'when is the invoice due?').catch((e: unknown) => e);
    expect(err instanceof RetrievalFailedError && err.stage).toBe('generation');
    expect(chain.history('s1')).toEqual([]);
  });

  it('rejects a second question while the session is busy', async () => {
    const reply = (request: CompletionRequest) =>
      request.messages[request.messages.length - 1].content.endsWith('when is lunch?')
        ? 'Friday [id:lunch].'
        : 'Due March 1 [id:inv].';
    const model = new ScriptedModel(reply, reply);
    const { chain } = await setup(model);

    const first = chain.ask('s1', 'when is the invoice due?');
    await expect(chain.ask('s1', 'and lunch?')).rejects.toThrow(SessionBusyError);
    const other = chain.ask('s2', 'when is lunch?');
    await expect(first).resolves.toMatchObject({ answer: 'Due March 1.' });
    await expect(other).resolves.toMatchObject({ answer: 'Friday.' });
  });

  it('forgets a session on end', async () => {
    const model = new ScriptedModel('Due March 1 [id:inv].');
    const { chain } = await setup(model);
    await chain.ask('s1', 'when is the invoice due?');
    expect(chain.endSession('s1')).toBe(true);
    expect(chain.history('s1')).toEqual([]);
    expect(chain.endSession('s1')).toBe(false);
  });

  it('forgets the least recently used idle session past the cap', async () => {
    const { chain } = await setup(new ScriptedModel(), [], 2);
    await chain.ask('s1', 'first?');
    await chain.ask('s2', 'second?');
    await chain.ask('s1', 'again?');
    await chain.ask('s3', 'third?');

    expect(chain.history('s2')).toEqual([]);
    expect(chain.history('s1')).toHaveLength(4);
    expect(chain.history('s3')).toHaveLength(2);
  });

  it('never evicts a session that is answering', async () => {
    const model = new ScriptedModel('Due March 1 [id:inv].', 'Due March 1 [id:inv].');
    const { chain } = await setup(model, [INVOICE, LUNCH], 1);

    const first = chain.ask('s1', 'when is the invoice due?');
    const second = chain.ask('s2', 'when is the invoice due?');
    await Promise.all([first, second]);
    expect(chain.history('s1')).toHaveLength(2);
    expect(chain.history('s2')).toHaveLength(2);
  });
});
