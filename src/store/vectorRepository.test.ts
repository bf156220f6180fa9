import { describe, it, expect } from 'vitest';
import type { Chunk } from '../indexing/types';
import { compareScored, cosineSimilarity, groupByMessage } from './vectorRepository';

function chunk(messageId: string, index: number, timestamp = 1000, labels = ['INBOX']): Chunk {
  return {
    chunkId: `${messageId}_${index}`,
    messageId,
    chunkIndex: index,
    text: '',
    embedding: [],
    contentHash: 'h',
    metadata: { subject: '', sender: '', timestamp, labels, threadId: 't' },
  };
}

describe('cosineSimilarity', () => {
  it('is 1 for parallel and 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
  });

  it('is 0 against a zero vector', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('refuses vectors of different dimensions', () => {
    expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow('embedding dimension mismatch: 2 vs 3');
  });
});

describe('compareScored', () => {
  it('orders by score, then newer timestamp, then chunk id', () => {
    const items = [
      { chunk: chunk('b', 0, 1000), score: 0.5 },
      { chunk: chunk('a', 0, 1000), score: 0.5 },
      { chunk: chunk('c', 0, 2000), score: 0.5 },
      { chunk: chunk('d', 0, 500), score: 0.9 },
    ];
    expect(items.sort(compareScored).map((s) => s.chunk.chunkId)).toEqual(['d_0', 'c_0', 'a_0', 'b_0']);
  });
});

describe('groupByMessage', () => {
  it('keeps first-seen order', () => {
    const groups = groupByMessage([chunk('x', 0), chunk('y', 0), chunk('x', 1)]);
    expect([...groups.keys()]).toEqual(['x', 'y']);
    expect(groups.get('x')?.map((c) => c.chunkIndex)).toEqual([0, 1]);
  });
});
