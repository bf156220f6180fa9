import { describe, it, expect } from 'vitest';
import { ConversationMemory, estimateTokens, type ConversationTurn } from './memory';

const user = (text: string): ConversationTurn => ({ role: 'user', text, citedMessageIds: [] });
const assistant = (text: string, cited: string[] = []): ConversationTurn => ({
  role: 'assistant',
  text,
  citedMessageIds: cited,
});

const texts = (memory: ConversationMemory): string[] => memory.window().map((t) => t.text);

describe('estimateTokens', () => {
  it('rounds characters / 4 up', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcde')).toBe(2);
  });
});

describe('ConversationMemory', () => {
  it('keeps the last K turns', () => {
    const memory = new ConversationMemory(4, 10_000);
    memory.append(user('u1'), assistant('a1'));
    memory.append(user('u2'), assistant('a2'));
    memory.append(user('u3'), assistant('a3'));
    expect(texts(memory)).toEqual(['u2', 'a2', 'u3', 'a3']);
  });

  it('drops the oldest turns to fit the token budget', () => {
    const memory = new ConversationMemory(100, 10);
    const four = (c: string) => c.repeat(16);
    memory.append(user(four('a')), assistant(four('b')));
    memory.append(user(four('c')), assistant(four('d')));
    expect(texts(memory)).toEqual([four('c'), four('d')]);
  });

  it('never drops the turns just appended', () => {
    const memory = new ConversationMemory(100, 10);
    memory.append(user('short'), assistant('short'));
    const long = 'x'.repeat(100);
    memory.append(user(long), assistant(long));
    expect(texts(memory)).toEqual([long, long]);
  });

  it('never starts the window with an assistant turn', () => {
    const memory = new ConversationMemory(3, 10_000);
    memory.append(user('u1'), assistant('a1'));
    memory.append(user('u2'), assistant('a2'));
    expect(memory.window().map((t) => t.role)).toEqual(['user', 'assistant']);
    expect(texts(memory)).toEqual(['u2', 'a2']);
  });

  it('hands out copies', () => {
    const memory = new ConversationMemory(10, 10_000);
    memory.append(user('q'), assistant('a', ['m1']));
    memory.window()[1].citedMessageIds.push('m2');
    expect(memory.window()[1].citedMessageIds).toEqual(['m1']);
    expect(memory.length).toBe(2);
  });
});
