/**
 * Bounded per-session conversation history (process memory only).
 */

export interface ConversationTurn {
  role: 'user' | 'assistant';
  text: string;
  /** Messages the turn cited, in order of first citation. */
  citedMessageIds: string[];
}

/** Rough token estimate: four characters per token. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export class ConversationMemory {
  private turns: ConversationTurn[] = [];

  constructor(
    private readonly maxTurns: number,
    private readonly maxTokens: number
  ) {}

  /**
   * Append turns, then drop the oldest until both budgets hold. The turns just appended are kept
   * even when they alone exceed a budget, and the window never opens on an assistant turn.
   */
  append(...turns: ConversationTurn[]): void {
    this.turns.push(...turns);
    const keep = turns.length;
    let tokens = this.turns.reduce((sum, t) => sum + estimateTokens(t.text), 0);
    const dropOldest = (): void => {
      const dropped = this.turns.shift();
      if (dropped) tokens -= estimateTokens(dropped.text);
    };
    while (this.turns.length > keep && (this.turns.length > this.maxTurns || tokens > this.maxTokens)) {
      dropOldest();
    }
    while (this.turns.length > keep && this.turns[0].role === 'assistant') {
      dropOldest();
    }
  }

  window(): ConversationTurn[] {
    return this.turns.map((t) => ({ ...t, citedMessageIds: [...t.citedMessageIds] }));
  }

  get length(): number {
    return this.turns.length;
  }
}
