/**
 * Language model seam for answer generation. Anthropic Messages API behind a small interface
 * so the chain can be tested with a scripted model.
 */

import Anthropic from '@anthropic-ai/sdk';
import { requireSetting, type AppConfig } from '../config';

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  system: string;
  messages: ChatMessage[];
}

export interface LanguageModel {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<string>;
}

const TEMPERATURE = 0.2;

export class AnthropicLanguageModel implements LanguageModel {
  private readonly client: Anthropic;

  constructor(
    apiKey: string,
    private readonly model: string,
    private readonly maxTokens: number
  ) {
    // retries come from the shared RetryPolicy
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: TEMPERATURE,
        system: request.system,
        messages: request.messages,
      },
      { signal }
    );
    return response.content
      .flatMap((b) => (b.type === 'text' ? [b.text] : []))
      .join('')
      .trim();
  }
}

export function createLanguageModel(config: AppConfig['llm']): LanguageModel {
  return new AnthropicLanguageModel(requireSetting(config.apiKey, 'ANTHROPIC_API_KEY'), config.model, config.maxTokens);
}
