/**
 * Text-completion adapter over the LLM client
 */

import { LLMClient } from './client';
import type { CompletionConstraints, TextCompletion } from './types';

export class LLMTextCompletion implements TextCompletion {
  constructor(private readonly client: LLMClient) {}

  async complete(prompt: string, constraints: CompletionConstraints = {}): Promise<string> {
    const response = await this.client.complete({
      messages: [{ role: 'user', content: prompt }],
      systemPrompt: constraints.systemPrompt,
      temperature: constraints.temperature,
      maxTokens: constraints.maxTokens,
      timeoutMs: constraints.timeoutMs,
      signal: constraints.signal,
      skipCache: constraints.cacheable === false,
      json: constraints.json
    });
    return response.content;
  }
}
