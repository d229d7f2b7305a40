/**
 * LLM Client
 *
 * Unified client for Anthropic and OpenAI LLM providers.
 * Adds response caching, bounded retry with backoff, per-request timeouts and
 * abort signals, and classifies every failure as timeout, rate limit or
 * provider error.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { jsonrepair } from 'jsonrepair';
import { createComponentLogger } from '../logging/logger';
import {
  LLMConfig,
  LLMProvider,
  LLM_PROVIDERS,
  LLMRequest,
  LLMResponse,
  LLMRequestError,
  DEFAULT_LLM_CONFIG,
  RetryConfig,
  DEFAULT_RETRY_CONFIG
} from './types';
import { LLMCache, CacheConfig, CacheKeyParts } from './cache';

const log = createComponentLogger('llm');

/**
 * A request with every default resolved, as handed to the provider
 */
export interface ResolvedLLMRequest {
  request: LLMRequest;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

/**
 * Performs one provider round trip. Replaceable so the client can run
 * against an in-process stand-in.
 */
export type LLMTransport = (resolved: ResolvedLLMRequest) => Promise<LLMResponse>;

export interface LLMClientOptions {
  cache?: Partial<CacheConfig>;
  retry?: Partial<RetryConfig>;
  transport?: LLMTransport;
}

/**
 * Map anything a provider SDK throws onto the three failure kinds
 */
export function classifyProviderError(error: unknown): LLMRequestError {
  if (error instanceof LLMRequestError) {
    return error;
  }
  if (
    error instanceof Anthropic.APIConnectionTimeoutError ||
    error instanceof OpenAI.APIConnectionTimeoutError
  ) {
    return new LLMRequestError('timeout', error.message);
  }
  if (error instanceof Anthropic.APIUserAbortError || error instanceof OpenAI.APIUserAbortError) {
    return new LLMRequestError('timeout', 'Request aborted');
  }
  if (error instanceof Anthropic.APIError || error instanceof OpenAI.APIError) {
    if (error.status === 429) {
      return new LLMRequestError('rate-limited', error.message, 429);
    }
    return new LLMRequestError('provider', error.message, error.status);
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return new LLMRequestError('timeout', 'Request aborted');
  }
  return new LLMRequestError('provider', error instanceof Error ? error.message : String(error));
}

function isProvider(value: string | undefined): value is LLMProvider {
  return LLM_PROVIDERS.some(provider => provider === value);
}

/**
 * Unified LLM client supporting both Anthropic and OpenAI
 */
export class LLMClient {
  private config: LLMConfig;
  private anthropicClient?: Anthropic;
  private openaiClient?: OpenAI;
  private cache: LLMCache;
  private retryConfig: RetryConfig;
  private transport: LLMTransport;

  constructor(config: Partial<LLMConfig> & { apiKey: string }, options: LLMClientOptions = {}) {
    const provider: LLMProvider = config.provider ?? 'anthropic';
    this.config = {
      ...DEFAULT_LLM_CONFIG[provider],
      ...config,
      provider
    };

    this.cache = new LLMCache(options.cache);
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retry };

    if (options.transport) {
      this.transport = options.transport;
    } else if (this.config.provider === 'anthropic') {
      // Retries are owned here, not by the SDK
      this.anthropicClient = new Anthropic({ apiKey: this.config.apiKey, maxRetries: 0 });
      this.transport = (resolved) => this.callAnthropic(resolved);
    } else {
      this.openaiClient = new OpenAI({ apiKey: this.config.apiKey, maxRetries: 0 });
      this.transport = (resolved) => this.callOpenAI(resolved);
    }
  }

  /**
   * Send a completion request to the LLM
   */
  async complete(request: LLMRequest): Promise<LLMResponse> {
    const userMessage = request.messages.find(m => m.role === 'user');
    if (!userMessage) {
      throw new LLMRequestError('provider', 'Request must include at least one user message');
    }

    const resolved: ResolvedLLMRequest = {
      request,
      model: request.model ?? this.config.model,
      temperature: request.temperature ?? this.config.temperature,
      maxTokens: request.maxTokens ?? this.config.maxTokens,
      timeoutMs: request.timeoutMs ?? this.config.timeout
    };

    const cacheKey: CacheKeyParts = {
      systemPrompt: request.systemPrompt ?? '',
      userPrompt: request.messages.map(m => `${m.role}:${m.content}`).join('\n'),
      temperature: resolved.temperature,
      maxTokens: resolved.maxTokens,
      model: resolved.model
    };

    if (!request.skipCache) {
      const cached = this.cache.get(cacheKey);
      if (cached) {
        log.debug({ model: resolved.model }, 'LLM cache hit');
        return cached;
      }
    }

    const start = Date.now();
    log.debug(
      { provider: this.config.provider, model: resolved.model, temperature: resolved.temperature },
      'LLM request start'
    );

    const response = await this.retryWithBackoff(() => this.transport(resolved), request.signal);

    log.debug(
      {
        model: response.model,
        finishReason: response.finishReason,
        elapsedMs: Date.now() - start,
        usage: response.usage
      },
      'LLM request end'
    );

    if (!request.skipCache) {
      this.cache.set(cacheKey, response);
    }

    return response;
  }

  private async callAnthropic(resolved: ResolvedLLMRequest): Promise<LLMResponse> {
    if (!this.anthropicClient) {
      throw new LLMRequestError('provider', 'Anthropic client not initialized');
    }

    const { request } = resolved;
    const response = await this.anthropicClient.messages.create(
      {
        model: resolved.model,
        max_tokens: resolved.maxTokens,
        temperature: resolved.temperature,
        ...(request.systemPrompt ? { system: request.systemPrompt } : {}),
        messages: request.messages.map(m => ({ role: m.role, content: m.content }))
      },
      { timeout: resolved.timeoutMs, signal: request.signal }
    );

    const text = response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('');
    if (!text) {
      throw new LLMRequestError('provider', 'No text content in Anthropic response');
    }

    return {
      content: text,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens
      },
      finishReason: response.stop_reason ?? undefined
    };
  }

  private async callOpenAI(resolved: ResolvedLLMRequest): Promise<LLMResponse> {
    if (!this.openaiClient) {
      throw new LLMRequestError('provider', 'OpenAI client not initialized');
    }

    const { request } = resolved;
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    for (const message of request.messages) {
      messages.push(
        message.role === 'user'
          ? { role: 'user', content: message.content }
          : { role: 'assistant', content: message.content }
      );
    }

    const body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: resolved.model,
      messages,
      temperature: resolved.temperature,
      max_tokens: resolved.maxTokens
    };
    if (request.json) {
      body.response_format = { type: 'json_object' };
    }

    const response = await this.openaiClient.chat.completions.create(body, {
      timeout: resolved.timeoutMs,
      signal: request.signal
    });

    const choice = response.choices[0];
    if (!choice || !choice.message.content) {
      throw new LLMRequestError('provider', 'No content in OpenAI response');
    }

    return {
      content: choice.message.content,
      model: response.model,
      usage: response.usage
        ? {
            inputTokens: response.usage.prompt_tokens,
            outputTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens
          }
        : undefined,
      finishReason: choice.finish_reason ?? undefined
    };
  }

  /**
   * Retry with backoff; an aborted signal stops further attempts
   */
  private async retryWithBackoff<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let lastError: LLMRequestError | undefined;

    for (let attempt = 0; attempt < this.retryConfig.maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw new LLMRequestError('timeout', 'Request aborted');
      }

      try {
        return await fn();
      } catch (error) {
        lastError = classifyProviderError(error);

        if (signal?.aborted) {
          throw new LLMRequestError('timeout', 'Request aborted');
        }
        if (this.retryConfig.shouldRetry && !this.retryConfig.shouldRetry(lastError)) {
          throw lastError;
        }
        if (attempt === this.retryConfig.maxAttempts - 1) {
          break;
        }

        const delay = this.retryConfig.backoffMs[attempt] ?? this.retryConfig.delayMs;
        log.warn({ attempt: attempt + 1, kind: lastError.kind, delay }, 'LLM call failed, retrying');
        await this.sleep(delay, signal);
      }
    }

    throw lastError ?? new LLMRequestError('provider', 'Retry failed');
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(done, ms);
      function done(): void {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        resolve();
      }
      signal?.addEventListener('abort', done, { once: true });
    });
  }

  /**
   * Parse JSON from a model response, tolerating fences and minor damage
   */
  parseJsonResponse(text: string): unknown {
    return parseJsonResponse(text);
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCacheStats(): ReturnType<LLMCache['getStats']> {
    return this.cache.getStats();
  }

  getConfig(): LLMConfig {
    return { ...this.config };
  }
}

/**
 * Parse JSON from model output: strips code fences, narrows to the outermost
 * object or array, and runs jsonrepair as a last resort.
 */
export function parseJsonResponse(text: string): unknown {
  const cleaned = text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();

  try {
    return JSON.parse(cleaned);
  } catch (error) {
    const start = cleaned.search(/[[{]/);
    const end = Math.max(cleaned.lastIndexOf('}'), cleaned.lastIndexOf(']'));
    const candidate = start !== -1 && end > start ? cleaned.slice(start, end + 1) : cleaned;

    try {
      return JSON.parse(jsonrepair(candidate));
    } catch {
      const reason = error instanceof Error ? error.message : 'Unknown error';
      throw new LLMRequestError(
        'provider',
        `Failed to parse LLM response as JSON: ${reason}. Preview: ${text.slice(0, 200)}`
      );
    }
  }
}

/**
 * Create an LLM client from environment variables.
 * Returns null when no API key is configured for the selected provider.
 */
export function createLLMClientFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options: LLMClientOptions = {}
): LLMClient | null {
  const provider: LLMProvider = isProvider(env.LLM_PROVIDER) ? env.LLM_PROVIDER : 'anthropic';
  const apiKey = provider === 'anthropic' ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY;

  if (!apiKey) {
    log.info({ provider }, 'No API key configured, AI generation unavailable');
    return null;
  }

  return new LLMClient(
    {
      provider,
      apiKey,
      model: env.LLM_MODEL || DEFAULT_LLM_CONFIG[provider].model
    },
    options
  );
}
