/**
 * LLM Types
 *
 * Type definitions for LLM configuration, requests and responses.
 * Supports both Anthropic and OpenAI providers.
 */

/**
 * Supported LLM providers
 */
export type LLMProvider = 'anthropic' | 'openai';

export const LLM_PROVIDERS: readonly LLMProvider[] = ['anthropic', 'openai'];

/**
 * LLM configuration
 */
export interface LLMConfig {
  provider: LLMProvider;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeout: number; // milliseconds
}

/**
 * Default configurations for each provider
 */
export const DEFAULT_LLM_CONFIG: Record<LLMProvider, Omit<LLMConfig, 'apiKey'>> = {
  anthropic: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-20250514',
    temperature: 0.7,
    maxTokens: 4096,
    timeout: 60000
  },
  openai: {
    provider: 'openai',
    model: 'gpt-4o',
    temperature: 0.7,
    maxTokens: 4096,
    timeout: 60000
  }
};

/**
 * Message role for chat-based LLM interactions
 */
export type MessageRole = 'user' | 'assistant';

export interface LLMMessage {
  role: MessageRole;
  content: string;
}

/**
 * LLM request parameters
 */
export interface LLMRequest {
  messages: LLMMessage[];
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  model?: string;
  /** Per-request timeout, overrides the client default */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Independent samples of the same prompt must not be served from cache */
  skipCache?: boolean;
  /** Ask the provider for a JSON object where it supports that mode */
  json?: boolean;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  finishReason?: string;
}

/**
 * How a failed provider call is classified
 */
export type LLMFailureKind = 'timeout' | 'rate-limited' | 'provider';

/**
 * Error raised by the client after retries are exhausted
 */
export class LLMRequestError extends Error {
  constructor(
    public readonly kind: LLMFailureKind,
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'LLMRequestError';
  }
}

/**
 * Retry configuration for LLM calls
 */
export interface RetryConfig {
  maxAttempts: number;
  delayMs: number;
  backoffMs: number[];
  shouldRetry?: (error: LLMRequestError) => boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  delayMs: 1000,
  backoffMs: [1000, 2000, 4000],
  // Timeouts are bounded by the caller's budget, so only transient provider faults retry
  shouldRetry: (error) => error.kind !== 'timeout'
};

/**
 * Constraints passed alongside a prompt to a text-completion capability
 */
export interface CompletionConstraints {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  cacheable?: boolean;
  json?: boolean;
}

/**
 * Opaque text-completion capability: prompt in, text out.
 * Implementations reject with LLMRequestError so callers can tell a timeout
 * from a rate limit from any other provider failure.
 */
export interface TextCompletion {
  complete(prompt: string, constraints?: CompletionConstraints): Promise<string>;
}
