/**
 * LLM Adapter Types
 *
 * Provider configuration, messages and responses for the chat models that
 * answer legal questions, paraphrase queries and extract keywords.
 */

import { z } from 'zod';

// ============================================================================
// LLM Provider Types
// ============================================================================

/**
 * Supported LLM providers. The set is closed: configuration naming any other
 * provider fails validation.
 */
export const LLMProvider = {
  GROQ: 'groq',
  OPENAI: 'openai',
  GOOGLE_GEMINI: 'google_gemini',
  OLLAMA: 'ollama',
  ANTHROPIC: 'anthropic',
} as const;

export type LLMProvider = (typeof LLMProvider)[keyof typeof LLMProvider];

export const LLMProviderSchema = z.enum([
  'groq',
  'openai',
  'google_gemini',
  'ollama',
  'anthropic',
]);

export function isLLMProvider(value: string): value is LLMProvider {
  return LLMProviderSchema.safeParse(value).success;
}

// ============================================================================
// Message Types
// ============================================================================

export const MessageRole = {
  SYSTEM: 'system',
  USER: 'user',
  ASSISTANT: 'assistant',
} as const;

export type MessageRole = (typeof MessageRole)[keyof typeof MessageRole];

export const LLMMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string().min(1),
});

export type LLMMessage = z.infer<typeof LLMMessageSchema>;

/**
 * A prior turn of a conversation (no system turns)
 */
export const ConversationTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

export type ConversationTurn = z.infer<typeof ConversationTurnSchema>;

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Settings shared by every provider
 */
export const LLMBaseConfigSchema = z.object({
  /** Model identifier (e.g., 'llama-3.3-70b-versatile', 'gpt-4o-mini') */
  model: z.string().min(1),
  /** Maximum tokens in the response */
  maxTokens: z.number().int().positive().max(100000).default(2048),
  /** Temperature for response randomness (0-2) */
  temperature: z.number().min(0).max(2).default(0.3),
  /** HTTP timeout for a single request */
  timeoutMs: z.number().int().positive().default(60000),
});

export const AnthropicConfigSchema = LLMBaseConfigSchema.extend({
  provider: z.literal('anthropic'),
  apiKey: z.string().min(1),
  /** Base URL for API requests (for proxies) */
  baseUrl: z.string().url().optional(),
});

export type AnthropicConfig = z.infer<typeof AnthropicConfigSchema>;

export const OpenAIConfigSchema = LLMBaseConfigSchema.extend({
  provider: z.literal('openai'),
  apiKey: z.string().min(1),
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
  organization: z.string().optional(),
});

export type OpenAIConfig = z.infer<typeof OpenAIConfigSchema>;

/**
 * Groq exposes an OpenAI-compatible chat completions API
 */
export const GroqConfigSchema = LLMBaseConfigSchema.extend({
  provider: z.literal('groq'),
  apiKey: z.string().min(1),
  baseUrl: z.string().url().default('https://api.groq.com/openai/v1'),
});

export type GroqConfig = z.infer<typeof GroqConfigSchema>;

export const GeminiConfigSchema = LLMBaseConfigSchema.extend({
  provider: z.literal('google_gemini'),
  apiKey: z.string().min(1),
  baseUrl: z
    .string()
    .url()
    .default('https://generativelanguage.googleapis.com/v1beta'),
});

export type GeminiConfig = z.infer<typeof GeminiConfigSchema>;

export const OllamaConfigSchema = LLMBaseConfigSchema.extend({
  provider: z.literal('ollama'),
  baseUrl: z.string().url().default('http://localhost:11434'),
});

export type OllamaConfig = z.infer<typeof OllamaConfigSchema>;

export const LLMProviderConfigSchema = z.discriminatedUnion('provider', [
  GroqConfigSchema,
  OpenAIConfigSchema,
  GeminiConfigSchema,
  OllamaConfigSchema,
  AnthropicConfigSchema,
]);

export type LLMProviderConfig = z.infer<typeof LLMProviderConfigSchema>;
export type LLMProviderConfigInput = z.input<typeof LLMProviderConfigSchema>;

/**
 * Default model per provider
 */
export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  groq: 'llama-3.3-70b-versatile',
  openai: 'gpt-4o-mini',
  google_gemini: 'gemini-1.5-flash',
  ollama: 'qwen2.5:7b',
  anthropic: 'claude-3-5-sonnet-20241022',
};

// ============================================================================
// Token Usage Types
// ============================================================================

export const LLMTokenUsageSchema = z.object({
  inputTokens: z.number().int().nonnegative(),
  outputTokens: z.number().int().nonnegative(),
});

export type LLMTokenUsage = z.infer<typeof LLMTokenUsageSchema>;

// ============================================================================
// Response Types
// ============================================================================

export const LLMResponseSchema = z.object({
  /** The generated text content */
  content: z.string(),
  usage: LLMTokenUsageSchema,
  /** Model identifier reported by the provider */
  model: z.string().min(1),
  /** Finish reason (e.g., 'stop', 'length') */
  finishReason: z.string().optional(),
});

export type LLMResponse = z.infer<typeof LLMResponseSchema>;

// ============================================================================
// Request Types
// ============================================================================

export const LLMCompletionOptionsSchema = z.object({
  /** Override default temperature for this request */
  temperature: z.number().min(0).max(2).optional(),
  /** Override default max tokens for this request */
  maxTokens: z.number().int().positive().max(100000).optional(),
  /** Stop sequences to end generation */
  stopSequences: z.array(z.string()).optional(),
  /** Ask the provider for a JSON object where it supports it */
  responseFormat: z.enum(['text', 'json']).optional(),
});

export type LLMCompletionOptions = z.infer<typeof LLMCompletionOptionsSchema>;

// ============================================================================
// Error Types
// ============================================================================

export const LLMErrorCode = {
  /** Rate limit exceeded */
  RATE_LIMIT: 'rate_limit',
  /** Invalid API key or authentication failure */
  AUTH_ERROR: 'auth_error',
  /** Invalid request parameters */
  INVALID_REQUEST: 'invalid_request',
  /** Model not found or not available */
  MODEL_NOT_FOUND: 'model_not_found',
  /** Content blocked by safety filters */
  CONTENT_FILTERED: 'content_filtered',
  /** Request timeout */
  TIMEOUT: 'timeout',
  /** Server error from provider */
  SERVER_ERROR: 'server_error',
  /** Network or connection error */
  NETWORK_ERROR: 'network_error',
  /** Provider answered with a body we could not read */
  INVALID_RESPONSE: 'invalid_response',
  UNKNOWN: 'unknown',
} as const;

export type LLMErrorCode = (typeof LLMErrorCode)[keyof typeof LLMErrorCode];

export interface LLMErrorInfo {
  code: LLMErrorCode;
  message: string;
  provider: LLMProvider;
  /** Whether the request can be retried */
  retryable: boolean;
  /** Suggested retry delay in milliseconds */
  retryAfterMs?: number | undefined;
  /** Original error from the provider */
  originalError?: unknown;
}

// ============================================================================
// Retry Configuration Types
// ============================================================================

export const RetryableErrorCodeSchema = z.enum([
  'rate_limit',
  'timeout',
  'server_error',
  'network_error',
]);

export const RetryConfigSchema = z.object({
  /** Maximum number of retry attempts (excluding the initial request) */
  maxRetries: z.number().int().nonnegative().default(2),
  /** Initial delay in milliseconds before the first retry */
  initialDelayMs: z.number().int().positive().default(1000),
  /** Maximum delay in milliseconds between retries */
  maxDelayMs: z.number().int().positive().default(30000),
  /** Exponential backoff multiplier */
  backoffMultiplier: z.number().positive().default(2),
  /** Whether to add random jitter to retry delays */
  jitter: z.boolean().default(true),
  /** Maximum jitter as a fraction of the delay (0.0 to 1.0) */
  jitterFactor: z.number().min(0).max(1).default(0.25),
  /** Which error codes trigger a retry */
  retryableErrorCodes: z
    .array(RetryableErrorCodeSchema)
    .default(['rate_limit', 'timeout', 'server_error', 'network_error']),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const DEFAULT_RETRY_CONFIG: RetryConfig = RetryConfigSchema.parse({});

export interface RetryEvent {
  type:
    | 'attempt_start'
    | 'attempt_failed'
    | 'attempt_succeeded'
    | 'retrying'
    | 'max_retries_exceeded';
  /** 1-based attempt number */
  attemptNumber: number;
  maxRetries: number;
  error?: LLMErrorInfo | undefined;
  /** Delay before next retry (only for 'retrying' events) */
  nextDelayMs?: number | undefined;
  timestamp: Date;
}

export type RetryEventHandler = (event: RetryEvent) => void;

// ============================================================================
// Utility Functions
// ============================================================================

export function createSystemMessage(content: string): LLMMessage {
  return { role: 'system', content };
}

export function createUserMessage(content: string): LLMMessage {
  return { role: 'user', content };
}

export function createAssistantMessage(content: string): LLMMessage {
  return { role: 'assistant', content };
}
