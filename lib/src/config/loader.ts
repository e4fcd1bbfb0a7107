/**
 * Configuration loading from environment variables and prompt files.
 */

import { readFile } from 'node:fs/promises';

import { type AppConfig, AppConfigSchema } from './types.js';
import { DEFAULT_MODELS } from '../llm/index.js';
import { loadQdrantConfig } from '../qdrant/index.js';
import { loadLoggerConfig } from '../logging/index.js';
import { type PromptTemplate, PromptTemplateSchema } from '../rag/prompts.js';
import { ConfigurationError, toMessage } from '../errors/index.js';

/**
 * @throws {ConfigurationError} listing every schema violation
 */
export function parseAppConfig(config: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid application configuration: ${issues.join(', ')}`, {
      issues,
    });
  }
  return result.data;
}

// =============================================================================
// Environment Helpers
// =============================================================================

function readers(env: NodeJS.ProcessEnv) {
  const str = (name: string): string | undefined => env[name]?.trim() || undefined;
  const num = (name: string): number | undefined => {
    const value = str(name);
    return value === undefined ? undefined : Number(value);
  };
  const bool = (name: string): boolean | undefined => {
    const value = str(name)?.toLowerCase();
    return value === undefined ? undefined : ['1', 'true', 'yes', 'on'].includes(value);
  };
  return { str, num, bool };
}

function llmProvidersFromEnv(env: NodeJS.ProcessEnv): unknown[] {
  const { str, num } = readers(env);
  const common = { temperature: num('LLM_TEMPERATURE'), maxTokens: num('LLM_MAX_TOKENS') };
  const providers: unknown[] = [];

  const groqKey = str('GROQ_API_KEY');
  if (groqKey) {
    providers.push({
      provider: 'groq',
      apiKey: groqKey,
      model: str('GROQ_MODEL') ?? DEFAULT_MODELS.groq,
      ...common,
    });
  }
  const openaiKey = str('OPENAI_API_KEY');
  if (openaiKey) {
    providers.push({
      provider: 'openai',
      apiKey: openaiKey,
      model: str('OPENAI_MODEL') ?? DEFAULT_MODELS.openai,
      ...common,
    });
  }
  const geminiKey = str('GEMINI_API_KEY');
  if (geminiKey) {
    providers.push({
      provider: 'google_gemini',
      apiKey: geminiKey,
      model: str('GEMINI_MODEL') ?? DEFAULT_MODELS.google_gemini,
      ...common,
    });
  }
  const anthropicKey = str('ANTHROPIC_API_KEY');
  if (anthropicKey) {
    providers.push({
      provider: 'anthropic',
      apiKey: anthropicKey,
      model: str('ANTHROPIC_MODEL') ?? DEFAULT_MODELS.anthropic,
      ...common,
    });
  }
  const ollamaDefault = str('LLM_PROVIDER')?.toLowerCase() === 'ollama';
  if (str('OLLAMA_BASE_URL') || str('OLLAMA_MODEL') || ollamaDefault) {
    providers.push({
      provider: 'ollama',
      baseUrl: str('OLLAMA_BASE_URL'),
      model: str('OLLAMA_MODEL') ?? DEFAULT_MODELS.ollama,
      ...common,
    });
  }
  return providers;
}

function embeddingFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const { str, num } = readers(env);
  const provider = str('EMBEDDING_PROVIDER')?.toLowerCase() ?? 'api';
  const base = { provider, dimensions: num('EMBEDDING_DIMENSIONS'), model: str('EMBEDDING_MODEL') };

  switch (provider) {
    case 'openai_embedding':
      return { ...base, apiKey: str('OPENAI_API_KEY') };
    case 'google_gemini_embedding':
      return { ...base, apiKey: str('GEMINI_API_KEY') };
    case 'ollama_embedding':
      return { ...base, baseUrl: str('OLLAMA_BASE_URL') };
    default:
      return {
        ...base,
        serviceUrl: str('EMBEDDING_SERVICE_URL'),
        apiKey: str('EMBEDDING_API_KEY'),
      };
  }
}

function rerankFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const { str } = readers(env);
  const provider = str('RERANK_PROVIDER')?.toLowerCase() ?? 'none';
  if (provider === 'http') {
    return {
      provider,
      url: str('RERANK_URL'),
      apiKey: str('RERANK_API_KEY'),
      model: str('RERANK_MODEL'),
    };
  }
  return { provider };
}

// =============================================================================
// Loaders
// =============================================================================

/**
 * Build the application configuration from environment variables.
 *
 * LLM providers are configured for every API key present (GROQ_API_KEY,
 * OPENAI_API_KEY, GEMINI_API_KEY, ANTHROPIC_API_KEY) and for Ollama when
 * OLLAMA_BASE_URL or OLLAMA_MODEL is set. LLM_PROVIDER names the default.
 *
 * @throws {ConfigurationError} if a variable is present but invalid, or the
 *   embedding provider lacks its endpoint or key
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { str, num, bool } = readers(env);
  const qdrant = loadQdrantConfig(env);

  return parseAppConfig({
    llm: {
      defaultProvider: str('LLM_PROVIDER')?.toLowerCase(),
      providers: llmProvidersFromEnv(env),
    },
    embedding: embeddingFromEnv(env),
    qdrant,
    rerank: rerankFromEnv(env),
    queryStore: {
      backend: str('QUERY_STORE')?.toLowerCase(),
      databaseUrl: str('DATABASE_URL'),
    },
    pipeline: {
      retrieval: {
        mode: str('RAG_RETRIEVAL_MODE')?.toLowerCase(),
        qaCollection: qdrant.qaCollection,
        docCollection: qdrant.docCollection,
        qaTopK: num('RAG_QA_TOP_K'),
        docTopK: num('RAG_DOC_TOP_K'),
        topK: num('RAG_TOP_K'),
      },
      maxContextChars: num('RAG_MAX_CONTEXT_CHARS'),
      enableKeywords: bool('RAG_ENABLE_KEYWORDS'),
      enableIntentDetection: bool('RAG_ENABLE_INTENT_DETECTION'),
      citationPattern: str('RAG_CITATION_PATTERN'),
    },
    cache: {
      enabled: bool('RAG_CACHE_ENABLED'),
      ttlSeconds: num('RAG_CACHE_TTL_SECONDS'),
    },
    logging: loadLoggerConfig(env),
    promptFile: str('RAG_PROMPT_FILE'),
  });
}

/**
 * Read a JSON file of prompt overrides (`systemPrompt`, `userPrompt`,
 * `paraphrasePrompt`, `keywordPrompt`, `rerankPrompt`, `intentPrompt`). Missing keys keep
 * the built-in prompts.
 *
 * @throws {ConfigurationError} if the file cannot be read or does not validate
 */
export async function loadPromptTemplate(path: string): Promise<PromptTemplate> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read prompt file '${path}': ${toMessage(error)}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Prompt file '${path}' is not valid JSON: ${toMessage(error)}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const result = PromptTemplateSchema.strict().safeParse(json);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.') || 'root'}: ${e.message}`);
    throw new ConfigurationError(`Invalid prompt file '${path}': ${issues.join(', ')}`, { issues });
  }
  return result.data;
}
