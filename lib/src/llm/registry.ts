/**
 * LLM Provider Registry
 *
 * Holds the adapters that initialized successfully and resolves per-query
 * provider overrides against them.
 */

import { z } from 'zod';

import type { LLMAdapter } from './adapter.js';
import { type LLMProvider, LLMProviderConfigSchema, LLMProviderSchema } from './types.js';
import { createLLMAdapter, type CreateLLMAdapterOptions } from './factory.js';
import { ConfigurationError, toMessage } from '../errors/index.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

export const LLMSettingsSchema = z.object({
  /** Provider used when a query names none, or names an unavailable one */
  defaultProvider: LLMProviderSchema.default('groq'),
  /** Configured providers; a provider may appear once */
  providers: z.array(LLMProviderConfigSchema).default([]),
});

export type LLMSettings = z.infer<typeof LLMSettingsSchema>;

export interface ResolvedLLMProvider {
  adapter: LLMAdapter;
  provider: LLMProvider;
  /** The requested override was unknown or unavailable */
  fellBack: boolean;
}

export class LLMProviderRegistry {
  private readonly adapters = new Map<LLMProvider, LLMAdapter>();
  private readonly logger: Logger;

  constructor(
    adapters: Iterable<LLMAdapter>,
    readonly defaultProvider: LLMProvider,
    logger?: Logger
  ) {
    for (const adapter of adapters) {
      this.adapters.set(adapter.provider, adapter);
    }
    this.logger = logger ?? getGlobalLogger().child('LLMProviderRegistry');
  }

  listProviders(): LLMProvider[] {
    return Array.from(this.adapters.keys());
  }

  get(provider: LLMProvider): LLMAdapter | undefined {
    return this.adapters.get(provider);
  }

  /**
   * Whether the default provider is available
   */
  isReady(): boolean {
    return this.adapters.has(this.defaultProvider);
  }

  /**
   * Resolve the provider for one query. An unknown or unconfigured override
   * falls back to the default with a warning.
   *
   * @throws {ConfigurationError} if the default provider is unavailable
   */
  resolve(requested?: string | null): ResolvedLLMProvider {
    if (requested) {
      const parsed = LLMProviderSchema.safeParse(requested.trim().toLowerCase());
      const adapter = parsed.success ? this.adapters.get(parsed.data) : undefined;
      if (parsed.success && adapter) {
        return { adapter, provider: parsed.data, fellBack: false };
      }
      this.logger.warn('Requested LLM provider is not configured, using default', {
        requested,
        defaultProvider: this.defaultProvider,
      });
    }

    const adapter = this.adapters.get(this.defaultProvider);
    if (!adapter) {
      throw new ConfigurationError(
        `Default LLM provider '${this.defaultProvider}' is not configured`,
        { metadata: { available: this.listProviders() } }
      );
    }
    return { adapter, provider: this.defaultProvider, fellBack: Boolean(requested) };
  }
}

/**
 * Build a registry from settings. Providers whose adapter cannot be created
 * are logged and left out.
 */
export function createLLMProviderRegistry(
  settings: LLMSettings,
  options: CreateLLMAdapterOptions = {}
): LLMProviderRegistry {
  const logger = (options.logger ?? getGlobalLogger()).child('LLMProviderRegistry');
  const adapters: LLMAdapter[] = [];

  for (const config of settings.providers) {
    try {
      adapters.push(createLLMAdapter(config, options));
    } catch (error) {
      logger.error('Failed to initialize LLM provider', error, {
        provider: config.provider,
        reason: toMessage(error),
      });
    }
  }

  const registry = new LLMProviderRegistry(adapters, settings.defaultProvider, logger);
  if (!registry.isReady()) {
    logger.warn('Default LLM provider is unavailable', {
      defaultProvider: settings.defaultProvider,
      available: registry.listProviders(),
    });
  }
  return registry;
}
