/**
 * Transport factory.
 * Resolves a ProviderConfig into a concrete CompletionTransport.
 * Handles API key resolution from environment variables.
 */
import type { ProviderConfig } from '@/config/types.js';
import { ProviderError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import { createOpenAISession } from './openai.js';
import type { CompletionTransport } from './types.js';

const logger = createLogger({ name: 'provider-factory' });

/**
 * Resolve an API key from an environment variable name.
 * Never logs or returns the actual key value — only whether it was found.
 */
function resolveApiKey(envVar: string, provider: string): string {
  const key = process.env[envVar];
  if (!key) {
    throw new ProviderError({
      provider,
      failureKind: 'protocol',
      message: `Environment variable "${envVar}" is not set or empty`,
    });
  }
  return key;
}

/**
 * Create a CompletionTransport from a configuration object.
 * API keys are resolved from environment variables at construction time — the raw
 * key is never stored in config files or passed through the agent loop.
 */
export function createTransport(config: ProviderConfig): CompletionTransport {
  logger.info('Creating completion transport', {
    component: 'provider-factory',
    provider: config.provider,
    model: config.model,
  });

  const common = {
    model: config.model,
    timeoutMs: config.timeoutMs,
    includeUsage: config.includeUsage,
  };

  switch (config.provider) {
    case 'openai':
      return createOpenAISession({
        ...common,
        apiKey: resolveApiKey(config.apiKeyEnvVar, 'openai'),
        baseUrl: config.baseUrl,
        providerLabel: 'openai',
      });

    case 'openai-compatible': {
      if (!config.baseUrl) {
        throw new ProviderError({
          provider: 'openai-compatible',
          failureKind: 'protocol',
          message: 'An OpenAI-compatible provider needs a baseUrl',
        });
      }
      return createOpenAISession({
        ...common,
        apiKey: resolveApiKey(config.apiKeyEnvVar, 'openai-compatible'),
        baseUrl: config.baseUrl,
        providerLabel: 'compatible',
      });
    }

    case 'ollama':
      // Ollama doesn't need an API key, but uses OpenAI-compatible API
      return createOpenAISession({
        ...common,
        apiKey: 'ollama',
        baseUrl: config.baseUrl ?? 'http://localhost:11434/v1',
        providerLabel: 'ollama',
      });

    default: {
      // Exhaustiveness check — TypeScript narrows to `never`
      const _exhaustive: never = config.provider;
      throw new ProviderError({
        provider: String(_exhaustive),
        failureKind: 'protocol',
        message: `Unknown provider: ${String(_exhaustive)}`,
      });
    }
  }
}
