import type { AgentConfig } from '../config/config.js';
import { DEFAULT_BASE_URLS, type HttpProviderId } from '../config/defaults.js';
import { ManifoldError } from '../errors.js';
import type { LLMProvider, ProviderOptions } from './types.js';
import { AnthropicProvider } from './anthropic.js';
import { OpenAIProvider } from './openai.js';

export * from './types.js';
export { AnthropicProvider } from './anthropic.js';
export { OpenAIProvider, type OpenAIProviderOptions } from './openai.js';

/** Provider clients keyed by the identifier used in configuration */
export const PROVIDER_CONSTRUCTORS: Record<HttpProviderId, (options: ProviderOptions) => LLMProvider> = {
  // OpenRouter speaks the Chat Completions protocol
  openrouter: (options) =>
    new OpenAIProvider({
      ...options,
      name: 'openrouter',
      baseUrl: options.baseUrl ?? DEFAULT_BASE_URLS.openrouter,
    }),
  openai: (options) => new OpenAIProvider(options),
  anthropic: (options) => new AnthropicProvider(options),
};

/**
 * @throws ManifoldError for `claude_code`, which has no HTTP client
 */
export function createProvider(config: AgentConfig): LLMProvider {
  const provider = config.provider;
  if (provider === 'claude_code') {
    throw new ManifoldError(`Provider '${provider}' runs through its CLI and has no HTTP client`);
  }
  return PROVIDER_CONSTRUCTORS[provider]({
    apiKey: config.apiKey ?? '',
    model: config.model,
    timeout: config.timeoutSeconds * 1000,
    ...(config.baseUrl && { baseUrl: config.baseUrl }),
  });
}
