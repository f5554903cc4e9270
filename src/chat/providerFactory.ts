import { requireLlmConfig, type Config } from '../config/index.js';
import { ChatCompletionClient, type ChatCompletionClientConfig } from './chatCompletionClient.js';
import type { LLMProvider } from './llmProvider.js';

export type LLMProviderFactory = () => LLMProvider;

/**
 * Builds the chat-completion client on first use and caches it. Throws
 * ConfigError (every call, until configured) when the endpoint or key is missing.
 */
export function createLazyProvider(
  config: Config,
  overrides: Pick<ChatCompletionClientConfig, 'fetch'> = {},
): LLMProviderFactory {
  let provider: LLMProvider | undefined;

  return () => {
    if (!provider) {
      requireLlmConfig(config);
      provider = new ChatCompletionClient({
        apiUrl: config.llmApiUrl,
        apiKey: config.llmApiKey,
        model: config.llmModel,
        authScheme: config.llmAuthScheme,
        maxTokens: config.maxTokens,
        temperature: config.temperature,
        timeoutMs: config.llmTimeoutMs,
        verifySsl: config.verifySsl,
        ...overrides,
      });
    }
    return provider;
  };
}
