import { Config, EndpointConfig } from '../../config/validation';
import { Logger } from '../../core/services/Logger';
import { ProviderAdapter } from '../../core/services/ProviderAdapter';
import { DisabledProvider } from './DisabledProvider';
import { FailoverProvider } from './FailoverProvider';
import { ChatCompletionClient, OpenAICompatibleProvider, createOpenAIClient } from './OpenAICompatibleProvider';

export type ClientFactory = (apiKey: string, baseURL: string) => ChatCompletionClient;

function buildAdapter(
  endpoint: EndpointConfig,
  llm: Config['llm'],
  logger: Logger,
  clientFactory: ClientFactory
): ProviderAdapter {
  if (endpoint.provider === 'disabled') return new DisabledProvider();
  if (!endpoint.baseURL) {
    throw new Error(`No base URL configured for the ${endpoint.provider} provider`);
  }
  return new OpenAICompatibleProvider(
    endpoint.provider,
    clientFactory(endpoint.apiKey ?? '', endpoint.baseURL),
    endpoint.model,
    logger.child(endpoint.provider),
    { temperature: llm.temperature, maxTokens: llm.maxTokens, timeoutMs: llm.timeoutMs }
  );
}

// One adapter per configured endpoint; a configured fallback endpoint adds failover.
export function createProvider(
  llm: Config['llm'],
  logger: Logger,
  clientFactory: ClientFactory = createOpenAIClient
): ProviderAdapter {
  const primary = buildAdapter(llm.primary, llm, logger, clientFactory);
  if (!llm.fallback) return primary;

  const fallback = buildAdapter(llm.fallback, llm, logger, clientFactory);
  logger.info(`LLM failover enabled: ${primary.name} -> ${fallback.name}`);
  return new FailoverProvider([primary, fallback], logger.child('failover'));
}
