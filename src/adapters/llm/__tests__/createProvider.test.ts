import { Config } from '../../../config/validation';
import { createMockLogger } from '../../../test/mocks';
import { DisabledProvider } from '../DisabledProvider';
import { FailoverProvider } from '../FailoverProvider';
import { ChatCompletionClient, OpenAICompatibleProvider } from '../OpenAICompatibleProvider';
import { createProvider } from '../createProvider';

const GROQ_URL = 'https://api.groq.com/openai/v1';

function llmConfig(overrides: Partial<Config['llm']> = {}): Config['llm'] {
  return {
    primary: { provider: 'groq', model: 'llama-3.1-8b-instant', baseURL: GROQ_URL, apiKey: 'test-secret' },
    temperature: 0.3,
    maxTokens: 2048,
    timeoutMs: 15000,
    ...overrides,
  };
}

describe('createProvider', () => {
  let clientFactory: jest.Mock<ChatCompletionClient, [string, string]>;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    clientFactory = jest.fn<ChatCompletionClient, [string, string]>(() => ({
      chat: { completions: { create: jest.fn() } },
    }));
    logger = createMockLogger();
  });

  it('should build a single adapter for the primary endpoint', () => {
    const provider = createProvider(llmConfig(), logger, clientFactory);

    expect(provider).toBeInstanceOf(OpenAICompatibleProvider);
    expect(provider.name).toBe('groq');
    expect(clientFactory).toHaveBeenCalledWith('test-secret', GROQ_URL);
  });

  it('should chain a configured fallback endpoint', () => {
    const provider = createProvider(
      llmConfig({
        fallback: { provider: 'ollama', model: 'phi3:mini', baseURL: 'http://localhost:11434/v1', apiKey: 'ollama' },
      }),
      logger,
      clientFactory
    );

    expect(provider).toBeInstanceOf(FailoverProvider);
    expect(provider.name).toBe('groq -> ollama');
    expect(logger.info).toHaveBeenCalledWith('LLM failover enabled: groq -> ollama');
  });

  it('should not build a client when the provider is disabled', () => {
    const provider = createProvider(llmConfig({ primary: { provider: 'disabled', model: 'none' } }), logger, clientFactory);

    expect(provider).toBeInstanceOf(DisabledProvider);
    expect(clientFactory).not.toHaveBeenCalled();
  });

  it('should require a base URL for network providers', () => {
    expect(() =>
      createProvider(llmConfig({ primary: { provider: 'openai', model: 'gpt-4o-mini', apiKey: 'test-secret' } }), logger, clientFactory)
    ).toThrow('No base URL configured for the openai provider');
  });
});
