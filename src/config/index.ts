import dotenv from 'dotenv';
import { Config, PROVIDER_NAMES, ProviderName, configSchema } from './validation';

// Load environment variables based on NODE_ENV
const envFile = process.env.NODE_ENV === 'production' 
  ? '.env.production' 
  : '.env.dev';
dotenv.config({ path: envFile });

export type Env = Record<string, string | undefined>;

interface ProviderPreset {
  baseURL?: string;
  model: string;
  // environment variable holding the provider's own key
  apiKeyEnv?: string;
  // fixed key for local servers that ignore it
  apiKey?: string;
}

export const PROVIDER_PRESETS: Record<ProviderName, ProviderPreset> = {
  openai: { baseURL: 'https://api.openai.com/v1', model: 'gpt-4o-mini', apiKeyEnv: 'OPENAI_API_KEY' },
  groq: { baseURL: 'https://api.groq.com/openai/v1', model: 'llama-3.1-8b-instant', apiKeyEnv: 'GROQ_API_KEY' },
  ollama: { baseURL: 'http://localhost:11434/v1', model: 'phi3:mini', apiKey: 'ollama' },
  disabled: { model: 'none' },
};

function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

// Unknown provider names are passed through so validation reports them
function endpoint(provider: string, env: Env, overrides: { model?: string; baseURL?: string; apiKey?: string }) {
  const preset = isProviderName(provider) ? PROVIDER_PRESETS[provider] : undefined;
  return {
    provider,
    model: overrides.model || preset?.model,
    baseURL: overrides.baseURL || preset?.baseURL,
    apiKey: overrides.apiKey || (preset?.apiKeyEnv ? env[preset.apiKeyEnv] : undefined) || preset?.apiKey,
  };
}

export function loadConfig(env: Env = process.env): Config {
  const fallbackProvider = env.LLM_FALLBACK_PROVIDER;

  return configSchema.parse({
    logging: {
      level: env.LOG_LEVEL || 'info',
      filePath: env.LOG_FILE || undefined,
    },
    nodeEnv: env.NODE_ENV || 'development',
    llm: {
      primary: endpoint(env.LLM_PROVIDER || 'groq', env, {
        model: env.LLM_MODEL,
        baseURL: env.LLM_BASE_URL,
        apiKey: env.LLM_API_KEY,
      }),
      fallback: fallbackProvider
        ? endpoint(fallbackProvider, env, { model: env.LLM_FALLBACK_MODEL, apiKey: env.LLM_FALLBACK_API_KEY })
        : undefined,
      temperature: parseFloat(env.LLM_TEMPERATURE || '0.3'),
      maxTokens: parseInt(env.LLM_MAX_TOKENS || '2048'),
      timeoutMs: parseInt(env.LLM_TIMEOUT_MS || '15000'),
    },
    defaultUserLevel: env.DEFAULT_USER_LEVEL || 'A2',
  });
}

let cached: Config | undefined;

// Process-wide configuration, validated on first use
export function getConfig(): Config {
  cached ??= loadConfig(process.env);
  return cached;
}

export type { Config, EndpointConfig, ProviderName } from './validation';
