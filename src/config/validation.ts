import { z } from 'zod';
import { CEFR_LEVELS } from '../core/entities/Vocabulary';

export const PROVIDER_NAMES = ['openai', 'groq', 'ollama', 'disabled'] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

// Providers reached over the network with a bearer key
const HOSTED_PROVIDERS: readonly ProviderName[] = ['openai', 'groq'];

export const endpointSchema = z.object({
  provider: z.enum(PROVIDER_NAMES),
  model: z.string().min(1),
  baseURL: z.string().url().optional(),
  apiKey: z.string().min(1).optional(),
});

export const configSchema = z
  .object({
    logging: z.object({
      level: z.enum(['debug', 'info', 'warn', 'error']),
      filePath: z.string().optional(),
    }),
    nodeEnv: z.string(),
    llm: z.object({
      primary: endpointSchema,
      fallback: endpointSchema.optional(),
      temperature: z.number().min(0).max(2).default(0.3),
      maxTokens: z.number().int().min(1).default(2048),
      timeoutMs: z.number().int().min(1000).max(60000).default(15000),
    }),
    defaultUserLevel: z.enum(CEFR_LEVELS).default('A2'),
  })
  .superRefine((value, ctx) => {
    const endpoints = [
      ['primary', value.llm.primary],
      ['fallback', value.llm.fallback],
    ] as const;
    for (const [slot, endpoint] of endpoints) {
      if (endpoint && HOSTED_PROVIDERS.includes(endpoint.provider) && !endpoint.apiKey) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['llm', slot, 'apiKey'],
          message: `An API key is required for the ${endpoint.provider} provider`,
        });
      }
    }
  });

export type EndpointConfig = z.infer<typeof endpointSchema>;
export type Config = z.infer<typeof configSchema>;
