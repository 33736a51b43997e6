import { ConsoleLogger } from './adapters/logging/ConsoleLogger';
import { ClientFactory, createProvider } from './adapters/llm/createProvider';
import { createOpenAIClient } from './adapters/llm/OpenAICompatibleProvider';
import { GenerationOrchestrator } from './application/GenerationOrchestrator';
import { getConfig } from './config';
import { Config } from './config/validation';
import { CardTypePolicy } from './core/services/CardTypePolicy';
import { Logger } from './core/services/Logger';
import { ProviderAdapter } from './core/services/ProviderAdapter';

type ServiceOptions = {
  config?: Config;
  logger?: Logger;
  // replaces the configured provider entirely
  provider?: ProviderAdapter;
  clientFactory?: ClientFactory;
  policy?: CardTypePolicy;
};

// Wires the orchestrator from configuration. The caller owns the returned service for the process lifetime.
export function createGenerationService(options: ServiceOptions = {}): GenerationOrchestrator {
  const config = options.config ?? getConfig();
  const logger = options.logger ?? new ConsoleLogger(config.logging.level, config.logging.filePath);
  const provider = options.provider ?? createProvider(config.llm, logger, options.clientFactory ?? createOpenAIClient);

  logger.info(`Environment: ${config.nodeEnv}`);
  logger.info(`LLM provider: ${provider.name} (model: ${config.llm.primary.model})`);

  return new GenerationOrchestrator(provider, logger, {
    timeoutMs: config.llm.timeoutMs,
    defaultUserLevel: config.defaultUserLevel,
    policy: options.policy,
  });
}

export { GenerationOrchestrator } from './application/GenerationOrchestrator';
export type { GenerationOptions, PipelineStage } from './application/GenerationPipeline';
export type {
  AnalyzeWordRequest,
  FlashcardRequest,
  QuizRequest,
  SessionConfigRequest,
  TranslateRequest,
  UserProgressRequest,
  WordInputRequest,
} from './application/requests';
export { ConsoleLogger } from './adapters/logging/ConsoleLogger';
export { createProvider } from './adapters/llm/createProvider';
export { OpenAICompatibleProvider } from './adapters/llm/OpenAICompatibleProvider';
export { FailoverProvider } from './adapters/llm/FailoverProvider';
export { DisabledProvider } from './adapters/llm/DisabledProvider';
export { getConfig, loadConfig, PROVIDER_PRESETS } from './config';
export type { Config } from './config/validation';
export { DEFAULT_CARD_TYPE_POLICY } from './core/services/CardTypePolicy';
export type { CardTypePolicy } from './core/services/CardTypePolicy';
export { ExtractionError, InvalidRequestError, MalformedBatchError, ProviderError } from './core/errors';
export type { ProviderErrorKind } from './core/errors';
export type { Logger, LogLevel } from './core/services/Logger';
export type { ProviderAdapter, CompletionOptions } from './core/services/ProviderAdapter';
export type { FlashcardCard, FlashcardSession, CardType, Difficulty } from './core/entities/Flashcard';
export type { Quiz, QuizQuestion } from './core/entities/Quiz';
export type { Recommendation, RecommendationSet } from './core/entities/Recommendation';
export type { WordAnalysis, WordTranslation } from './core/entities/WordAnalysis';
export type { Generated, GenerationOutcome } from './core/entities/GenerationResult';
export type { CefrLevel, MasteryLevel, SessionConfig, UserProgress, WordInput } from './core/entities/Vocabulary';
