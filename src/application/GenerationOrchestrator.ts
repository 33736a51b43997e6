import { FlashcardSession } from '../core/entities/Flashcard';
import { Generated } from '../core/entities/GenerationResult';
import { Quiz } from '../core/entities/Quiz';
import { RecommendationSet } from '../core/entities/Recommendation';
import { CefrLevel, MasteryLevel } from '../core/entities/Vocabulary';
import { WordAnalysis, WordTranslation } from '../core/entities/WordAnalysis';
import { CardTypePolicy } from '../core/services/CardTypePolicy';
import { FallbackSynthesizer } from '../core/services/FallbackSynthesizer';
import { Logger } from '../core/services/Logger';
import { ProviderAdapter } from '../core/services/ProviderAdapter';
import { JsonResponseExtractor } from '../core/services/ResponseExtractor';
import { SchemaNormalizer } from '../core/services/SchemaNormalizer';
import { AnalyzeWordUseCase } from './AnalyzeWordUseCase';
import { GenerateFlashcardsUseCase } from './GenerateFlashcardsUseCase';
import { GenerateQuizUseCase } from './GenerateQuizUseCase';
import { GenerateRecommendationsUseCase } from './GenerateRecommendationsUseCase';
import { DEFAULT_PROVIDER_TIMEOUT_MS, GenerationOptions, GenerationPipeline } from './GenerationPipeline';
import { TranslateWordUseCase } from './TranslateWordUseCase';
import { SessionConfigRequest, UserProgressRequest, WordInputRequest } from './requests';

type Options = {
  timeoutMs?: number;
  defaultUserLevel?: CefrLevel;
  policy?: CardTypePolicy;
  // option shuffling in synthesized results
  random?: () => number;
};

/**
 * The public generation operations. Holds no per-call state; concurrent calls
 * share only the provider and read-only tables. Every operation resolves to a
 * complete result and rejects only with InvalidRequestError.
 */
export class GenerationOrchestrator {
  private analyzeWordUseCase: AnalyzeWordUseCase;
  private translateWordUseCase: TranslateWordUseCase;
  private flashcardsUseCase: GenerateFlashcardsUseCase;
  private quizUseCase: GenerateQuizUseCase;
  private recommendationsUseCase: GenerateRecommendationsUseCase;

  constructor(provider: ProviderAdapter, logger: Logger, options: Options = {}) {
    const pipeline = new GenerationPipeline(
      provider,
      new JsonResponseExtractor(),
      logger.child('pipeline'),
      options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS
    );
    const normalizer = new SchemaNormalizer({ policy: options.policy });
    const synthesizer = new FallbackSynthesizer({ policy: options.policy, random: options.random });
    const defaultUserLevel = options.defaultUserLevel ?? 'A2';

    this.analyzeWordUseCase = new AnalyzeWordUseCase(pipeline, normalizer, synthesizer, logger, defaultUserLevel);
    this.translateWordUseCase = new TranslateWordUseCase(pipeline, normalizer, synthesizer, logger, defaultUserLevel);
    this.flashcardsUseCase = new GenerateFlashcardsUseCase(pipeline, normalizer, synthesizer, logger, defaultUserLevel);
    this.quizUseCase = new GenerateQuizUseCase(pipeline, normalizer, synthesizer, logger, defaultUserLevel);
    this.recommendationsUseCase = new GenerateRecommendationsUseCase(pipeline, normalizer, synthesizer, logger);
  }

  analyzeWord(
    word: string,
    context: string,
    outputLanguage: string,
    userLevel?: CefrLevel,
    options?: GenerationOptions
  ): Promise<Generated<WordAnalysis>> {
    return this.analyzeWordUseCase.execute({ word, context, outputLanguage, userLevel }, options);
  }

  translateAndAnalyze(
    word: string,
    context: string,
    sourceLanguage: string,
    targetLanguage: string,
    userLevel?: CefrLevel,
    masteryLevel?: MasteryLevel,
    options?: GenerationOptions
  ): Promise<Generated<WordTranslation>> {
    return this.translateWordUseCase.execute(
      { word, context, sourceLanguage, targetLanguage, userLevel, masteryLevel },
      options
    );
  }

  generateFlashcards(
    words: WordInputRequest[],
    sessionConfig: SessionConfigRequest = {},
    options?: GenerationOptions
  ): Promise<Generated<FlashcardSession>> {
    return this.flashcardsUseCase.execute({ words, sessionConfig }, options);
  }

  generateQuiz(
    words: string[],
    testType?: string,
    targetLevel?: CefrLevel,
    questionCount?: number,
    options?: GenerationOptions
  ): Promise<Generated<Quiz>> {
    return this.quizUseCase.execute({ words, testType, targetLevel, questionCount }, options);
  }

  generateRecommendations(
    userProgress: UserProgressRequest,
    options?: GenerationOptions
  ): Promise<Generated<RecommendationSet>> {
    return this.recommendationsUseCase.execute(userProgress, options);
  }
}
