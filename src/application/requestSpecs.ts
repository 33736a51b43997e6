import { OPTION_COUNT } from '../core/entities/Flashcard';
import {
  FLASHCARD_BATCH_SHAPE,
  FlashcardBatchInput,
  FlashcardBatchSpec,
  QUIZ_BATCH_SHAPE,
  QuizBatchInput,
  QuizBatchSpec,
  RECOMMENDATION_SHAPE,
  RecommendationInput,
  RequestDraft,
  RecommendationSpec,
  TRANSLATION_SHAPE,
  TranslationInput,
  TranslationSpec,
  WORD_ANALYSIS_SHAPE,
  WordAnalysisInput,
  WordAnalysisSpec,
} from '../core/entities/RequestSpec';
import { MAX_PROVIDER_RECOMMENDATIONS } from '../core/services/SchemaNormalizer';
import {
  buildFlashcardPrompts,
  buildQuizPrompts,
  buildRecommendationPrompts,
  buildTranslationPrompts,
  buildWordAnalysisPrompts,
} from './prompts';

// BUILD_PROMPT: pure, local, cannot fail

export function buildWordAnalysisSpec(input: WordAnalysisInput): WordAnalysisSpec {
  const draft: RequestDraft<WordAnalysisSpec> = {
    kind: 'word-analysis',
    input,
    shape: WORD_ANALYSIS_SHAPE,
    bounds: { optionCount: OPTION_COUNT },
  };
  return { ...draft, ...buildWordAnalysisPrompts(draft) };
}

export function buildTranslationSpec(input: TranslationInput): TranslationSpec {
  const draft: RequestDraft<TranslationSpec> = {
    kind: 'translate-analyze',
    input,
    shape: TRANSLATION_SHAPE,
    bounds: { optionCount: OPTION_COUNT },
  };
  return { ...draft, ...buildTranslationPrompts(draft) };
}

export function buildFlashcardBatchSpec(input: FlashcardBatchInput): FlashcardBatchSpec {
  const draft: RequestDraft<FlashcardBatchSpec> = {
    kind: 'flashcard-batch',
    input,
    shape: FLASHCARD_BATCH_SHAPE,
    bounds: { optionCount: OPTION_COUNT, itemCount: input.words.length },
  };
  return { ...draft, ...buildFlashcardPrompts(draft) };
}

export function buildQuizBatchSpec(input: QuizBatchInput): QuizBatchSpec {
  const draft: RequestDraft<QuizBatchSpec> = {
    kind: 'quiz-batch',
    input,
    shape: QUIZ_BATCH_SHAPE,
    bounds: { optionCount: OPTION_COUNT, itemCount: input.questionCount },
  };
  return { ...draft, ...buildQuizPrompts(draft) };
}

export function buildRecommendationSpec(input: RecommendationInput): RecommendationSpec {
  const draft: RequestDraft<RecommendationSpec> = {
    kind: 'recommendation-batch',
    input,
    shape: RECOMMENDATION_SHAPE,
    bounds: { optionCount: OPTION_COUNT, maxItems: MAX_PROVIDER_RECOMMENDATIONS },
  };
  return { ...draft, ...buildRecommendationPrompts(draft) };
}
