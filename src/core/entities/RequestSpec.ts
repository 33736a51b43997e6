import { CefrLevel, MasteryLevel, SessionConfig, UserProgress, WordInput } from './Vocabulary';

export type OperationKind =
  | 'word-analysis'
  | 'translate-analyze'
  | 'flashcard-batch'
  | 'quiz-batch'
  | 'recommendation-batch';

export type FieldType = 'string' | 'string[]' | 'number' | 'boolean' | 'object' | 'object[]';

export interface FieldContract {
  readonly name: string;
  readonly type: FieldType;
}

export interface RequestBounds {
  readonly optionCount: number;
  // exact number of records a batch asks for
  readonly itemCount?: number;
  readonly maxItems?: number;
}

interface BaseRequestSpec<K extends OperationKind, I> {
  readonly kind: K;
  readonly input: Readonly<I>;
  readonly shape: readonly FieldContract[];
  readonly bounds: RequestBounds;
  readonly prompt: string;
  readonly systemPrompt: string;
}

export interface WordAnalysisInput {
  word: string;
  context: string;
  outputLanguage: string;
  // caller's level, or the configured default when the caller gave none
  userLevel: CefrLevel;
  levelProvided: boolean;
}

export interface TranslationInput {
  word: string;
  context: string;
  sourceLanguage: string;
  targetLanguage: string;
  userLevel: CefrLevel;
  masteryLevel: MasteryLevel;
}

export interface FlashcardBatchInput {
  // already trimmed to the session's card count
  words: WordInput[];
  sessionConfig: SessionConfig;
}

export interface QuizBatchInput {
  words: string[];
  testType: string;
  targetLevel: CefrLevel;
  questionCount: number;
}

export interface RecommendationInput {
  progress: UserProgress;
}

export type WordAnalysisSpec = BaseRequestSpec<'word-analysis', WordAnalysisInput>;
export type TranslationSpec = BaseRequestSpec<'translate-analyze', TranslationInput>;
export type FlashcardBatchSpec = BaseRequestSpec<'flashcard-batch', FlashcardBatchInput>;
export type QuizBatchSpec = BaseRequestSpec<'quiz-batch', QuizBatchInput>;
export type RecommendationSpec = BaseRequestSpec<'recommendation-batch', RecommendationInput>;

// A spec before its prompts are written
export type RequestDraft<S extends RequestSpec> = Omit<S, 'prompt' | 'systemPrompt'>;

export type RequestSpec =
  | WordAnalysisSpec
  | TranslationSpec
  | FlashcardBatchSpec
  | QuizBatchSpec
  | RecommendationSpec;

export const WORD_ANALYSIS_SHAPE: readonly FieldContract[] = [
  { name: 'word', type: 'string' },
  { name: 'translation', type: 'string' },
  { name: 'definition', type: 'string' },
  { name: 'difficulty', type: 'string' },
  { name: 'cefr_level', type: 'string' },
  { name: 'context_analysis', type: 'string' },
  { name: 'usage_examples', type: 'string[]' },
  { name: 'synonyms', type: 'string[]' },
  { name: 'etymology', type: 'string' },
];

export const TRANSLATION_SHAPE: readonly FieldContract[] = [
  { name: 'word', type: 'string' },
  { name: 'translation', type: 'string' },
  { name: 'alternativeTranslations', type: 'string[]' },
  { name: 'contextTranslation', type: 'string' },
  { name: 'definition', type: 'string' },
  { name: 'difficulty', type: 'string' },
  { name: 'cefr_level', type: 'string' },
  { name: 'contextAnalysis', type: 'object' },
  { name: 'learningData', type: 'object' },
  { name: 'flashcardSuggestion', type: 'object' },
];

export const FLASHCARD_BATCH_SHAPE: readonly FieldContract[] = [
  { name: 'sessionId', type: 'string' },
  { name: 'cards', type: 'object[]' },
  { name: 'metadata', type: 'object' },
];

export const FLASHCARD_CARD_SHAPE: readonly FieldContract[] = [
  { name: 'id', type: 'string' },
  { name: 'wordId', type: 'string' },
  { name: 'type', type: 'string' },
  { name: 'subType', type: 'string' },
  { name: 'question', type: 'string' },
  { name: 'answer', type: 'string' },
  { name: 'options', type: 'string[]' },
  { name: 'hints', type: 'string[]' },
  { name: 'explanation', type: 'string' },
  { name: 'difficulty', type: 'string' },
  { name: 'timeLimit', type: 'number' },
  { name: 'points', type: 'number' },
  { name: 'questionLanguage', type: 'string' },
  { name: 'answerLanguage', type: 'string' },
  { name: 'audioMetadata', type: 'object' },
];

export const QUIZ_BATCH_SHAPE: readonly FieldContract[] = [
  { name: 'questions', type: 'object[]' },
  { name: 'estimatedTime', type: 'number' },
];

export const RECOMMENDATION_SHAPE: readonly FieldContract[] = [
  { name: 'recommendations', type: 'object[]' },
];
