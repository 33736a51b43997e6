// Prompt templates for every generation operation

import { CARD_TYPES } from '../core/entities/Flashcard';
import { QUIZ_QUESTION_TYPES } from '../core/entities/Quiz';
import { PRIORITIES, RECOMMENDATION_TYPES } from '../core/entities/Recommendation';
import {
  FLASHCARD_CARD_SHAPE,
  FieldContract,
  FlashcardBatchSpec,
  QuizBatchSpec,
  RecommendationSpec,
  RequestDraft,
  TranslationSpec,
  WordAnalysisSpec,
} from '../core/entities/RequestSpec';
import { CEFR_LEVELS, parseLearningDirection } from '../core/entities/Vocabulary';
import { allowedCardTypes } from '../core/services/CardTypePolicy';
import { MAX_PROVIDER_RECOMMENDATIONS } from '../core/services/SchemaNormalizer';

export interface PromptPair {
  systemPrompt: string;
  prompt: string;
}

const JSON_ONLY = 'Return only one JSON object: no markdown, no code fences, no commentary.';

const SAMPLE_VALUES: Record<FieldContract['type'], string> = {
  string: '"..."',
  'string[]': '["..."]',
  number: '0',
  boolean: 'false',
  object: '{...}',
  'object[]': '[{...}]',
};

// `{"word": "...", "synonyms": ["..."]}` style skeleton of a field contract
export function describeShape(shape: readonly FieldContract[]): string {
  return `{${shape.map((field) => `"${field.name}": ${SAMPLE_VALUES[field.type]}`).join(', ')}}`;
}

export function buildWordAnalysisPrompts(spec: RequestDraft<WordAnalysisSpec>): PromptPair {
  const { input } = spec;
  const audience = input.levelProvided ? `${input.userLevel} learners` : 'language learners';
  return {
    systemPrompt: [
      `You are a language learning assistant. Analyze words for ${audience}.`,
      `Write every explanation in ${input.outputLanguage}.`,
      JSON_ONLY,
    ].join(' '),
    prompt: [
      `Word: "${input.word}".`,
      input.context ? `Context: "${input.context}".` : 'No context sentence was given.',
      `Return an object with exactly these fields: ${describeShape(spec.shape)}.`,
      `difficulty and cefr_level must each be one of ${CEFR_LEVELS.join(', ')}.`,
      'usage_examples: two or three short sentences using the word.',
    ].join(' '),
  };
}

export function buildTranslationPrompts(spec: RequestDraft<TranslationSpec>): PromptPair {
  const { input } = spec;
  return {
    systemPrompt: [
      `You translate from ${input.sourceLanguage} to ${input.targetLanguage} for ${input.userLevel} learners.`,
      JSON_ONLY,
    ].join(' '),
    prompt: [
      `Word: "${input.word}".`,
      input.context ? `Context: "${input.context}".` : 'No context sentence was given.',
      `The learner's mastery of this word: ${input.masteryLevel}.`,
      `Return an object with exactly these fields: ${describeShape(spec.shape)}.`,
      'contextAnalysis has originalSentence, translatedSentence, grammarNotes and usage.',
      'learningData has synonyms, relatedWords and commonPhrases (string arrays).',
      `flashcardSuggestion has question, answer, options (${spec.bounds.optionCount} strings including the answer), hint and explanation.`,
    ].join(' '),
  };
}

export function buildFlashcardPrompts(spec: RequestDraft<FlashcardBatchSpec>): PromptPair {
  const { sessionConfig: session, words } = spec.input;
  const direction = parseLearningDirection(session);
  const allowedTypes = allowedCardTypes(session.types, session.isPremium);
  const wordList = words.map((word) => ({
    text: word.text,
    translation: word.translation ?? null,
    context: word.context ?? null,
    masteryLevel: word.masteryLevel,
  }));

  return {
    systemPrompt: [
      'You create flashcards for language learners.',
      `Questions are written in ${direction.from} and answers in ${direction.to}.`,
      JSON_ONLY,
    ].join(' '),
    prompt: [
      `Words: ${JSON.stringify(wordList)}.`,
      `Create exactly ${words.length} cards, one per word, in the order given, with ids card_1 to card_${words.length}.`,
      `Learner level: ${session.userLevel}. Card types allowed: ${(allowedTypes.length ? allowedTypes : ['classic']).join(', ')} (known types: ${CARD_TYPES.join(', ')}).`,
      'Pick harder card types for words with a higher masteryLevel.',
      `Return ${describeShape(spec.shape)} where each card is ${describeShape(FLASHCARD_CARD_SHAPE)}.`,
      `options holds exactly ${spec.bounds.optionCount} different strings and includes the answer.`,
      'difficulty is easy, medium or hard; timeLimit is in milliseconds.',
    ].join(' '),
  };
}

export function buildQuizPrompts(spec: RequestDraft<QuizBatchSpec>): PromptPair {
  const { input } = spec;
  return {
    systemPrompt: ['You write vocabulary quizzes for language learners.', JSON_ONLY].join(' '),
    prompt: [
      `Words: ${JSON.stringify(input.words)}.`,
      `Test type: ${input.testType}. Target level: ${input.targetLevel}.`,
      `Write ${input.questionCount} questions with ids q1 to q${input.questionCount}.`,
      `Return ${describeShape(spec.shape)} where each question has id, type (${QUIZ_QUESTION_TYPES.join('|')}), question, answer, options (${spec.bounds.optionCount} strings including the answer), difficulty (a CEFR level) and explanation.`,
    ].join(' '),
  };
}

export function buildRecommendationPrompts(spec: RequestDraft<RecommendationSpec>): PromptPair {
  const { input } = spec;
  return {
    systemPrompt: ['You are a language learning coach giving short, concrete study advice.', JSON_ONLY].join(' '),
    prompt: [
      `Learner progress: ${JSON.stringify(input.progress)}.`,
      'averageAccuracy is between 0 and 1.',
      `Return ${describeShape(spec.shape)} with at most ${spec.bounds.maxItems ?? MAX_PROVIDER_RECOMMENDATIONS} entries.`,
      `Each entry has type (${RECOMMENDATION_TYPES.join('|')}), content, priority (${PRIORITIES.join('|')}) and reason.`,
    ].join(' '),
  };
}
