import { z } from 'zod';
import { CARD_TYPES } from '../core/entities/Flashcard';
import { CEFR_LEVELS, MASTERY_LEVELS, SESSION_DIFFICULTIES } from '../core/entities/Vocabulary';
import { InvalidRequestError } from '../core/errors';

export const MAX_BATCH_SIZE = 50;

const text = z.string().trim().min(1, 'must not be empty');
const language = z.string().trim().min(1, 'must not be empty');

export const wordInputSchema = z.object({
  text,
  context: z.string().optional(),
  translation: z.string().optional(),
  definition: z.string().optional(),
  masteryLevel: z.enum(MASTERY_LEVELS).default('NEW'),
});

export const sessionConfigSchema = z.object({
  types: z.array(z.enum(CARD_TYPES)).default(() => [...CARD_TYPES]),
  difficulty: z.enum(SESSION_DIFFICULTIES).default('adaptive'),
  count: z.number().int().min(1).max(MAX_BATCH_SIZE).default(10),
  // the configured default level applies when absent
  userLevel: z.enum(CEFR_LEVELS).optional(),
  isPremium: z.boolean().default(false),
  sourceLanguage: language.default('en'),
  targetLanguage: language.default('fr'),
  learningDirection: z.string().default('en->fr'),
});

export const analyzeWordRequestSchema = z.object({
  word: text,
  context: z.string().default(''),
  outputLanguage: language.default('en'),
  userLevel: z.enum(CEFR_LEVELS).optional(),
});

export const translateRequestSchema = z.object({
  word: text,
  context: z.string().default(''),
  sourceLanguage: language.default('en'),
  targetLanguage: language.default('fr'),
  userLevel: z.enum(CEFR_LEVELS).optional(),
  masteryLevel: z.enum(MASTERY_LEVELS).default('NEW'),
});

export const flashcardRequestSchema = z.object({
  words: z.array(wordInputSchema).min(1, 'at least one word is required'),
  sessionConfig: sessionConfigSchema.default({}),
});

export const quizRequestSchema = z.object({
  words: z.array(text).min(1, 'at least one word is required'),
  testType: z.string().trim().min(1).default('vocabulary_review'),
  targetLevel: z.enum(CEFR_LEVELS).optional(),
  questionCount: z.number().int().min(1).max(MAX_BATCH_SIZE).default(10),
});

export const userProgressSchema = z
  .object({
    totalWords: z.number().int().min(0),
    masteredWords: z.number().int().min(0),
    weakAreas: z.array(z.string().trim().min(1)).default([]),
    averageAccuracy: z.number().min(0).max(1),
  })
  .refine((progress) => progress.masteredWords <= progress.totalWords, {
    message: 'cannot exceed totalWords',
    path: ['masteredWords'],
  });

export type WordInputRequest = z.input<typeof wordInputSchema>;
export type SessionConfigRequest = z.input<typeof sessionConfigSchema>;
export type AnalyzeWordRequest = z.input<typeof analyzeWordRequestSchema>;
export type TranslateRequest = z.input<typeof translateRequestSchema>;
export type FlashcardRequest = z.input<typeof flashcardRequestSchema>;
export type QuizRequest = z.input<typeof quizRequestSchema>;
export type UserProgressRequest = z.input<typeof userProgressSchema>;

// Validates caller input and applies defaults; contract violations become InvalidRequestError.
export function parseRequest<S extends z.ZodTypeAny>(schema: S, value: unknown, operation: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidRequestError(
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      operation
    );
  }
  return parsed.data;
}
