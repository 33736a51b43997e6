import { CardType } from './Flashcard';

export const CEFR_LEVELS = ['A1', 'A2', 'B1', 'B2', 'C1', 'C2'] as const;
export type CefrLevel = (typeof CEFR_LEVELS)[number];

export const MASTERY_LEVELS = ['NEW', 'LEARNING', 'FAMILIAR', 'MASTERED'] as const;
export type MasteryLevel = (typeof MASTERY_LEVELS)[number];

export const SESSION_DIFFICULTIES = ['adaptive', 'easy', 'medium', 'hard'] as const;
export type SessionDifficulty = (typeof SESSION_DIFFICULTIES)[number];

export interface WordInput {
  text: string;
  context?: string;
  translation?: string;
  definition?: string;
  masteryLevel: MasteryLevel;
}

export interface SessionConfig {
  types: CardType[];
  difficulty: SessionDifficulty;
  count: number;
  userLevel: CefrLevel;
  isPremium: boolean;
  sourceLanguage: string; // language being learned
  targetLanguage: string; // learner's native language
  learningDirection: string; // e.g. "en->fr"
}

export interface UserProgress {
  totalWords: number;
  masteredWords: number;
  weakAreas: string[];
  averageAccuracy: number; // 0..1
}

export function isCefrLevel(value: string): value is CefrLevel {
  return CEFR_LEVELS.some((level) => level === value);
}

export interface LearningDirection {
  from: string;
  to: string;
  // true when the learner sees the studied word and answers in their own language
  forward: boolean;
}

export function parseLearningDirection(config: Pick<SessionConfig, 'learningDirection' | 'sourceLanguage' | 'targetLanguage'>): LearningDirection {
  const [from, to] = config.learningDirection.split('->').map((part) => part.trim());
  if (!from || !to) {
    return { from: config.sourceLanguage, to: config.targetLanguage, forward: true };
  }
  return { from, to, forward: from === config.sourceLanguage };
}
