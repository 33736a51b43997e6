import { randomUUID } from 'crypto';

export const CARD_TYPES = ['classic', 'contextual', 'audio', 'speed'] as const;
export type CardType = (typeof CARD_TYPES)[number];

// Card types only available to premium sessions
export const PREMIUM_CARD_TYPES: readonly CardType[] = ['audio', 'speed'];

export const DIFFICULTIES = ['easy', 'medium', 'hard'] as const;
export type Difficulty = (typeof DIFFICULTIES)[number];

// Every card and quiz question carries exactly this many options
export const OPTION_COUNT = 4;

export interface AudioMetadata {
  accent?: string;
  speed?: string;
  gender?: string;
}

export interface FlashcardCard {
  id: string;
  wordId: string;
  type: CardType;
  subType: string;
  question: string;
  answer: string;
  options: string[];
  hints: string[];
  explanation: string;
  difficulty: Difficulty;
  timeLimit: number; // milliseconds
  points: number;
  questionLanguage: string;
  answerLanguage: string;

  // contextual cards
  context?: string;
  originalContext?: string;
  contextExplanation?: string;
  contextTranslation?: string;

  // audio cards
  audioUrl?: string;
  phonetic?: string;
  audioMetadata: AudioMetadata;

  // speed cards
  showTime?: number;
  responseTime?: number;
  speedBonus?: boolean;
}

export interface DifficultyMix {
  easy: number;
  medium: number;
  hard: number;
}

export interface SessionMetadata {
  totalCards: number;
  estimatedTime: number; // seconds
  difficultyMix: DifficultyMix;
}

export interface FlashcardSession {
  sessionId: string;
  cards: FlashcardCard[];
  metadata: SessionMetadata;
}

export function isCardType(value: string): value is CardType {
  return CARD_TYPES.some((type) => type === value);
}

export function isDifficulty(value: string): value is Difficulty {
  return DIFFICULTIES.some((difficulty) => difficulty === value);
}

export function isPremiumCardType(type: CardType): boolean {
  return PREMIUM_CARD_TYPES.includes(type);
}

// Always derived from the cards themselves, never from what a model reported.
export function summarizeSession(cards: readonly FlashcardCard[]): SessionMetadata {
  const difficultyMix: DifficultyMix = { easy: 0, medium: 0, hard: 0 };
  let totalMs = 0;
  for (const card of cards) {
    difficultyMix[card.difficulty] += 1;
    totalMs += card.timeLimit;
  }
  return {
    totalCards: cards.length,
    estimatedTime: totalMs / 1000,
    difficultyMix,
  };
}

export function createSessionId(): string {
  return `session_${randomUUID().replace(/-/g, '').slice(0, 8)}`;
}
