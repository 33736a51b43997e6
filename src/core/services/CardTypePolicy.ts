import { CardType, Difficulty, isPremiumCardType } from '../entities/Flashcard';
import { CefrLevel, MasteryLevel, SessionDifficulty } from '../entities/Vocabulary';

// Preferred card types per mastery level; the first one the session allows wins.
export type CardTypePolicy = Readonly<Record<MasteryLevel, readonly CardType[]>>;

export const DEFAULT_CARD_TYPE_POLICY: CardTypePolicy = {
  NEW: ['classic', 'contextual'],
  LEARNING: ['contextual', 'classic'],
  FAMILIAR: ['audio', 'contextual', 'classic'],
  MASTERED: ['speed', 'audio', 'contextual', 'classic'],
};

export interface CardTiming {
  timeLimit: number; // milliseconds
  points: number;
}

const BASE_TIMING: Record<Difficulty, CardTiming> = {
  easy: { timeLimit: 20000, points: 10 },
  medium: { timeLimit: 15000, points: 15 },
  hard: { timeLimit: 10000, points: 20 },
};

const MIN_SPEED_TIME_LIMIT = 5000;

export function allowedCardTypes(requested: readonly CardType[], isPremium: boolean): CardType[] {
  return isPremium ? [...requested] : requested.filter((type) => !isPremiumCardType(type));
}

export function selectCardType(
  mastery: MasteryLevel,
  requested: readonly CardType[],
  isPremium: boolean,
  policy: CardTypePolicy = DEFAULT_CARD_TYPE_POLICY
): CardType {
  const allowed = allowedCardTypes(requested, isPremium);
  const preferred = policy[mastery].find((type) => allowed.includes(type));
  return preferred ?? allowed[0] ?? 'classic';
}

export function determineCardDifficulty(
  setting: SessionDifficulty,
  userLevel: CefrLevel,
  index: number,
  total: number
): Difficulty {
  if (setting !== 'adaptive') return setting;

  const position = total > 0 ? index / total : 0;
  switch (userLevel) {
    case 'A1':
    case 'A2':
      return position < 0.7 ? 'easy' : 'medium';
    case 'B1':
    case 'B2':
      if (position < 0.4) return 'easy';
      return position < 0.8 ? 'medium' : 'hard';
    case 'C1':
    case 'C2':
      return position < 0.5 ? 'medium' : 'hard';
  }
}

export function cardTiming(type: CardType, difficulty: Difficulty): CardTiming {
  const base = BASE_TIMING[difficulty];
  switch (type) {
    case 'audio':
      return { timeLimit: base.timeLimit + 5000, points: base.points + 5 };
    case 'speed':
      return { timeLimit: Math.max(MIN_SPEED_TIME_LIMIT, base.timeLimit - 5000), points: base.points + 5 };
    default:
      return { ...base };
  }
}
