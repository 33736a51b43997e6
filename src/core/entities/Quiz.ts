import { CefrLevel } from './Vocabulary';

export const QUIZ_QUESTION_TYPES = ['multiple_choice', 'fill_blank', 'context_completion'] as const;
export type QuizQuestionType = (typeof QUIZ_QUESTION_TYPES)[number];

export const SECONDS_PER_QUESTION = 30;

export interface QuizQuestion {
  id: string;
  type: QuizQuestionType;
  question: string;
  answer: string;
  options: string[];
  difficulty: CefrLevel;
  explanation: string;
}

export interface Quiz {
  questions: QuizQuestion[];
  estimatedTime: number; // seconds
}

export function isQuizQuestionType(value: string): value is QuizQuestionType {
  return QUIZ_QUESTION_TYPES.some((type) => type === value);
}

export function estimateQuizTime(questions: readonly QuizQuestion[]): number {
  return questions.length * SECONDS_PER_QUESTION;
}
