import { CefrLevel } from './Vocabulary';

export interface WordAnalysis {
  word: string;
  translation: string;
  definition: string;
  difficulty: CefrLevel;
  cefr_level: CefrLevel;
  context_analysis: string;
  usage_examples: string[];
  synonyms: string[];
  etymology: string;
}

export interface ContextAnalysis {
  originalSentence: string;
  translatedSentence: string;
  grammarNotes: string;
  usage: string;
}

export interface LearningData {
  synonyms: string[];
  relatedWords: string[];
  commonPhrases: string[];
}

export interface FlashcardSuggestion {
  question: string;
  answer: string;
  options: string[];
  hint: string;
  explanation: string;
}

export interface WordTranslation {
  word: string;
  translation: string;
  alternativeTranslations: string[];
  contextTranslation: string;
  definition: string;
  difficulty: CefrLevel;
  cefr_level: CefrLevel;
  contextAnalysis: ContextAnalysis;
  learningData: LearningData;
  flashcardSuggestion: FlashcardSuggestion;
}
