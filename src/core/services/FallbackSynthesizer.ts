import { FlashcardSession } from '../entities/Flashcard';
import { Quiz } from '../entities/Quiz';
import { Recommendation, RecommendationSet, sortByPriority } from '../entities/Recommendation';
import {
  FlashcardBatchSpec,
  QuizBatchSpec,
  RecommendationSpec,
  TranslationSpec,
  WordAnalysisSpec,
} from '../entities/RequestSpec';
import { WordAnalysis, WordTranslation } from '../entities/WordAnalysis';
import { CardTypePolicy } from './CardTypePolicy';
import { shuffle } from './Distractors';
import { SchemaNormalizer } from './SchemaNormalizer';

export const ACCURACY_TARGET = 0.7;
export const MASTERY_TARGET = 0.5;
export const MAX_SYNTHESIZED_RECOMMENDATIONS = 3;

export interface FallbackSynthesizerOptions {
  policy?: CardTypePolicy;
  // source for option shuffling; Math.random by default
  random?: () => number;
}

/**
 * Builds complete results from the request alone, for when the model call or
 * its output is unusable. Content comes from the normalizer's defaults applied
 * to empty records, so a synthesized card looks exactly like a provider card
 * the model left blank. Never calls a provider.
 */
export class FallbackSynthesizer {
  private normalizer: SchemaNormalizer;
  private random: () => number;

  constructor(options: FallbackSynthesizerOptions = {}) {
    this.normalizer = new SchemaNormalizer({ policy: options.policy });
    this.random = options.random ?? Math.random;
  }

  synthesizeWordAnalysis(spec: WordAnalysisSpec): WordAnalysis {
    return this.normalizer.normalizeWordAnalysis({}, spec);
  }

  synthesizeTranslation(spec: TranslationSpec): WordTranslation {
    return this.normalizer.normalizeTranslation({}, spec);
  }

  synthesizeFlashcardBatch(spec: FlashcardBatchSpec): FlashcardSession {
    const session = this.normalizer.normalizeFlashcardBatch({ cards: spec.input.words.map(() => ({})) }, spec);
    return {
      ...session,
      cards: session.cards.map((card) => ({ ...card, options: shuffle(card.options, this.random) })),
    };
  }

  synthesizeQuiz(spec: QuizBatchSpec): Quiz {
    const { words, questionCount } = spec.input;
    const count = Math.min(questionCount, words.length);
    const quiz = this.normalizer.normalizeQuiz({ questions: words.slice(0, count).map(() => ({})) }, spec);
    return {
      ...quiz,
      questions: quiz.questions.map((question) => ({ ...question, options: shuffle(question.options, this.random) })),
    };
  }

  synthesizeRecommendations(spec: RecommendationSpec): RecommendationSet {
    const { totalWords, masteredWords, weakAreas, averageAccuracy } = spec.input.progress;
    const recommendations: Recommendation[] = [];

    if (averageAccuracy < ACCURACY_TARGET) {
      recommendations.push({
        type: 'review_session',
        content: 'Review your recent words before adding new ones',
        priority: 'high',
        reason: `Average accuracy is ${Math.round(averageAccuracy * 100)}%, below the ${Math.round(ACCURACY_TARGET * 100)}% target`,
      });
    }

    if (weakAreas.length > 0) {
      recommendations.push({
        type: 'weak_areas',
        content: `Focus on: ${weakAreas.join(', ')}`,
        priority: 'medium',
        reason: 'These areas have the most mistakes',
      });
    }

    if (totalWords > 0 && masteredWords / totalWords < MASTERY_TARGET) {
      recommendations.push({
        type: 'mastery',
        content: 'Spend more time reviewing the words you have already learned',
        priority: 'high',
        reason: `Only ${masteredWords} of ${totalWords} words are mastered`,
      });
    }

    if (recommendations.length === 0) {
      recommendations.push({
        type: 'review_session',
        content: 'Keep up your daily review routine',
        priority: 'low',
        reason: 'Your progress is on track',
      });
    }

    return { recommendations: sortByPriority(recommendations).slice(0, MAX_SYNTHESIZED_RECOMMENDATIONS) };
  }
}
