import { CARD_TYPES, OPTION_COUNT } from '../../entities/Flashcard';
import {
  FLASHCARD_BATCH_SHAPE,
  FlashcardBatchSpec,
  QUIZ_BATCH_SHAPE,
  QuizBatchSpec,
  RECOMMENDATION_SHAPE,
  RecommendationSpec,
  WORD_ANALYSIS_SHAPE,
  WordAnalysisSpec,
} from '../../entities/RequestSpec';
import { UserProgress } from '../../entities/Vocabulary';
import { FallbackSynthesizer } from '../FallbackSynthesizer';
import { SchemaNormalizer } from '../SchemaNormalizer';

const flashcardSpec: FlashcardBatchSpec = {
  kind: 'flashcard-batch',
  input: {
    words: [{ text: 'dog', translation: 'chien', masteryLevel: 'NEW' }],
    sessionConfig: {
      types: [...CARD_TYPES],
      difficulty: 'adaptive',
      count: 10,
      userLevel: 'A2',
      isPremium: false,
      sourceLanguage: 'en',
      targetLanguage: 'fr',
      learningDirection: 'en->fr',
    },
  },
  shape: FLASHCARD_BATCH_SHAPE,
  bounds: { optionCount: OPTION_COUNT, itemCount: 1 },
  prompt: '',
  systemPrompt: '',
};

const quizSpec: QuizBatchSpec = {
  kind: 'quiz-batch',
  input: { words: ['dog', 'cat', 'bird'], testType: 'vocabulary_review', targetLevel: 'A2', questionCount: 2 },
  shape: QUIZ_BATCH_SHAPE,
  bounds: { optionCount: OPTION_COUNT, itemCount: 2 },
  prompt: '',
  systemPrompt: '',
};

function recommendationSpec(progress: UserProgress): RecommendationSpec {
  return {
    kind: 'recommendation-batch',
    input: { progress },
    shape: RECOMMENDATION_SHAPE,
    bounds: { optionCount: OPTION_COUNT, maxItems: 5 },
    prompt: '',
    systemPrompt: '',
  };
}

describe('FallbackSynthesizer', () => {
  let synthesizer: FallbackSynthesizer;

  beforeEach(() => {
    synthesizer = new FallbackSynthesizer({ random: () => 0 });
  });

  it('should build a word analysis from request defaults', () => {
    const spec: WordAnalysisSpec = {
      kind: 'word-analysis',
      input: { word: 'hello', context: '', outputLanguage: 'en', userLevel: 'B2', levelProvided: true },
      shape: WORD_ANALYSIS_SHAPE,
      bounds: { optionCount: OPTION_COUNT },
      prompt: '',
      systemPrompt: '',
    };

    const result = synthesizer.synthesizeWordAnalysis(spec);

    expect(result).toEqual(new SchemaNormalizer().normalizeWordAnalysis({}, spec));
    expect(result.difficulty).toBe('B2');
  });

  it('should build one card per word with shuffled options', () => {
    const session = synthesizer.synthesizeFlashcardBatch(flashcardSpec);

    expect(session.cards).toHaveLength(1);
    expect(session.cards[0].type).toBe('classic');
    expect(session.cards[0].question).toBe("What does 'dog' mean?");
    expect(session.cards[0].answer).toBe('chien');
    expect(session.cards[0].options).toEqual(['option1', 'option2', 'option3', 'chien']);
    expect(session.metadata.totalCards).toBe(1);
  });

  it('should give the same cards for the same random source', () => {
    const other = new FallbackSynthesizer({ random: () => 0 });

    const first = synthesizer.synthesizeFlashcardBatch(flashcardSpec);
    const second = other.synthesizeFlashcardBatch(flashcardSpec);

    expect(second.cards).toEqual(first.cards);
  });

  it('should ask one question per word up to the question count', () => {
    const quiz = synthesizer.synthesizeQuiz(quizSpec);

    expect(quiz.questions.map((question) => question.question)).toEqual([
      "What does 'dog' mean?",
      "What does 'cat' mean?",
    ]);
    expect(quiz.questions[0].options).toEqual(['option1', 'option2', 'option3', "Translation of 'dog'"]);
    expect(quiz.estimatedTime).toBe(60);
  });

  describe('synthesizeRecommendations', () => {
    it('should flag weak areas and low mastery', () => {
      const { recommendations } = synthesizer.synthesizeRecommendations(
        recommendationSpec({ totalWords: 10, masteredWords: 4, weakAreas: ['verbs', 'plurals'], averageAccuracy: 0.75 })
      );

      expect(recommendations).toEqual([
        {
          type: 'mastery',
          content: 'Spend more time reviewing the words you have already learned',
          priority: 'high',
          reason: 'Only 4 of 10 words are mastered',
        },
        {
          type: 'weak_areas',
          content: 'Focus on: verbs, plurals',
          priority: 'medium',
          reason: 'These areas have the most mistakes',
        },
      ]);
    });

    it('should put a review session first when accuracy is low', () => {
      const { recommendations } = synthesizer.synthesizeRecommendations(
        recommendationSpec({ totalWords: 10, masteredWords: 4, weakAreas: ['verbs'], averageAccuracy: 0.65 })
      );

      expect(recommendations.map((item) => item.type)).toEqual(['review_session', 'mastery', 'weak_areas']);
      expect(recommendations[0].reason).toBe('Average accuracy is 65%, below the 70% target');
    });

    it('should encourage learners who are on track', () => {
      const onTrack = {
        type: 'review_session',
        content: 'Keep up your daily review routine',
        priority: 'low',
        reason: 'Your progress is on track',
      };

      expect(
        synthesizer.synthesizeRecommendations(
          recommendationSpec({ totalWords: 10, masteredWords: 5, weakAreas: [], averageAccuracy: 0.7 })
        ).recommendations
      ).toEqual([onTrack]);
      expect(
        synthesizer.synthesizeRecommendations(
          recommendationSpec({ totalWords: 0, masteredWords: 0, weakAreas: [], averageAccuracy: 0.9 })
        ).recommendations
      ).toEqual([onTrack]);
    });
  });
});
