import {
  AudioMetadata,
  CardType,
  FlashcardCard,
  FlashcardSession,
  OPTION_COUNT,
  createSessionId,
  isCardType,
  isDifficulty,
  summarizeSession,
} from '../entities/Flashcard';
import { Quiz, QuizQuestion, estimateQuizTime, isQuizQuestionType } from '../entities/Quiz';
import {
  Recommendation,
  RecommendationSet,
  isPriority,
  isRecommendationType,
  sortByPriority,
} from '../entities/Recommendation';
import {
  FlashcardBatchSpec,
  QuizBatchSpec,
  RecommendationSpec,
  TranslationSpec,
  WordAnalysisSpec,
} from '../entities/RequestSpec';
import { CEFR_LEVELS, CefrLevel, WordInput, isCefrLevel, parseLearningDirection } from '../entities/Vocabulary';
import { WordAnalysis, WordTranslation } from '../entities/WordAnalysis';
import {
  CandidateObject,
  readBoolean,
  readNumber,
  readObject,
  readObjectArray,
  readString,
  readStringArray,
} from './CandidateReader';
import { DEFAULT_CARD_TYPE_POLICY, CardTypePolicy, allowedCardTypes, cardTiming, determineCardDifficulty, selectCardType } from './CardTypePolicy';
import { DistractorPool, generateDistractors } from './Distractors';

export const AUDIO_DEFAULTS: Required<AudioMetadata> = { accent: 'american', speed: 'normal', gender: 'female' };
export const SPEED_SHOW_TIME = 2000;
export const SPEED_RESPONSE_TIME = 3000;
export const MAX_PROVIDER_RECOMMENDATIONS = 5;

const BLANK = '_____';

function optionKey(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Fixes up an option list so it holds exactly `count` distinct entries
 * including `answer`, compared case-insensitively. Existing entries keep their
 * order; an answer already in the list keeps its position (in the answer's own
 * spelling), a missing one is appended after the first `count - 1` others.
 * Gaps are filled from the distractor tables.
 */
export function normalizeOptions(
  answer: string,
  options: readonly string[],
  count: number = OPTION_COUNT,
  pool: DistractorPool = 'confusable'
): string[] {
  const answerKey = optionKey(answer);
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const option of options) {
    const trimmed = option.trim();
    const key = optionKey(trimmed);
    if (!trimmed || seen.has(key)) continue;
    seen.add(key);
    unique.push(key === answerKey ? answer : trimmed);
  }
  if (unique.length === 0) {
    return [answer, ...generateDistractors(answer, pool, count - 1)];
  }

  let kept: string[];
  if (seen.has(answerKey)) {
    kept = [];
    let others = 0;
    for (const option of unique) {
      if (option === answer) kept.push(option);
      else if (others < count - 1) {
        kept.push(option);
        others++;
      }
    }
  } else {
    kept = [...unique.slice(0, count - 1), answer];
  }

  const missing = count - kept.length;
  if (missing > 0) kept.push(...generateDistractors(answer, pool, missing, kept));
  return kept;
}

function readCefr(obj: CandidateObject, keys: string | readonly string[]): CefrLevel | undefined {
  const text = readString(obj, keys);
  if (text === undefined) return undefined;
  const upper = text.toUpperCase();
  if (isCefrLevel(upper)) return upper;
  // some models rate difficulty 1..6
  const rank = Number(text);
  return Number.isInteger(rank) && rank >= 1 && rank <= CEFR_LEVELS.length ? CEFR_LEVELS[rank - 1] : undefined;
}

function readPositive(obj: CandidateObject, key: string): number | undefined {
  const value = readNumber(obj, key);
  return value !== undefined && value > 0 ? value : undefined;
}

function nonEmpty(values: string[] | undefined): string[] | undefined {
  return values && values.length > 0 ? values : undefined;
}

interface ContextScene {
  blanked: string;
  original: string;
}

// Blanks the first case-insensitive occurrence of the word
export function blankWord(word: string, context: string | undefined): ContextScene {
  if (context) {
    const at = context.toLowerCase().indexOf(word.toLowerCase());
    if (at >= 0) {
      return { blanked: context.slice(0, at) + BLANK + context.slice(at + word.length), original: context };
    }
  }
  return {
    blanked: `The ${BLANK} is important in this context.`,
    original: `The ${word} is important in this context.`,
  };
}

interface CardContent {
  subType: string;
  question: string;
  answer: string;
  pool: DistractorPool;
}

function defaultCardContent(type: CardType, word: WordInput, translation: string, forward: boolean, scene: ContextScene): CardContent {
  switch (type) {
    case 'contextual':
      return { subType: 'fill_in_blank', question: `Complete the sentence: '${scene.blanked}'`, answer: word.text, pool: 'confusable' };
    case 'audio':
      return { subType: 'listen_translate', question: 'Listen and choose the word you hear', answer: word.text, pool: 'phonetic' };
    case 'speed':
      return forward
        ? { subType: 'rapid_translation', question: word.text, answer: translation, pool: 'confusable' }
        : { subType: 'rapid_translation', question: translation, answer: word.text, pool: 'confusable' };
    case 'classic':
      return forward
        ? { subType: 'translation', question: `What does '${word.text}' mean?`, answer: translation, pool: 'confusable' }
        : { subType: 'reverse_translation', question: `How do you say '${translation}'?`, answer: word.text, pool: 'confusable' };
  }
}

function readAudioMetadata(raw: CandidateObject): AudioMetadata {
  const source = readObject(raw, 'audioMetadata') ?? {};
  const metadata: AudioMetadata = {};
  const accent = readString(source, 'accent');
  const speed = readString(source, 'speed');
  const gender = readString(source, 'gender');
  if (accent) metadata.accent = accent;
  if (speed) metadata.speed = speed;
  if (gender) metadata.gender = gender;
  return metadata;
}

export interface SchemaNormalizerOptions {
  policy?: CardTypePolicy;
}

// Merges possibly-incomplete model output with request-derived defaults. Never throws on candidate content.
export class SchemaNormalizer {
  private policy: CardTypePolicy;

  constructor(options: SchemaNormalizerOptions = {}) {
    this.policy = options.policy ?? DEFAULT_CARD_TYPE_POLICY;
  }

  normalizeWordAnalysis(candidate: CandidateObject, spec: WordAnalysisSpec): WordAnalysis {
    const { word, context, userLevel } = spec.input;
    const cefr = readCefr(candidate, ['cefr_level', 'cefrLevel', 'level']);
    const difficulty = readCefr(candidate, 'difficulty') ?? cefr ?? userLevel;

    return {
      word: readString(candidate, 'word') ?? word,
      translation: readString(candidate, 'translation') ?? `Translation of '${word}'`,
      definition: readString(candidate, 'definition') ?? `Definition of '${word}'`,
      difficulty,
      cefr_level: cefr ?? difficulty,
      context_analysis:
        readString(candidate, ['context_analysis', 'contextualMeaning', 'contextAnalysis', 'grammar']) ??
        (context ? `Usage of '${word}' in: ${context}` : `Common usage of '${word}'`),
      usage_examples:
        nonEmpty(readStringArray(candidate, ['usage_examples', 'examples'])) ??
        [context || `Example sentence with '${word}'.`],
      synonyms: readStringArray(candidate, 'synonyms') ?? [],
      etymology: readString(candidate, 'etymology') ?? `Etymology of '${word}' unavailable`,
    };
  }

  normalizeTranslation(candidate: CandidateObject, spec: TranslationSpec): WordTranslation {
    const { word, context, userLevel } = spec.input;
    const translation = readString(candidate, 'translation') ?? `Translation of '${word}'`;
    const cefr = readCefr(candidate, ['cefr_level', 'cefrLevel', 'level']);
    const difficulty = readCefr(candidate, 'difficulty') ?? cefr ?? userLevel;
    const contextTranslation =
      readString(candidate, 'contextTranslation') ?? (context ? `Translation of: ${context}` : translation);

    const analysis = readObject(candidate, 'contextAnalysis') ?? {};
    const learning = readObject(candidate, 'learningData') ?? {};
    const suggestion = readObject(candidate, 'flashcardSuggestion') ?? {};
    const suggestedAnswer = readString(suggestion, 'answer') ?? translation;

    return {
      word: readString(candidate, 'word') ?? word,
      translation,
      alternativeTranslations: (readStringArray(candidate, ['alternativeTranslations', 'alternatives']) ?? []).filter(
        (alternative) => alternative !== translation
      ),
      contextTranslation,
      definition: readString(candidate, 'definition') ?? `Definition of '${word}'`,
      difficulty,
      cefr_level: cefr ?? difficulty,
      contextAnalysis: {
        originalSentence: readString(analysis, 'originalSentence') ?? (context || word),
        translatedSentence: readString(analysis, 'translatedSentence') ?? contextTranslation,
        grammarNotes: readString(analysis, 'grammarNotes') ?? readString(candidate, 'grammar') ?? `Grammar notes for '${word}' unavailable`,
        usage: readString(analysis, 'usage') ?? `Usage of '${word}' in context`,
      },
      learningData: {
        synonyms: readStringArray(learning, 'synonyms') ?? readStringArray(candidate, 'synonyms') ?? [],
        relatedWords: readStringArray(learning, 'relatedWords') ?? [],
        commonPhrases: readStringArray(learning, 'commonPhrases') ?? readStringArray(candidate, 'examples') ?? [],
      },
      flashcardSuggestion: {
        question: readString(suggestion, 'question') ?? `What does '${word}' mean?`,
        answer: suggestedAnswer,
        options: normalizeOptions(suggestedAnswer, readStringArray(suggestion, 'options') ?? [], spec.bounds.optionCount),
        hint: readString(suggestion, 'hint') ?? readString(candidate, 'tips') ?? `This is a ${userLevel} level word`,
        explanation: readString(suggestion, 'explanation') ?? `'${word}' means '${translation}'`,
      },
    };
  }

  normalizeFlashcardBatch(candidate: CandidateObject, spec: FlashcardBatchSpec): FlashcardSession {
    const limit = spec.bounds.itemCount ?? spec.input.words.length;
    const records = (readObjectArray(candidate, ['cards', 'flashcards']) ?? []).slice(0, limit);
    const total = Math.min(limit, spec.input.words.length);
    const cards = records.map((record, index) => this.normalizeCard(record, index, total, spec));

    return {
      sessionId: readString(candidate, 'sessionId') ?? createSessionId(),
      cards,
      metadata: summarizeSession(cards),
    };
  }

  normalizeQuiz(candidate: CandidateObject, spec: QuizBatchSpec): Quiz {
    const { words, targetLevel } = spec.input;
    const limit = spec.bounds.itemCount ?? spec.input.questionCount;
    const records = (readObjectArray(candidate, 'questions') ?? []).slice(0, limit);

    const questions = records.map((record, index): QuizQuestion => {
      const word = words[index % words.length];
      const options = readStringArray(record, 'options') ?? [];
      // correct_answer is either the answer text or its index in options
      const correct = record['correct_answer'];
      const fromCorrect =
        typeof correct === 'number' ? options[correct] : typeof correct === 'string' ? readString(record, 'correct_answer') : undefined;
      const answer = readString(record, 'answer') ?? fromCorrect ?? `Translation of '${word}'`;
      const type = readString(record, 'type');

      return {
        id: readString(record, 'id') ?? `q${index + 1}`,
        type: type !== undefined && isQuizQuestionType(type) ? type : 'multiple_choice',
        question: readString(record, 'question') ?? `What does '${word}' mean?`,
        answer,
        options: normalizeOptions(answer, options, spec.bounds.optionCount),
        difficulty: readCefr(record, ['difficulty', 'level']) ?? targetLevel,
        explanation: readString(record, 'explanation') ?? `'${word}' is ${targetLevel} level vocabulary`,
      };
    });

    return { questions, estimatedTime: estimateQuizTime(questions) };
  }

  normalizeRecommendations(candidate: CandidateObject, spec: RecommendationSpec): RecommendationSet {
    const records = readObjectArray(candidate, 'recommendations') ?? [];
    const recommendations = records.map((record): Recommendation => {
      const type = readString(record, 'type');
      const priority = readString(record, 'priority')?.toLowerCase();
      const reason = readString(record, 'reason');
      return {
        type: type !== undefined && isRecommendationType(type) ? type : 'exercise_type',
        content: readString(record, ['content', 'title', 'description']) ?? reason ?? 'Review recently studied words',
        priority: priority !== undefined && isPriority(priority) ? priority : 'medium',
        reason: reason ?? 'Suggested from your learning progress',
      };
    });
    return {
      recommendations: sortByPriority(recommendations).slice(0, spec.bounds.maxItems ?? MAX_PROVIDER_RECOMMENDATIONS),
    };
  }

  private normalizeCard(raw: CandidateObject, index: number, total: number, spec: FlashcardBatchSpec): FlashcardCard {
    const { words, sessionConfig } = spec.input;
    const word = words[index];
    const direction = parseLearningDirection(sessionConfig);
    const translation = word.translation?.trim() || `Translation of '${word.text}'`;
    const scene = blankWord(word.text, word.context);

    const allowed = allowedCardTypes(sessionConfig.types, sessionConfig.isPremium);
    const rawType = readString(raw, 'type')?.toLowerCase();
    const type =
      rawType !== undefined && isCardType(rawType) && allowed.includes(rawType)
        ? rawType
        : selectCardType(word.masteryLevel, sessionConfig.types, sessionConfig.isPremium, this.policy);

    const rawDifficulty = readString(raw, 'difficulty')?.toLowerCase();
    const difficulty =
      rawDifficulty !== undefined && isDifficulty(rawDifficulty)
        ? rawDifficulty
        : determineCardDifficulty(sessionConfig.difficulty, sessionConfig.userLevel, index, total);
    const timing = cardTiming(type, difficulty);

    const content = defaultCardContent(type, word, translation, direction.forward, scene);
    const answer = readString(raw, 'answer') ?? content.answer;

    const card: FlashcardCard = {
      id: readString(raw, 'id') ?? `card_${index + 1}`,
      wordId: readString(raw, 'wordId') ?? `word_${word.text}`,
      type,
      subType: readString(raw, 'subType') ?? content.subType,
      question: readString(raw, 'question') ?? content.question,
      answer,
      options: normalizeOptions(answer, readStringArray(raw, 'options') ?? [], spec.bounds.optionCount, content.pool),
      hints: nonEmpty(readStringArray(raw, 'hints')) ?? [`This is a ${sessionConfig.userLevel} level word`],
      explanation: readString(raw, 'explanation') ?? `'${word.text}' means '${translation}'`,
      difficulty,
      timeLimit: readPositive(raw, 'timeLimit') ?? timing.timeLimit,
      points: readPositive(raw, 'points') ?? timing.points,
      questionLanguage: readString(raw, 'questionLanguage') ?? direction.from,
      answerLanguage: readString(raw, 'answerLanguage') ?? direction.to,
      audioMetadata: readAudioMetadata(raw),
    };

    if (type === 'contextual') {
      card.context = readString(raw, 'context') ?? scene.blanked;
      card.originalContext = readString(raw, 'originalContext') ?? scene.original;
      card.contextExplanation =
        readString(raw, 'contextExplanation') ?? `'${word.text}' is the word that fits this sentence`;
      const contextTranslation = readString(raw, 'contextTranslation');
      if (contextTranslation) card.contextTranslation = contextTranslation;
    }

    if (type === 'audio') {
      const audioUrl = readString(raw, 'audioUrl');
      if (audioUrl) card.audioUrl = audioUrl;
      card.phonetic = readString(raw, 'phonetic') ?? `/${word.text}/`;
      card.audioMetadata = { ...AUDIO_DEFAULTS, ...card.audioMetadata };
    }

    if (type === 'speed') {
      card.showTime = readPositive(raw, 'showTime') ?? SPEED_SHOW_TIME;
      card.responseTime = readPositive(raw, 'responseTime') ?? SPEED_RESPONSE_TIME;
      card.speedBonus = readBoolean(raw, 'speedBonus') ?? true;
    }

    return card;
  }
}
