export const PRIORITIES = ['high', 'medium', 'low'] as const;
export type Priority = (typeof PRIORITIES)[number];

export const RECOMMENDATION_TYPES = [
  'word_to_learn',
  'exercise_type',
  'review_session',
  'weak_areas',
  'mastery',
] as const;
export type RecommendationType = (typeof RECOMMENDATION_TYPES)[number];

export interface Recommendation {
  type: RecommendationType;
  content: string;
  priority: Priority;
  reason: string;
}

export interface RecommendationSet {
  recommendations: Recommendation[];
}

export function isPriority(value: string): value is Priority {
  return PRIORITIES.some((priority) => priority === value);
}

export function isRecommendationType(value: string): value is RecommendationType {
  return RECOMMENDATION_TYPES.some((type) => type === value);
}

// Stable: recommendations sharing a priority keep their relative order.
export function sortByPriority(recommendations: readonly Recommendation[]): Recommendation[] {
  return recommendations
    .map((recommendation, index) => ({ recommendation, index }))
    .sort((a, b) => {
      const rank = PRIORITIES.indexOf(a.recommendation.priority) - PRIORITIES.indexOf(b.recommendation.priority);
      return rank !== 0 ? rank : a.index - b.index;
    })
    .map(({ recommendation }) => recommendation);
}
