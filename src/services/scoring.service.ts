import { Condition, Drug, Symptom } from '../types/knowledge.types';
import { RelevanceBucket } from '../types/search.types';

export const SCORE_WEIGHTS = {
  condition: { name: 10, symptom: 3, treatment: 2, cause: 1 },
  drug: { name: 10, genericName: 8, indication: 3 },
  symptom: { name: 10, possibleCondition: 2 },
} as const;

/**
 * Lower-cases and splits on whitespace. Punctuation stays attached to
 * its token, so "diabetes?" will not match "diabetes".
 */
export const tokenize = (query: string): string[] =>
  query.toLowerCase().split(/\s+/).filter((token) => token.length > 0);

// Substring containment, not token equality: "pain" matches "Painful joints"
const matchesAny = (tokens: readonly string[], field: string): boolean => {
  if (tokens.length === 0) return false;
  const haystack = field.toLowerCase();
  return tokens.some((token) => haystack.includes(token));
};

const countMatches = (tokens: readonly string[], fields: readonly string[], weight: number): number =>
  fields.reduce((score, field) => (matchesAny(tokens, field) ? score + weight : score), 0);

export class RelevanceScorer {
  scoreCondition(tokens: readonly string[], condition: Condition): number {
    const weights = SCORE_WEIGHTS.condition;
    let score = matchesAny(tokens, condition.name) ? weights.name : 0;
    score += countMatches(tokens, condition.symptoms, weights.symptom);
    score += countMatches(tokens, condition.treatments, weights.treatment);
    score += countMatches(tokens, condition.causes, weights.cause);
    return score;
  }

  scoreDrug(tokens: readonly string[], drug: Drug): number {
    const weights = SCORE_WEIGHTS.drug;
    let score = matchesAny(tokens, drug.name) ? weights.name : 0;
    score += matchesAny(tokens, drug.genericName) ? weights.genericName : 0;
    score += countMatches(tokens, drug.indications, weights.indication);
    return score;
  }

  scoreSymptom(tokens: readonly string[], symptom: Symptom): number {
    const weights = SCORE_WEIGHTS.symptom;
    let score = matchesAny(tokens, symptom.name) ? weights.name : 0;
    score += countMatches(tokens, symptom.possibleConditions, weights.possibleCondition);
    return score;
  }

  getRelevance(score: number): RelevanceBucket {
    if (score >= 8) return 'high';
    if (score >= 4) return 'medium';
    return 'low';
  }
}
