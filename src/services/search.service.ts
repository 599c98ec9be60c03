import { KnowledgeStore } from './knowledge.service';
import { RelevanceScorer, tokenize } from './scoring.service';
import { createError } from '../middleware/error.middleware';
import { SearchResult } from '../types/search.types';

export const MAX_SEARCH_RESULTS = 15;

export class SearchService {
  private scorer: RelevanceScorer;

  constructor(private readonly store: KnowledgeStore, scorer?: RelevanceScorer) {
    this.scorer = scorer ?? new RelevanceScorer();
  }

  search(query: unknown): SearchResult[] {
    if (typeof query !== 'string') {
      throw createError('Invalid input: query must be a string', 400);
    }

    const tokens = tokenize(query);
    if (tokens.length === 0) {
      return [];
    }

    const results: SearchResult[] = [];

    for (const condition of this.store.getConditions()) {
      const score = this.scorer.scoreCondition(tokens, condition);
      if (score > 0) {
        results.push({ type: 'condition', id: condition.id, data: condition, score, relevance: this.scorer.getRelevance(score) });
      }
    }

    for (const drug of this.store.getDrugs()) {
      const score = this.scorer.scoreDrug(tokens, drug);
      if (score > 0) {
        results.push({ type: 'drug', id: drug.id, data: drug, score, relevance: this.scorer.getRelevance(score) });
      }
    }

    for (const symptom of this.store.getSymptoms()) {
      const score = this.scorer.scoreSymptom(tokens, symptom);
      if (score > 0) {
        results.push({ type: 'symptom', id: symptom.id, data: symptom, score, relevance: this.scorer.getRelevance(score) });
      }
    }

    // Array#sort is stable, so equal scores keep condition/drug/symptom insertion order
    return results.sort((a, b) => b.score - a.score).slice(0, MAX_SEARCH_RESULTS);
  }
}
