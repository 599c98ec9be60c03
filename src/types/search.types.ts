import { Condition, Drug, Symptom } from './knowledge.types';

export type RelevanceBucket = 'high' | 'medium' | 'low';

interface SearchResultBase {
  id: string;
  score: number;
  relevance: RelevanceBucket;
}

export interface ConditionResult extends SearchResultBase {
  type: 'condition';
  data: Condition;
}

export interface DrugResult extends SearchResultBase {
  type: 'drug';
  data: Drug;
}

export interface SymptomResult extends SearchResultBase {
  type: 'symptom';
  data: Symptom;
}

export type SearchResult = ConditionResult | DrugResult | SymptomResult;

/** What a single search request produced, for logs and metrics */
export interface SearchOutcome {
  status: 'results' | 'no_results';
  resultCount: number;
  topType: SearchResult['type'] | null;
  emergency: boolean;
}
