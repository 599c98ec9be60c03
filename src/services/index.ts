import { KnowledgeStore } from './knowledge.service';
import { SearchService } from './search.service';
import { InteractionService } from './interaction.service';
import { ResponseService } from './response.service';
import { SessionService } from './session.service';
import { Cache } from '../utils/cache';
import { SearchResult } from '../types/search.types';

export interface Services {
  knowledge: KnowledgeStore;
  search: SearchService;
  interactions: InteractionService;
  responses: ResponseService;
  session: SessionService;
  searchCache: Cache<SearchResult[]>;
}

export const createServices = (knowledge: KnowledgeStore, searchCacheTtlMs?: number): Services => {
  const interactions = new InteractionService(knowledge);

  return {
    knowledge,
    search: new SearchService(knowledge),
    interactions,
    responses: new ResponseService(interactions),
    session: new SessionService(),
    searchCache: new Cache<SearchResult[]>(searchCacheTtlMs),
  };
};

export { KnowledgeStore, SearchService, InteractionService, ResponseService, SessionService };
