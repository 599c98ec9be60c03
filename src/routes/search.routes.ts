import express from 'express';
import { Services } from '../services';
import { tokenize } from '../services/scoring.service';
import { metrics } from '../utils/metrics';
import { parseBody, searchRequestSchema } from '../utils/validation';
import { SAMPLE_QUERIES } from '../config/content';
import { SearchOutcome, SearchResult } from '../types/search.types';
import { recordSearchOutcome } from '../middleware/logger.middleware';

export const createSearchRouter = ({ search, responses, session, searchCache }: Services) => {
  const router = express.Router();

  const cachedSearch = (query: string): SearchResult[] => {
    const key = `search:${tokenize(query).join(' ')}`;
    const cached = searchCache.get(key);
    if (cached) {
      return cached;
    }

    const results = search.search(query);
    searchCache.set(key, results);
    return results;
  };

  router.post('/', (req, res, next) => {
    try {
      const { query, patientContext, useProfile } = parseBody(searchRequestSchema, req.body);

      const results = cachedSearch(query);
      const context = patientContext ?? (useProfile ? session.toPatientContext() : undefined);
      const response = responses.compose(query, results, context);

      if (query.trim().length > 0) {
        session.recordQuery(query);
      }

      const outcome: SearchOutcome = {
        status: response.status,
        resultCount: results.length,
        topType: results.length > 0 ? results[0].type : null,
        emergency: response.status === 'results' && response.emergencyAlert !== null,
      };
      metrics.recordSearch(outcome);
      recordSearchOutcome(res, outcome);

      res.json({
        success: true,
        data: response,
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/samples', (req, res) => {
    res.json({
      success: true,
      data: SAMPLE_QUERIES,
    });
  });

  return router;
};
