import { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import { config } from '../config/env';
import { SearchOutcome } from '../types/search.types';

const isTest = () => config.server.nodeEnv === 'test';

const searchOutcomes = new WeakMap<Response, SearchOutcome>();

/** Attaches a search outcome to the response so the API log line can report it */
export const recordSearchOutcome = (res: Response, outcome: SearchOutcome): void => {
  searchOutcomes.set(res, outcome);
};

export const requestLogger = morgan('combined', {
  skip: (req: Request) => isTest() || req.path === '/health',
});

export const createApiLogger = (skip: () => boolean = isTest) =>
  (req: Request, res: Response, next: NextFunction) => {
    if (skip()) {
      return next();
    }

    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      const search = searchOutcomes.get(res);
      const logData = {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        duration: `${duration}ms`,
        ip: req.ip,
        ...(search && {
          search: `${search.status} results=${search.resultCount} top=${search.topType ?? 'none'} emergency=${search.emergency}`,
        }),
        timestamp: new Date().toISOString(),
      };

      if (res.statusCode >= 400) {
        console.error('API Error:', logData);
      } else {
        console.log('API Request:', logData);
      }
    });

    next();
  };

export const apiLogger = createApiLogger();
