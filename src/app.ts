import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import { config } from './config/env';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { requestLogger, apiLogger } from './middleware/logger.middleware';
import { generalRateLimiter, apiRateLimiter } from './middleware/rateLimit.middleware';
import { metricsMiddleware, metrics } from './utils/metrics';
import { Services } from './services';
import { createSearchRouter } from './routes/search.routes';
import { createInteractionRouter } from './routes/interaction.routes';
import { createKnowledgeRouter } from './routes/knowledge.routes';
import { createHistoryRouter, createProfileRouter } from './routes/session.routes';

export const createApp = (services: Services) => {
  const app = express();

  app.use(helmet());
  app.use(compression());
  app.use(cors({
    origin: config.server.corsOrigin,
    credentials: true,
  }));

  app.use(express.json({ limit: '100kb' }));

  app.use(requestLogger);
  app.use(apiLogger);
  app.use(metricsMiddleware);
  app.use(generalRateLimiter);

  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      message: 'MedQuery API is running',
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/metrics', (req, res) => {
    res.json({
      success: true,
      data: metrics.getMetrics(),
    });
  });

  app.use('/api/search', apiRateLimiter, createSearchRouter(services));
  app.use('/api/interactions', apiRateLimiter, createInteractionRouter(services));
  app.use('/api/knowledge', apiRateLimiter, createKnowledgeRouter(services));
  app.use('/api/history', apiRateLimiter, createHistoryRouter(services));
  app.use('/api/profile', apiRateLimiter, createProfileRouter(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
