import dotenv from 'dotenv';
import path from 'path';
dotenv.config();

const parseNumber = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const config = {
  server: {
    port: parseNumber(process.env.PORT, 5000),
    nodeEnv: process.env.NODE_ENV || 'development',
    corsOrigin: process.env.CORS_ORIGIN || '*',
  },
  knowledgeBase: {
    path: process.env.KNOWLEDGE_BASE_PATH || path.resolve(__dirname, '../../data/knowledge-base.json'),
  },
  search: {
    cacheTtlMs: parseNumber(process.env.SEARCH_CACHE_TTL_MS, 5 * 60 * 1000),
  },
};

if (config.search.cacheTtlMs <= 0) {
  console.warn('⚠️  SEARCH_CACHE_TTL_MS is not positive, search caching is effectively disabled');
}

if (config.server.nodeEnv === 'production' && config.server.corsOrigin === '*') {
  console.warn('⚠️  CORS_ORIGIN not set, accepting requests from any origin');
}
