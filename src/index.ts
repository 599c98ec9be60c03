import { config } from './config/env';
import { createApp } from './app';
import { createServices, KnowledgeStore } from './services';

let knowledge: KnowledgeStore;

try {
  knowledge = KnowledgeStore.fromFile(config.knowledgeBase.path);
} catch (error: unknown) {
  console.error('❌ Failed to load knowledge base:', error instanceof Error ? error.message : error);
  process.exit(1);
}

const services = createServices(knowledge, config.search.cacheTtlMs);
services.searchCache.startCleanup();

const app = createApp(services);

app.listen(config.server.port, () => {
  console.log(`🚀 MedQuery API running on port ${config.server.port}`);
  console.log(`📝 Environment: ${config.server.nodeEnv}`);
});

export default app;
