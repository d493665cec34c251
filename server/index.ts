// Load environment variables from .env file BEFORE any other imports
import 'dotenv/config';

import { createServer } from 'http';
import { createApp } from './app';
import { loadConfig } from './config/appConfig';
import { logError, logger } from './lib/logger';
import {
  createOpenAICompletionClient,
  NoopEnhancer,
  OpenAIEnhancer,
  type ProjectEnhancer,
} from './services/projectEnhancer';
import { loadRuleFile } from './services/projectLoader';
import { RuleRepository } from './services/ruleRepository';

async function main(): Promise<void> {
  const config = loadConfig();

  const customRules = config.rulesFile ? await loadRuleFile(config.rulesFile) : [];
  const repository = RuleRepository.load(customRules);

  const enhancer: ProjectEnhancer = config.openai.apiKey
    ? new OpenAIEnhancer(createOpenAICompletionClient(config.openai.apiKey), { model: config.openai.model })
    : new NoopEnhancer();
  if (!config.openai.apiKey) {
    logger.info('No OpenAI API key configured; LLM enhancement disabled');
  }

  const app = createApp({
    repository,
    enhancer,
    llmTimeoutMs: config.openai.timeoutMs,
  });

  const httpServer = createServer(app);
  httpServer.listen({ port: config.port, host: '0.0.0.0' }, () => {
    logger.info({ port: config.port, rules: repository.size }, `serving on port ${config.port}`);
  });
}

main().catch((error) => {
  logError(logger, error, 'Server failed to start');
  process.exit(1);
});
