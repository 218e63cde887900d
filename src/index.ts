/**
 * Entry point: build the services once, mount them on the Express app and listen.
 */
import { createServer } from 'http';
import { createApp } from './api/app';
import { getLLMService } from './ai/llm';
import { config } from './config';
import { logger } from './config/logger';
import { getCompletionService } from './services/completion.service';
import { getFileProcessor } from './services/file-processor.service';

async function start() {
  logger.info('Starting prompt relay service...');

  if (!getLLMService().available) {
    logger.warn('AI client not configured; /process will answer 503 until BASE_URL and API_KEY are set');
  }

  logger.info(`Configuration loaded - Model: ${config.ai.model}`);
  logger.info(`Max file size: ${config.files.maxFileSizeBytes / (1024 * 1024)}MB`);
  logger.info(`Allowed extensions: ${[...config.files.allowedExtensions].join(', ')}`);

  const app = createApp({
    fileProcessor: getFileProcessor(),
    completionService: getCompletionService(),
  });

  const httpServer = createServer(app);
  const server = httpServer.listen(config.port, config.host, () => {
    logger.info(`Server listening on ${config.host}:${config.port} (env: ${config.env})`);
  });

  const shutdown = () => {
    logger.info('Shutting down prompt relay service...');
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  return server;
}

const serverPromise = start().catch((e) => {
  logger.error('Startup failed:', e);
  process.exit(1);
});

export default serverPromise;
