import { config } from './config';
import { languageToolConfig } from './config/languagetool.config';
import { logger } from './lib/logger';
import { createApp } from './app';
import { LanguageToolClient } from './services/grammar';
import { WritingAnalyzer } from './services/analysis/writing-analyzer.service';

const grammar = new LanguageToolClient(languageToolConfig);
const analyzer = new WritingAnalyzer({ grammar });
const app = createApp({ analyzer });

const server = app.listen(config.port, config.host, () => {
  logger.info(`prosecheck v${config.version} running on ${config.host}:${config.port}`);
  logger.info(`Environment: ${config.nodeEnv}`);
  logger.info(`Grammar service: ${languageToolConfig.baseUrl} (${languageToolConfig.language})`);
  logger.info(`Health check: http://localhost:${config.port}/health`);
});

let shuttingDown = false;

const gracefulShutdown = (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received, shutting down gracefully...`);

  server.close(() => {
    logger.info('HTTP server closed');

    grammar
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Failed to release grammar client', error);
        process.exit(1);
      });
  });
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
