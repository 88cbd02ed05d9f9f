import { loadConfig } from './config.js';
import { createGitHubSink } from './github.js';
import { createCommentHandler } from './handler.js';
import { createLogger } from './logger.js';
import { consume } from './rabbitmq.js';

(async () => {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const handler = createCommentHandler({
    github: createGitHubSink({ token: config.githubToken, baseUrl: config.githubApiUrl }),
    logger,
  });

  const consumer = await consume({
    url: config.rabbitmqUrl,
    queue: config.commentQueue,
    prefetch: config.prefetch,
    logger,
    handler,
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'shutting down');
    consumer
      .close()
      .catch((e: unknown) => logger.error({ err: e }, 'error during shutdown'))
      .finally(() => process.exit(0));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
})().catch((e: unknown) => {
  console.error('FATAL: worker failed to start', e);
  process.exit(1);
});
