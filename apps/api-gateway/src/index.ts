import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { CredentialVault } from './credential-vault.js';
import { createDatabase } from './db.js';
import { createAgentDispatcher } from './dispatcher.js';
import { createWebhookGateway } from './gateway.js';
import { createGitHubSource } from './github.js';
import { createGeminiClient } from './llm/model-client.js';
import { createLogger } from './logger.js';
import { createReviewPipeline } from './pipeline.js';
import { createCommentPublisher } from './rabbitmq.js';
import { createReviewRecorder } from './recorder.js';
import { createInstallationRepository } from './repositories/installation-repository.js';
import { createReviewRepository } from './repositories/review-repository.js';

(async () => {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const db = createDatabase(config.databaseUrl);
  const installations = createInstallationRepository(db);
  const reviews = createReviewRepository(db);
  const vault = CredentialVault.fromHex(config.encryptionKey, installations);

  const publisher = await createCommentPublisher({
    url: config.rabbitmqUrl,
    queue: config.commentQueue,
    logger,
  });

  const dispatcher = createAgentDispatcher({
    model: createGeminiClient({ baseUrl: config.modelBaseUrl, model: config.modelName, logger }),
    logger,
    options: {
      callTimeoutMs: config.agentTimeoutMs,
      deadlineMs: config.runDeadlineMs,
      maxRetries: config.agentMaxRetries,
      baseDelayMs: config.retryBaseDelayMs,
    },
  });

  const pipeline = createReviewPipeline({
    vault,
    source: createGitHubSource({ token: config.githubToken }),
    dispatcher,
    recorder: createReviewRecorder({ reviews, logger }),
    publisher,
    logger,
    maxFindings: config.maxReportFindings,
    deadlineMs: config.runDeadlineMs,
  });

  const gateway = createWebhookGateway({
    secret: config.webhookSecret,
    installations,
    reviews,
    pipeline,
    logger,
  });

  const app = createApp({ gateway, installations, reviews, vault, logger });
  const server = app.listen(config.port, () => logger.info({ port: config.port }, 'api-gateway listening'));

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'shutting down');
    server.close(() => {
      Promise.all([publisher.close(), db.close()])
        .catch((e: unknown) => logger.error({ err: e }, 'error during shutdown'))
        .finally(() => process.exit(0));
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
})().catch((e: unknown) => {
  console.error('FATAL: api-gateway failed to start', e);
  process.exit(1);
});
