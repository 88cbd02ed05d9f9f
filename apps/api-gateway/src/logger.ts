import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export function createLogger(level = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({
    level,
    base: { service: 'api-gateway' },
    redact: ['apiKey', 'encryptedApiKey', 'headers.authorization'],
  });
}

export function createChildLogger(
  logger: Logger,
  context: { deliveryId?: string; reviewId?: string; repo?: string; prNumber?: number; [key: string]: unknown },
): Logger {
  return logger.child(context);
}
