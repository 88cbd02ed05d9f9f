import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export function createLogger(level = 'info'): Logger {
  return pino({ level, base: { service: 'worker' }, redact: ['token', 'headers.authorization'] });
}
