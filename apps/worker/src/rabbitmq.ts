import amqp from 'amqplib';
import type { Channel, ConsumeMessage } from 'amqplib';
import type { Logger } from './logger.js';

export type MessageHandler = (msg: ConsumeMessage) => Promise<void>;

export type Consumer = {
  close(): Promise<void>;
};

/**
 * Wraps a handler with the ack policy: ack once it resolves, nack without
 * requeue when it throws (the broker dead-letters the message if configured).
 */
export function withAck(ch: Pick<Channel, 'ack' | 'nack'>, handler: MessageHandler, logger: Logger) {
  return async (msg: ConsumeMessage | null): Promise<void> => {
    if (!msg) return;
    try {
      await handler(msg);
      ch.ack(msg);
    } catch (err) {
      logger.error({ err, messageId: msg.properties.messageId }, 'handler error, message dropped');
      ch.nack(msg, false, false);
    }
  };
}

export async function consume(opts: {
  url: string;
  queue: string;
  prefetch: number;
  logger: Logger;
  handler: MessageHandler;
}): Promise<Consumer> {
  const conn = await amqp.connect(opts.url);
  const ch = await conn.createChannel();
  await ch.assertQueue(opts.queue, { durable: true });
  await ch.prefetch(opts.prefetch);

  conn.on('error', (e: unknown) => opts.logger.error({ err: e }, 'RabbitMQ connection error'));

  const onMessage = withAck(ch, opts.handler, opts.logger);
  await ch.consume(opts.queue, (msg) => {
    onMessage(msg).catch((e: unknown) => opts.logger.error({ err: e }, 'ack failed'));
  });
  opts.logger.info({ queue: opts.queue, prefetch: opts.prefetch }, 'consuming');

  return {
    async close() {
      await ch.close();
      await conn.close();
    },
  };
}
