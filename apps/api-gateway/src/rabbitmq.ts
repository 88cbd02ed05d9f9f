import amqp from 'amqplib';
import type { Channel } from 'amqplib';
import type { Logger } from './logger.js';
import type { CommentJob } from './types.js';

export interface CommentPublisher {
  publish(job: CommentJob): Promise<void>;
  close(): Promise<void>;
}

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

export async function createCommentPublisher(opts: {
  url: string;
  queue: string;
  logger: Logger;
  attempts?: number;
  retryDelayMs?: number;
}): Promise<CommentPublisher> {
  let ch: Channel | null = null;

  async function getChannel(): Promise<Channel> {
    if (ch) return ch;

    const conn = await amqp.connect(opts.url);
    const channel = await conn.createChannel();
    await channel.assertQueue(opts.queue, { durable: true });

    // if the connection drops, forget the cached channel
    conn.on('close', () => {
      ch = null;
    });
    conn.on('error', (e: unknown) => {
      opts.logger.warn({ err: e }, 'RabbitMQ connection error');
      ch = null;
    });

    ch = channel;
    return channel;
  }

  const attempts = opts.attempts ?? 20;
  for (let i = 1; ; i++) {
    try {
      await getChannel();
      opts.logger.info({ queue: opts.queue }, 'RabbitMQ channel ready');
      break;
    } catch (e) {
      opts.logger.error({ err: e, attempt: i }, 'RabbitMQ connect attempt failed');
      if (i >= attempts) throw new Error('Could not connect to RabbitMQ after retries');
      await sleep(opts.retryDelayMs ?? 1500);
    }
  }

  return {
    async publish(job) {
      const channel = await getChannel();
      const written = channel.sendToQueue(opts.queue, Buffer.from(JSON.stringify(job)), {
        persistent: true,
        messageId: job.id,
        contentType: 'application/json',
      });
      if (!written) {
        opts.logger.warn({ jobId: job.id }, 'RabbitMQ write buffer full, message queued in memory');
      }
    },

    async close() {
      try {
        await ch?.close();
      } finally {
        ch = null;
      }
    },
  };
}
