import { z } from 'zod';

const configSchema = z.object({
  rabbitmqUrl: z.string().min(1, 'RABBITMQ_URL is required'),
  commentQueue: z.string().min(1).default('review_comments'),
  githubToken: z.string().min(1, 'GITHUB_TOKEN is required'),
  githubApiUrl: z.string().url().default('https://api.github.com'),
  prefetch: z.coerce.number().int().positive().default(10),
  logLevel: z.string().default('info'),
});

export type WorkerConfig = Readonly<z.infer<typeof configSchema>>;

export function parseConfig(env: NodeJS.ProcessEnv): { ok: true; config: WorkerConfig } | { ok: false; issues: string[] } {
  const result = configSchema.safeParse({
    rabbitmqUrl: env.RABBITMQ_URL,
    commentQueue: env.COMMENT_QUEUE,
    githubToken: env.GITHUB_TOKEN,
    githubApiUrl: env.GITHUB_API_URL,
    prefetch: env.WORKER_PREFETCH,
    logLevel: env.LOG_LEVEL,
  });
  if (!result.success) {
    return { ok: false, issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) };
  }
  return { ok: true, config: Object.freeze(result.data) };
}

export function loadConfig(): WorkerConfig {
  const result = parseConfig(process.env);
  if (!result.ok) {
    console.error(`FATAL: invalid configuration\n  ${result.issues.join('\n  ')}`);
    process.exit(1);
  }
  return result.config;
}
