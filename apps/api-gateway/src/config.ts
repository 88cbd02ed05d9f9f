import { z } from 'zod';

const configSchema = z.object({
  port: z.coerce.number().int().positive().default(8080),
  databaseUrl: z.string().min(1, 'DATABASE_URL is required'),
  rabbitmqUrl: z.string().min(1, 'RABBITMQ_URL is required'),
  commentQueue: z.string().min(1).default('review_comments'),
  webhookSecret: z.string().min(1, 'GITHUB_WEBHOOK_SECRET is required'),
  githubToken: z.string().default(''),
  encryptionKey: z
    .string()
    .regex(/^[0-9a-fA-F]{64}$/, 'ENCRYPTION_KEY must be 64 hex characters (32 bytes)'),
  modelName: z.string().min(1).default('gemini-2.0-flash'),
  modelBaseUrl: z.string().url().default('https://generativelanguage.googleapis.com/v1beta'),
  agentTimeoutMs: z.coerce.number().int().positive().default(30_000),
  runDeadlineMs: z.coerce.number().int().positive().default(60_000),
  agentMaxRetries: z.coerce.number().int().min(0).max(5).default(2),
  retryBaseDelayMs: z.coerce.number().int().min(0).default(1_000),
  maxReportFindings: z.coerce.number().int().positive().default(50),
  logLevel: z.string().default('info'),
});

export type AppConfig = Readonly<z.infer<typeof configSchema>>;

export type ConfigResult = { ok: true; config: AppConfig } | { ok: false; issues: string[] };

export function parseConfig(env: NodeJS.ProcessEnv): ConfigResult {
  const result = configSchema.safeParse({
    port: env.PORT,
    databaseUrl: env.DATABASE_URL,
    rabbitmqUrl: env.RABBITMQ_URL,
    commentQueue: env.COMMENT_QUEUE,
    webhookSecret: env.GITHUB_WEBHOOK_SECRET,
    githubToken: env.GITHUB_TOKEN,
    encryptionKey: env.ENCRYPTION_KEY,
    modelName: env.MODEL_NAME,
    modelBaseUrl: env.MODEL_BASE_URL,
    agentTimeoutMs: env.AGENT_TIMEOUT_MS,
    runDeadlineMs: env.RUN_DEADLINE_MS,
    agentMaxRetries: env.AGENT_MAX_RETRIES,
    retryBaseDelayMs: env.RETRY_BASE_DELAY_MS,
    maxReportFindings: env.MAX_REPORT_FINDINGS,
    logLevel: env.LOG_LEVEL,
  });

  if (!result.success) {
    return {
      ok: false,
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    };
  }
  return { ok: true, config: Object.freeze(result.data) };
}

/**
 * Read and validate process configuration once at startup.
 * Exits the process when required settings are missing.
 */
export function loadConfig(): AppConfig {
  const result = parseConfig(process.env);
  if (!result.ok) {
    console.error(`FATAL: invalid configuration\n  ${result.issues.join('\n  ')}`);
    process.exit(1);
  }
  return result.config;
}
