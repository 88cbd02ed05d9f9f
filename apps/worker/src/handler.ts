import type { ConsumeMessage } from 'amqplib';
import { z } from 'zod';
import { GitHubRequestError } from './github.js';
import type { CommentSink } from './github.js';
import type { Logger } from './logger.js';

export const commentJobSchema = z.object({
  id: z.string().min(1),
  delivery_id: z.string(),
  review_id: z.string().min(1),
  installation_id: z.number().int().positive(),
  repo: z.string().regex(/^[^/\s]+\/[^/\s]+$/),
  pr_number: z.number().int().positive(),
  head_sha: z.string().min(1),
  body: z.string().min(1),
  approve: z.boolean(),
});

export type CommentJob = z.infer<typeof commentJobSchema>;

export class InvalidMessageError extends Error {
  constructor(public readonly issues: string[]) {
    super(`invalid comment job: ${issues.join('; ')}`);
    this.name = 'InvalidMessageError';
  }
}

export function parseCommentJob(content: Buffer): CommentJob {
  let raw: unknown;
  try {
    raw = JSON.parse(content.toString('utf8'));
  } catch {
    throw new InvalidMessageError(['body is not valid JSON']);
  }
  const parsed = commentJobSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidMessageError(parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`));
  }
  return parsed.data;
}

/**
 * Posts one review comment. An approval the platform refuses (for example on
 * the app's own pull request) falls back to a plain comment so the report is
 * not lost.
 */
export function createCommentHandler(deps: { github: CommentSink; logger: Logger }) {
  return async (msg: Pick<ConsumeMessage, 'content'>): Promise<void> => {
    const job = parseCommentJob(msg.content);
    const log = deps.logger.child({ jobId: job.id, reviewId: job.review_id, repo: job.repo, prNumber: job.pr_number });

    if (job.approve) {
      try {
        await deps.github.approve(job.repo, job.pr_number, job.head_sha, job.body);
        log.info('review approved');
        return;
      } catch (e) {
        if (!(e instanceof GitHubRequestError) || e.status !== 422) throw e;
        log.warn({ status: e.status }, 'approval refused, posting as comment');
      }
    }

    await deps.github.postIssueComment(job.repo, job.pr_number, job.body);
    log.info('review comment posted');
  };
}
