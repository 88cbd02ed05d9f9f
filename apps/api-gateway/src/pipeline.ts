import { v4 as uuidv4 } from 'uuid';
import type { CredentialVault, ScopedCredential } from './credential-vault.js';
import type { AgentDispatcher, DispatchResult } from './dispatcher.js';
import { DiffUnavailableError, RunDeadlineError, errorMessage } from './errors.js';
import type { AllAgentsFailedError, Result, ReviewErrorCode } from './errors.js';
import type { PullRequestSource } from './github.js';
import { createChildLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { CommentPublisher } from './rabbitmq.js';
import type { ReviewRecorder } from './recorder.js';
import { emptyIssuesByType } from './repositories/review-repository.js';
import {
  isApprovable,
  renderAllAgentsFailedComment,
  renderConfigurationComment,
  renderReport,
} from './report.js';
import { enabledAgents } from './settings.js';
import { DEFAULT_MAX_FINDINGS, synthesize } from './synthesizer.js';
import type { Installation, PullRequestDiff, PullRequestEvent, Review } from './types.js';

export type PipelineOutcome = {
  reviewId: string;
  status: 'completed' | 'failed';
  issuesFound: number;
  errorCode?: ReviewErrorCode | 'INTERNAL';
  commentPublished: boolean;
};

export interface ReviewPipeline {
  run(event: PullRequestEvent, installation: Installation, review: Review): Promise<PipelineOutcome>;
}

export type PipelineDeps = {
  vault: Pick<CredentialVault, 'withCredential'>;
  source: PullRequestSource;
  dispatcher: AgentDispatcher;
  recorder: ReviewRecorder;
  publisher: Pick<CommentPublisher, 'publish'>;
  logger: Logger;
  maxFindings?: number;
  /** wall-clock budget for one run, diff fetch included */
  deadlineMs?: number;
  now?: () => number;
};

export const DEFAULT_RUN_DEADLINE_MS = 60_000;

type Gathered =
  | { kind: 'unavailable'; error: DiffUnavailableError | RunDeadlineError }
  | { kind: 'nothing'; filesReviewed: number; agents: number }
  | { kind: 'dispatched'; filesReviewed: number; result: Result<DispatchResult, AllAgentsFailedError> };

type Raced<T> = { reached: false; value: T } | { reached: true };

/** Settles with the work's value, or as soon as `signal` aborts, whichever comes first. */
function raceDeadline<T>(work: Promise<T>, signal: AbortSignal): Promise<Raced<T>> {
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve({ reached: true });
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve({ reached: false, value });
      },
      (e: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(e);
      },
    );
  });
}

/**
 * One run per pull request delivery: credential, diff, agents, synthesis,
 * outcome record, then the rendered comment goes to the queue. A single run
 * deadline covers the diff fetch and the dispatch. Recording and
 * publishing are independent; a failure in one never skips the other.
 */
export function createReviewPipeline(deps: PipelineDeps): ReviewPipeline {
  const now = deps.now ?? Date.now;
  const maxFindings = deps.maxFindings ?? DEFAULT_MAX_FINDINGS;
  const deadlineMs = deps.deadlineMs ?? DEFAULT_RUN_DEADLINE_MS;

  return {
    async run(event, installation, review) {
      const startedAt = now();
      const log = createChildLogger(deps.logger, {
        deliveryId: event.deliveryId,
        reviewId: review.id,
        repo: event.repoFullName,
        prNumber: event.prNumber,
      });
      const elapsed = () => Math.max(0, Math.round(now() - startedAt));

      async function handOff(body: string, approve: boolean): Promise<boolean> {
        try {
          await deps.publisher.publish({
            id: uuidv4(),
            delivery_id: event.deliveryId,
            review_id: review.id,
            installation_id: event.installationId,
            repo: event.repoFullName,
            pr_number: event.prNumber,
            head_sha: event.commitSha,
            body,
            approve,
          });
          return true;
        } catch (e) {
          log.error({ err: e }, 'failed to hand review comment to the queue');
          return false;
        }
      }

      async function fail(
        code: ReviewErrorCode | 'INTERNAL',
        message: string,
        filesReviewed: number,
        comment?: string,
      ): Promise<PipelineOutcome> {
        await deps.recorder.finalize(review.id, {
          status: 'failed',
          errorMessage: message,
          filesReviewed,
          issuesFound: 0,
          issuesByType: emptyIssuesByType(),
          reviewDurationMs: elapsed(),
        });
        const commentPublished = comment ? await handOff(comment, false) : false;
        return { reviewId: review.id, status: 'failed', issuesFound: 0, errorCode: code, commentPublished };
      }

      const deadline = new AbortController();
      const deadlineTimer = setTimeout(() => deadline.abort(), deadlineMs);

      // credential first, so a missing key is reported whatever the diff holds
      async function gather(credential: ScopedCredential): Promise<Gathered> {
        const agents = enabledAgents(installation.settings);

        let diff: PullRequestDiff;
        try {
          const fetched = await raceDeadline(
            deps.source.fetchDiff(event.repoFullName, event.prNumber, deadline.signal),
            deadline.signal,
          );
          if (fetched.reached) return { kind: 'unavailable', error: new RunDeadlineError(deadlineMs, 'diff fetch') };
          diff = fetched.value;
        } catch (e) {
          if (deadline.signal.aborted) return { kind: 'unavailable', error: new RunDeadlineError(deadlineMs, 'diff fetch') };
          return { kind: 'unavailable', error: new DiffUnavailableError(errorMessage(e), e) };
        }

        const filesReviewed = diff.files.length;
        if (agents.length === 0 || filesReviewed === 0) {
          return { kind: 'nothing', filesReviewed, agents: agents.length };
        }

        const result = await deps.dispatcher.run({ diff, agents, credential, signal: deadline.signal });
        return { kind: 'dispatched', filesReviewed, result };
      }

      try {
        const gathered = await deps.vault.withCredential(event.installationId, gather);

        if (!gathered.ok) {
          log.warn({ code: gathered.error.code }, 'credential unavailable, review skipped');
          return await fail(gathered.error.code, gathered.error.message, 0, renderConfigurationComment(gathered.error.message));
        }

        const step = gathered.value;
        if (step.kind === 'unavailable') {
          log.error({ err: step.error }, 'diff fetch failed');
          return await fail(step.error.code, step.error.message, 0);
        }

        if (step.kind === 'nothing') {
          log.info({ agents: step.agents, filesReviewed: step.filesReviewed }, 'nothing to review');
          await deps.recorder.finalize(review.id, {
            status: 'completed',
            filesReviewed: step.filesReviewed,
            issuesFound: 0,
            issuesByType: emptyIssuesByType(),
            reviewDurationMs: elapsed(),
          });
          return { reviewId: review.id, status: 'completed', issuesFound: 0, commentPublished: false };
        }

        const { filesReviewed, result } = step;
        if (!result.ok) {
          log.warn({ statuses: result.error.statuses }, 'every agent failed');
          return await fail(result.error.code, result.error.message, filesReviewed, renderAllAgentsFailedComment());
        }

        const report = synthesize(result.value.findings, maxFindings);
        const agentsRun = result.value.runs.filter((r) => r.status === 'ok').map((r) => r.agent);
        const body = renderReport(report, { filesReviewed, agentsRun });

        await deps.recorder.finalize(review.id, {
          status: 'completed',
          filesReviewed,
          issuesFound: report.issuesFound,
          issuesByType: report.issuesByType,
          reviewDurationMs: elapsed(),
        });

        const approve = installation.settings.autoApprove && isApprovable(report);
        const commentPublished = await handOff(body, approve);

        log.info({ issuesFound: report.issuesFound, omitted: report.omittedCount, commentPublished }, 'review complete');
        return { reviewId: review.id, status: 'completed', issuesFound: report.issuesFound, commentPublished };
      } catch (e) {
        log.error({ err: e }, 'review pipeline crashed');
        return fail('INTERNAL', 'internal error while reviewing this pull request', 0);
      } finally {
        clearTimeout(deadlineTimer);
      }
    },
  };
}
