import { PersistenceError } from './errors.js';
import type { Logger } from './logger.js';
import type { ReviewOutcome, ReviewRepository } from './repositories/review-repository.js';
import { AGENT_NAMES } from './types.js';

export interface ReviewRecorder {
  /** Never throws; false when the row was not written. */
  finalize(reviewId: string, outcome: ReviewOutcome): Promise<boolean>;
}

export function createReviewRecorder(deps: { reviews: Pick<ReviewRepository, 'finalize'>; logger: Logger }): ReviewRecorder {
  return {
    async finalize(reviewId, outcome) {
      const log = deps.logger.child({ reviewId });

      const sum = AGENT_NAMES.reduce((acc, name) => acc + outcome.issuesByType[name], 0);
      if (sum !== outcome.issuesFound) {
        log.error({ sum, issuesFound: outcome.issuesFound }, 'issuesByType does not add up to issuesFound');
        return false;
      }

      try {
        const written = await deps.reviews.finalize(reviewId, outcome);
        if (!written) {
          log.warn({ status: outcome.status }, 'review already finalized, outcome not written');
          return false;
        }
        log.info(
          { status: outcome.status, issuesFound: outcome.issuesFound, reviewDurationMs: outcome.reviewDurationMs },
          'review recorded',
        );
        return true;
      } catch (e) {
        const error = new PersistenceError('finalize review', e);
        log.error({ err: error, code: error.code }, 'failed to record review outcome');
        return false;
      }
    },
  };
}
