import { v4 as uuidv4 } from 'uuid';
import type { Queryable } from '../db.js';
import { AGENT_NAMES } from '../types.js';
import type { IssuesByType, Review, ReviewStatus } from '../types.js';

export type NewReview = {
  installationId: string;
  repoFullName: string;
  prNumber: number;
  prTitle: string | null;
  commitSha: string;
};

type OutcomeCounts = {
  filesReviewed: number;
  issuesFound: number;
  issuesByType: IssuesByType;
  reviewDurationMs: number;
};

export type ReviewOutcome =
  | ({ status: 'completed' } & OutcomeCounts)
  | ({ status: 'failed'; errorMessage: string } & OutcomeCounts);

export type ReviewStats = {
  totalReviews: number;
  totalIssuesFound: number;
  avgIssuesPerReview: number;
};

export interface ReviewRepository {
  create(input: NewReview): Promise<Review>;
  /** Writes the outcome only while the row is still pending; false when nothing changed. */
  finalize(reviewId: string, outcome: ReviewOutcome): Promise<boolean>;
  findById(reviewId: string): Promise<Review | null>;
  stats(installationId: string, days: number): Promise<ReviewStats>;
}

export function emptyIssuesByType(): IssuesByType {
  return { style: 0, security: 0, performance: 0, logic: 0 };
}

function toIssuesByType(raw: unknown): IssuesByType {
  const counts = emptyIssuesByType();
  if (raw !== null && typeof raw === 'object') {
    for (const name of AGENT_NAMES) {
      const value: unknown = Reflect.get(raw, name);
      if (typeof value === 'number' && Number.isFinite(value)) counts[name] = value;
    }
  }
  return counts;
}

type ReviewRow = {
  id: string;
  installation_id: string;
  repo_full_name: string;
  pr_number: number;
  pr_title: string | null;
  commit_sha: string;
  files_reviewed: number;
  issues_found: number;
  issues_by_type: unknown;
  review_duration_ms: number | null;
  status: ReviewStatus;
  error_message: string | null;
  created_at: Date | string;
};

const COLUMNS = `id, installation_id, repo_full_name, pr_number, pr_title, commit_sha, files_reviewed,
  issues_found, issues_by_type, review_duration_ms, status, error_message, created_at`;

function toReview(row: ReviewRow): Review {
  return {
    id: row.id,
    installationId: row.installation_id,
    repoFullName: row.repo_full_name,
    prNumber: row.pr_number,
    prTitle: row.pr_title,
    commitSha: row.commit_sha,
    filesReviewed: row.files_reviewed,
    issuesFound: row.issues_found,
    issuesByType: toIssuesByType(row.issues_by_type),
    reviewDurationMs: row.review_duration_ms,
    status: row.status,
    errorMessage: row.error_message,
    createdAt: row.created_at instanceof Date ? row.created_at.toISOString() : row.created_at,
  };
}

export function createReviewRepository(db: Queryable): ReviewRepository {
  return {
    async create(input) {
      const rows = await db.query<ReviewRow>(
        `INSERT INTO reviews (id, installation_id, repo_full_name, pr_number, pr_title, commit_sha, issues_by_type, status)
         VALUES ($1, $2, $3, $4, $5, $6, $7, 'pending')
         RETURNING ${COLUMNS}`,
        [
          uuidv4(),
          input.installationId,
          input.repoFullName,
          input.prNumber,
          input.prTitle,
          input.commitSha,
          emptyIssuesByType(),
        ],
      );
      return toReview(rows[0]);
    },

    async finalize(reviewId, outcome) {
      const rows = await db.query<{ id: string }>(
        `UPDATE reviews
         SET status = $2,
             files_reviewed = $3,
             issues_found = $4,
             issues_by_type = $5,
             review_duration_ms = $6,
             error_message = $7
         WHERE id = $1 AND status = 'pending'
         RETURNING id`,
        [
          reviewId,
          outcome.status,
          outcome.filesReviewed,
          outcome.issuesFound,
          outcome.issuesByType,
          outcome.reviewDurationMs,
          outcome.status === 'failed' ? outcome.errorMessage : null,
        ],
      );
      return rows.length > 0;
    },

    async findById(reviewId) {
      const rows = await db.query<ReviewRow>(`SELECT ${COLUMNS} FROM reviews WHERE id = $1`, [reviewId]);
      return rows.length ? toReview(rows[0]) : null;
    },

    async stats(installationId, days) {
      const rows = await db.query<{ total_reviews: string; total_issues: string | null }>(
        `SELECT COUNT(*) AS total_reviews, COALESCE(SUM(issues_found), 0) AS total_issues
         FROM reviews
         WHERE installation_id = $1 AND created_at >= NOW() - make_interval(days => $2)`,
        [installationId, days],
      );
      const totalReviews = Number(rows[0]?.total_reviews ?? 0);
      const totalIssuesFound = Number(rows[0]?.total_issues ?? 0);
      return {
        totalReviews,
        totalIssuesFound,
        avgIssuesPerReview: totalReviews ? totalIssuesFound / totalReviews : 0,
      };
    },
  };
}
