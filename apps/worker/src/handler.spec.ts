import pino from 'pino';
import { GitHubRequestError } from './github.js';
import type { CommentSink } from './github.js';
import { InvalidMessageError, createCommentHandler, parseCommentJob } from './handler.js';

const logger = pino({ level: 'silent' });

const job = {
  id: 'job-1',
  delivery_id: 'delivery-1',
  review_id: 'review-1',
  installation_id: 42,
  repo: 'octo-org/app',
  pr_number: 7,
  head_sha: 'abc1234',
  body: '## report',
  approve: false,
};

function message(payload: unknown) {
  return { content: Buffer.from(JSON.stringify(payload)) };
}

function fakeSink(overrides: Partial<CommentSink> = {}) {
  return {
    postIssueComment: jest.fn<Promise<void>, [string, number, string]>().mockResolvedValue(undefined),
    approve: jest.fn<Promise<void>, [string, number, string, string]>().mockResolvedValue(undefined),
    ...overrides,
  };
}

describe('parseCommentJob', () => {
  it('accepts a well-formed job', () => {
    expect(parseCommentJob(message(job).content)).toEqual(job);
  });

  it('rejects invalid JSON', () => {
    expect(() => parseCommentJob(Buffer.from('{'))).toThrow(new InvalidMessageError(['body is not valid JSON']));
  });

  it('lists what is wrong with the job', () => {
    expect(() => parseCommentJob(message({ ...job, pr_number: 'seven', body: '' }).content)).toThrow(
      'invalid comment job: pr_number: Expected number, received string; body: String must contain at least 1 character(s)',
    );
  });
});

describe('comment handler', () => {
  it('posts an issue comment', async () => {
    const github = fakeSink();
    await createCommentHandler({ github, logger })(message(job));

    expect(github.postIssueComment).toHaveBeenCalledWith('octo-org/app', 7, '## report');
    expect(github.approve).not.toHaveBeenCalled();
  });

  it('submits an approval when asked', async () => {
    const github = fakeSink();
    await createCommentHandler({ github, logger })(message({ ...job, approve: true }));

    expect(github.approve).toHaveBeenCalledWith('octo-org/app', 7, 'abc1234', '## report');
    expect(github.postIssueComment).not.toHaveBeenCalled();
  });

  it('falls back to a comment when the approval is refused', async () => {
    const github = fakeSink({
      approve: jest.fn().mockRejectedValue(new GitHubRequestError(422, 'Can not approve your own pull request')),
    });
    await createCommentHandler({ github, logger })(message({ ...job, approve: true }));

    expect(github.postIssueComment).toHaveBeenCalledWith('octo-org/app', 7, '## report');
  });

  it('propagates other failures so the message is dropped', async () => {
    const github = fakeSink({
      postIssueComment: jest.fn().mockRejectedValue(new GitHubRequestError(403, 'Resource not accessible')),
    });

    await expect(createCommentHandler({ github, logger })(message(job))).rejects.toThrow(
      'GitHub request failed: 403 Resource not accessible',
    );
  });
});
