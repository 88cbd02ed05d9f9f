// github.ts
export interface CommentSink {
  postIssueComment(repo: string, prNumber: number, body: string): Promise<void>;
  /** Submits a review with event APPROVE at the given commit. */
  approve(repo: string, prNumber: number, commitSha: string, body: string): Promise<void>;
}

export class GitHubRequestError extends Error {
  constructor(
    public readonly status: number,
    detail: string,
  ) {
    super(`GitHub request failed: ${status} ${detail}`);
    this.name = 'GitHubRequestError';
  }
}

async function ghFetch(url: string, token: string, fetchImpl: typeof fetch, body: unknown) {
  const res = await fetchImpl(url, {
    method: 'POST',
    headers: {
      Accept: 'application/vnd.github+json',
      'User-Agent': 'panel-review',
      Authorization: `Bearer ${token}`,
      'X-GitHub-Api-Version': '2022-11-28',
      'Content-Type': 'application/json',
    },
    body: JSON.stringify(body),
  });
  if (!res.ok) {
    const text = await res.text();
    throw new GitHubRequestError(res.status, text.slice(0, 200));
  }
  return res;
}

export function createGitHubSink(opts: { token: string; baseUrl?: string; fetchImpl?: typeof fetch }): CommentSink {
  const baseUrl = opts.baseUrl ?? 'https://api.github.com';
  const fetchImpl = opts.fetchImpl ?? fetch;

  return {
    async postIssueComment(repo, prNumber, body) {
      await ghFetch(`${baseUrl}/repos/${repo}/issues/${prNumber}/comments`, opts.token, fetchImpl, { body });
    },

    async approve(repo, prNumber, commitSha, body) {
      await ghFetch(`${baseUrl}/repos/${repo}/pulls/${prNumber}/reviews`, opts.token, fetchImpl, {
        commit_id: commitSha,
        event: 'APPROVE',
        body,
      });
    },
  };
}
