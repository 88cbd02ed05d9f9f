// github.ts
import { z } from 'zod';
import type { DiffFile, PullRequestDiff } from './types.js';

const prFileSchema = z.object({
  filename: z.string(),
  status: z.string(),
  additions: z.number().optional(),
  deletions: z.number().optional(),
  patch: z.string().optional(),
});

type GitHubPRFile = z.infer<typeof prFileSchema>;

export interface PullRequestSource {
  fetchDiff(repo: string, prNumber: number, signal?: AbortSignal): Promise<PullRequestDiff>;
}

const PER_PAGE = 100;
const MAX_PAGES = 3; // the files endpoint stops at 300 entries anyway

const SUPPORTED_EXTENSIONS = [
  '.py', '.js', '.ts', '.jsx', '.tsx', '.mjs', '.cjs',
  '.go', '.rs', '.java', '.rb', '.php',
  '.c', '.h', '.cpp', '.cs', '.swift', '.kt', '.scala', '.sql',
];

const SKIP_PATTERNS = [
  'package-lock.json',
  'yarn.lock',
  'pnpm-lock.yaml',
  'poetry.lock',
  'Pipfile.lock',
  '.min.js',
  '.min.css',
  '.d.ts',
  'vendor/',
  'node_modules/',
  'dist/',
  '__pycache__/',
  '__generated__/',
  '.git/',
];

export function isReviewableFile(filename: string): boolean {
  if (SKIP_PATTERNS.some((pattern) => filename.includes(pattern))) return false;
  return SUPPORTED_EXTENSIONS.some((ext) => filename.endsWith(ext));
}

/** Concatenate per-file patches into one diff, each under a `--- a/ +++ b/` header. */
export function buildDiffText(files: readonly DiffFile[]): string {
  return files
    .map((f) => `--- a/${f.filename}\n+++ b/${f.filename}\n${f.patch ?? ''}`.trimEnd())
    .join('\n\n');
}

export async function ghFetch(url: string, token: string, fetchImpl: typeof fetch = fetch, init: RequestInit = {}) {
  const res = await fetchImpl(url, {
    ...init,
    headers: {
      Accept: 'application/vnd.github+json',
      'User-Agent': 'panel-review',
      ...(token ? { Authorization: `Bearer ${token}` } : {}),
      'X-GitHub-Api-Version': '2022-11-28',
      ...(init.body ? { 'Content-Type': 'application/json' } : {}),
    },
  });
  if (!res.ok) {
    const text = await res.text();
    throw new Error(`GitHub request failed: ${res.status} ${text.slice(0, 200)}`);
  }
  return res;
}

export function createGitHubSource(opts: {
  token: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}): PullRequestSource {
  const baseUrl = opts.baseUrl ?? 'https://api.github.com';

  return {
    async fetchDiff(repo, prNumber, signal) {
      const listed: GitHubPRFile[] = [];
      for (let page = 1; page <= MAX_PAGES; page++) {
        const url = `${baseUrl}/repos/${repo}/pulls/${prNumber}/files?per_page=${PER_PAGE}&page=${page}`;
        const res = await ghFetch(url, opts.token, opts.fetchImpl, { signal });
        const batch: unknown = await res.json();
        if (!Array.isArray(batch)) throw new Error('GitHub files response was not an array');
        for (const item of batch) {
          const parsed = prFileSchema.safeParse(item);
          if (parsed.success) listed.push(parsed.data);
        }
        if (batch.length < PER_PAGE) break;
      }

      // removed files and binary files (no patch) have nothing to review
      const files: DiffFile[] = listed
        .filter((f) => f.status !== 'removed' && f.patch && isReviewableFile(f.filename))
        .map((f) => ({
          filename: f.filename,
          status: f.status,
          additions: f.additions ?? 0,
          deletions: f.deletions ?? 0,
          patch: f.patch,
        }));

      return { files, text: buildDiffText(files) };
    },
  };
}
