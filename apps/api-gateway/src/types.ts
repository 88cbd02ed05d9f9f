export const AGENT_NAMES = ['style', 'security', 'performance', 'logic'] as const;
export type AgentName = (typeof AGENT_NAMES)[number];

export const SEVERITIES = ['info', 'low', 'medium', 'high'] as const;
export type Severity = (typeof SEVERITIES)[number];

export type OwnerType = 'User' | 'Organization';

export type InstallationSettings = Record<AgentName, boolean> & { autoApprove: boolean };

export type Installation = {
  id: string;
  externalInstallationId: number;
  ownerLogin: string;
  ownerType: OwnerType;
  encryptedApiKey: string | null;
  enabled: boolean;
  settings: InstallationSettings;
};

export type ReviewStatus = 'pending' | 'completed' | 'failed';

export type IssuesByType = Record<AgentName, number>;

export type Review = {
  id: string;
  installationId: string;
  repoFullName: string;
  prNumber: number;
  prTitle: string | null;
  commitSha: string;
  filesReviewed: number;
  issuesFound: number;
  issuesByType: IssuesByType;
  reviewDurationMs: number | null;
  status: ReviewStatus;
  errorMessage: string | null;
  createdAt?: string;
};

export type Finding = {
  agentName: AgentName;
  severity: Severity;
  file: string;
  line: number;
  endLine: number; // == line for a single-line finding
  message: string;
  category: string;
  title?: string;
  suggestion?: string;
};

export type AgentStatus = 'ok' | 'timeout' | 'error';

export type PullRequestEvent = {
  deliveryId: string;
  action: string;
  installationId: number;
  repoFullName: string;
  prNumber: number;
  prTitle: string | null;
  commitSha: string;
  ownerLogin: string;
  ownerType: OwnerType;
};

export type DiffFile = {
  filename: string;
  status: string;
  additions: number;
  deletions: number;
  patch?: string;
};

export type PullRequestDiff = {
  files: DiffFile[];
  text: string;
};

// message published to the comment queue, consumed by apps/worker
export type CommentJob = {
  id: string;
  delivery_id: string;
  review_id: string;
  installation_id: number;
  repo: string; // e.g., "owner/repo"
  pr_number: number;
  head_sha: string;
  body: string;
  approve: boolean;
};
