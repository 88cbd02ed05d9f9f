import { agentRank } from './agents/registry.js';
import { emptyIssuesByType } from './repositories/review-repository.js';
import type { Finding, IssuesByType, Severity } from './types.js';

export const DEFAULT_MAX_FINDINGS = 50;

const SEVERITY_RANK: Record<Severity, number> = {
  high: 0,
  medium: 1,
  low: 2,
  info: 3,
};

export type SynthesizedReport = {
  /** retained findings, in report order */
  findings: Finding[];
  /** size of the deduplicated set, before the cap */
  issuesFound: number;
  issuesByType: IssuesByType;
  /** deduplicated findings left out by the cap */
  omittedCount: number;
};

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Remaining fields, so that only identical findings compare equal. */
function compareRest(a: Finding, b: Finding): number {
  return (
    a.endLine - b.endLine ||
    compareText(a.category, b.category) ||
    compareText(a.message, b.message) ||
    compareText(a.title ?? '', b.title ?? '') ||
    compareText(a.suggestion ?? '', b.suggestion ?? '')
  );
}

/** Which finding survives a collision: higher severity, then agent priority. */
function compareForDedup(a: Finding, b: Finding): number {
  return (
    SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
    agentRank(a.agentName) - agentRank(b.agentName) ||
    compareText(a.file, b.file) ||
    a.line - b.line ||
    compareRest(a, b)
  );
}

/** Report order: severity desc, file asc, line asc, agent name asc. */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
    compareText(a.file, b.file) ||
    a.line - b.line ||
    compareText(a.agentName, b.agentName) ||
    compareRest(a, b)
  );
}

export function isDuplicate(a: Finding, b: Finding): boolean {
  return a.file === b.file && a.category === b.category && a.line <= b.endLine && b.line <= a.endLine;
}

/**
 * Collapse findings that share a file and category and whose line ranges
 * overlap. Candidates are visited strongest first, so each kept finding
 * outranks everything it absorbed; the visit order depends only on the
 * findings themselves, never on the order they arrived in.
 */
export function deduplicate(findings: readonly Finding[]): Finding[] {
  const candidates = [...findings].sort(compareForDedup);
  const keptByBucket = new Map<string, Finding[]>();
  const kept: Finding[] = [];

  for (const candidate of candidates) {
    const bucketKey = `${candidate.file}\u0000${candidate.category}`;
    const bucket = keptByBucket.get(bucketKey) ?? [];
    if (bucket.some((existing) => isDuplicate(existing, candidate))) continue;
    bucket.push(candidate);
    keptByBucket.set(bucketKey, bucket);
    kept.push(candidate);
  }

  return kept;
}

export function countByType(findings: readonly Finding[]): IssuesByType {
  const counts = emptyIssuesByType();
  for (const f of findings) counts[f.agentName] += 1;
  return counts;
}

export function synthesize(findings: readonly Finding[], maxFindings = DEFAULT_MAX_FINDINGS): SynthesizedReport {
  const ordered = deduplicate(findings).sort(compareFindings);
  const retained = ordered.slice(0, maxFindings);

  return {
    findings: retained,
    issuesFound: ordered.length,
    issuesByType: countByType(ordered),
    omittedCount: ordered.length - retained.length,
  };
}
