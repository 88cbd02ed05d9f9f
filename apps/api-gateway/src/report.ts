import { getAgent } from './agents/registry.js';
import type { SynthesizedReport } from './synthesizer.js';
import type { AgentName, Finding, Severity } from './types.js';

const SEVERITY_ICON: Record<Severity, string> = {
  high: '🔴',
  medium: '🟡',
  low: '🔵',
  info: '⚪',
};

export const REPORT_HEADER = '## 🔍 Automated code review';

function joinWords(words: string[]): string {
  if (words.length <= 1) return words.join('');
  return `${words.slice(0, -1).join(', ')} and ${words[words.length - 1]}`;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

function location(f: Finding): string {
  return f.endLine > f.line ? `${f.file}:${f.line}-${f.endLine}` : `${f.file}:${f.line}`;
}

function heading(category: string): string {
  return category
    .split(/[\s_-]+/)
    .filter(Boolean)
    .map((w) => w[0].toUpperCase() + w.slice(1))
    .join(' ');
}

export function renderFinding(f: Finding): string {
  const head = f.title && f.title !== f.message ? `**${f.title}** ${f.message}` : f.message;
  const lines = [`- ${SEVERITY_ICON[f.severity]} **${f.severity}** · \`${location(f)}\` · ${head}`];
  if (f.suggestion) lines.push(`  - Suggestion: ${f.suggestion}`);
  return lines.join('\n');
}

/** Group findings by category, keeping report order inside and between groups. */
export function groupByCategory(findings: readonly Finding[]): Map<string, Finding[]> {
  const groups = new Map<string, Finding[]>();
  for (const f of findings) {
    const group = groups.get(f.category);
    if (group) group.push(f);
    else groups.set(f.category, [f]);
  }
  return groups;
}

/**
 * The comment posted on the pull request. Only agents that answered are
 * named; agents that failed or timed out are left out of the body.
 */
export function renderReport(
  report: SynthesizedReport,
  ctx: { filesReviewed: number; agentsRun: readonly AgentName[] },
): string {
  const agentWords = ctx.agentsRun.map((name) => getAgent(name).title.toLowerCase());
  const found = report.issuesFound === 0 ? 'found no issues.' : `found **${plural(report.issuesFound, 'issue')}**.`;
  const parts = [
    REPORT_HEADER,
    `Reviewed ${plural(ctx.filesReviewed, 'file')} with the ${joinWords(agentWords)} ${
      agentWords.length === 1 ? 'agent' : 'agents'
    } and ${found}`,
  ];

  for (const [category, findings] of groupByCategory(report.findings)) {
    // a category made only of separators falls back to the agent that raised it
    const title = heading(category) || getAgent(findings[0].agentName).title;
    parts.push(`### ${title}\n\n${findings.map(renderFinding).join('\n')}`);
  }

  if (report.omittedCount > 0) {
    parts.push(`_…and ${plural(report.omittedCount, 'more finding')} not shown._`);
  }

  return parts.join('\n\n') + '\n';
}

export function renderAllAgentsFailedComment(): string {
  return [
    REPORT_HEADER,
    'The review could not be completed: none of the review agents returned a result for this change.',
    'This usually means the configured model API key was rejected or the model provider is unavailable. ' +
      'Check the key in the review app settings, then push a new commit to retry.',
  ].join('\n\n') + '\n';
}

export function renderConfigurationComment(message: string): string {
  return [REPORT_HEADER, `The review was skipped. ${message}`].join('\n\n') + '\n';
}

/** Approval is only offered when nothing at medium or above was found. */
export function isApprovable(report: SynthesizedReport): boolean {
  return report.findings.every((f) => f.severity === 'low' || f.severity === 'info');
}
