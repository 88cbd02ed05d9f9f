import type { AgentDefinition } from './registry.js';

const MAX_DIFF_LENGTH = 100_000;

const RESPONSE_FORMAT = `## Response format
Respond with a JSON array of issues. Each issue has:
- "file": path of the file the issue is in, exactly as shown in the diff header
- "line_start": integer, 1-indexed line in the new version of the file
- "line_end": integer or null (null for a single line)
- "severity": one of "critical", "high", "medium", "low", "info"
- "category": short lowercase label for the kind of issue (optional)
- "title": short title, at most 100 characters
- "description": explanation of the issue
- "suggestion": how to fix it (optional)

If there are no issues, return [].
Return ONLY the JSON array, no other text.`;

/** Cuts at `max` UTF-16 units without splitting a surrogate pair. */
function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  const last = text.charCodeAt(max - 1);
  const end = last >= 0xd800 && last <= 0xdbff ? max - 1 : max;
  return text.slice(0, end) + '\n\n... (diff truncated)';
}

export function buildAgentPrompt(agent: AgentDefinition, diff: string): string {
  const body = truncate(diff, MAX_DIFF_LENGTH);

  return `${agent.promptTemplate}

## Changes to review
Only comment on added or modified lines (prefixed with "+").

\`\`\`diff
${body}
\`\`\`

${RESPONSE_FORMAT}
`;
}
