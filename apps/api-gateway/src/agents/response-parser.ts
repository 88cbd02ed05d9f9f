import { z } from 'zod';
import { SynthesisParseError, err, ok } from '../errors.js';
import type { Result } from '../errors.js';
import type { AgentName, Finding, Severity } from '../types.js';

const SEVERITY_MAP: Record<string, Severity> = {
  critical: 'high',
  high: 'high',
  medium: 'medium',
  low: 'low',
  info: 'info',
};

const lineNumber = z.preprocess(
  (v) => (typeof v === 'string' && /^\d+$/.test(v.trim()) ? Number(v) : v),
  z.number().int().positive(),
);

const rawIssueSchema = z.object({
  file: z.string().trim().min(1).optional(),
  line_start: lineNumber.optional(),
  line_end: lineNumber.nullish(),
  severity: z.string(),
  category: z.string().nullish(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  suggestion: z.string().nullish(),
});

/** Strip markdown fences and cut the outermost JSON array out of a model reply. */
export function extractJsonArray(text: string): string {
  let body = text.trim();
  if (body.startsWith('```json')) body = body.slice(7);
  else if (body.startsWith('```')) body = body.slice(3);
  if (body.endsWith('```')) body = body.slice(0, -3);
  body = body.trim();

  if (!body.startsWith('[')) {
    const start = body.indexOf('[');
    const end = body.lastIndexOf(']');
    if (start !== -1 && end > start) body = body.slice(start, end + 1);
  }
  return body;
}

/**
 * Turn one agent's raw reply into findings. A reply that is not a JSON array
 * is a parse error; individual items that don't validate are skipped.
 */
export function parseAgentResponse(
  agentName: AgentName,
  text: string,
  diffFiles: readonly string[],
): Result<Finding[], SynthesisParseError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonArray(text));
  } catch (e) {
    return err(new SynthesisParseError(agentName, e instanceof Error ? e.message : 'invalid JSON'));
  }

  if (!Array.isArray(parsed)) {
    return err(new SynthesisParseError(agentName, 'expected a JSON array of issues'));
  }

  const findings: Finding[] = [];
  for (const item of parsed) {
    const issue = rawIssueSchema.safeParse(item);
    if (!issue.success) continue;

    const severity = SEVERITY_MAP[issue.data.severity.trim().toLowerCase()];
    if (!severity) continue;

    const file = issue.data.file ?? (diffFiles.length === 1 ? diffFiles[0] : undefined);
    if (!file) continue;

    const title = issue.data.title?.trim() || undefined;
    const message = issue.data.description?.trim() || title;
    if (!message) continue;

    const line = issue.data.line_start ?? 1;
    const endLine = Math.max(line, issue.data.line_end ?? line);

    findings.push({
      agentName,
      severity,
      file,
      line,
      endLine,
      message,
      category: issue.data.category?.trim().toLowerCase() || agentName,
      ...(title ? { title } : {}),
      ...(issue.data.suggestion?.trim() ? { suggestion: issue.data.suggestion.trim() } : {}),
    });
  }

  return ok(findings);
}
