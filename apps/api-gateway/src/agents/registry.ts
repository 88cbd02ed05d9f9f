import type { AgentName } from '../types.js';
import { LOGIC_PROMPT, PERFORMANCE_PROMPT, SECURITY_PROMPT, STYLE_PROMPT } from './prompts.js';

export type AgentDefinition = {
  readonly name: AgentName;
  readonly title: string;
  readonly role: string;
  readonly promptTemplate: string;
};

/** Tie-break order when two agents report the same issue at the same severity. */
export const AGENT_PRIORITY: readonly AgentName[] = Object.freeze(['security', 'logic', 'performance', 'style']);

const DEFINITIONS: Readonly<Record<AgentName, AgentDefinition>> = Object.freeze({
  style: Object.freeze({
    name: 'style',
    title: 'Style',
    role: 'style reviewer',
    promptTemplate: STYLE_PROMPT,
  }),
  security: Object.freeze({
    name: 'security',
    title: 'Security',
    role: 'security reviewer',
    promptTemplate: SECURITY_PROMPT,
  }),
  performance: Object.freeze({
    name: 'performance',
    title: 'Performance',
    role: 'performance reviewer',
    promptTemplate: PERFORMANCE_PROMPT,
  }),
  logic: Object.freeze({
    name: 'logic',
    title: 'Logic',
    role: 'logic reviewer',
    promptTemplate: LOGIC_PROMPT,
  }),
});

export function getAgent(name: AgentName): AgentDefinition {
  return DEFINITIONS[name];
}

/** Definitions for the given agents, deduplicated, in priority order. */
export function getAgents(names: readonly AgentName[]): AgentDefinition[] {
  const wanted = new Set(names);
  return AGENT_PRIORITY.filter((name) => wanted.has(name)).map(getAgent);
}

export function agentRank(name: AgentName): number {
  return AGENT_PRIORITY.indexOf(name);
}
