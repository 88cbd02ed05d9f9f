import pLimit from 'p-limit';
import { buildAgentPrompt } from './agents/prompt-builder.js';
import { getAgents } from './agents/registry.js';
import type { AgentDefinition } from './agents/registry.js';
import { parseAgentResponse } from './agents/response-parser.js';
import type { ScopedCredential } from './credential-vault.js';
import { AllAgentsFailedError, err, errorMessage, ok } from './errors.js';
import type { Result } from './errors.js';
import type { ModelCallResult, ModelClient } from './llm/model-client.js';
import type { Logger } from './logger.js';
import type { AgentName, AgentStatus, Finding, PullRequestDiff } from './types.js';

export type DispatchOptions = {
  /** ceiling for one model call */
  callTimeoutMs: number;
  /** wall-clock budget for the whole dispatch */
  deadlineMs: number;
  /** additional attempts after the first, transient failures only */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const DEFAULT_DISPATCH_OPTIONS: DispatchOptions = {
  callTimeoutMs: 30_000,
  deadlineMs: 60_000,
  maxRetries: 2,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
};

export type DispatchInput = {
  diff: PullRequestDiff;
  agents: readonly AgentName[];
  credential: ScopedCredential;
  /** run-level deadline owned by the caller; aborting it ends the dispatch early */
  signal?: AbortSignal;
};

export type AgentRun = {
  agent: AgentName;
  status: AgentStatus;
  findings: Finding[];
  attempts: number;
  reason?: string;
};

export type DispatchResult = {
  findings: Finding[];
  perAgentStatus: Partial<Record<AgentName, AgentStatus>>;
  runs: AgentRun[];
};

export interface AgentDispatcher {
  run(input: DispatchInput): Promise<Result<DispatchResult, AllAgentsFailedError>>;
}

type AttemptResult = ModelCallResult | { kind: 'timeout' };

export function calculateBackoffDelay(attempt: number, baseDelay: number, maxDelay: number): number {
  return Math.min(baseDelay * Math.pow(2, attempt), maxDelay);
}

/** Resolves true after `ms`, or false as soon as `signal` aborts. */
function sleepUnlessAborted(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export function createAgentDispatcher(deps: {
  model: ModelClient;
  logger: Logger;
  options?: Partial<DispatchOptions>;
}): AgentDispatcher {
  const options: DispatchOptions = { ...DEFAULT_DISPATCH_OPTIONS, ...deps.options };
  const { model, logger } = deps;

  /**
   * One model call raced against the per-call timeout and the run deadline.
   * Whichever settles first wins; the losing call is aborted and ignored.
   */
  function attemptCall(agent: AgentDefinition, prompt: string, apiKey: string, deadline: AbortSignal): Promise<AttemptResult> {
    if (deadline.aborted) return Promise.resolve({ kind: 'timeout' });

    const controller = new AbortController();
    return new Promise<AttemptResult>((resolve) => {
      let settled = false;
      const finish = (result: AttemptResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        deadline.removeEventListener('abort', onDeadline);
        controller.abort();
        resolve(result);
      };
      const onDeadline = () => finish({ kind: 'timeout' });
      const timer = setTimeout(() => finish({ kind: 'timeout' }), options.callTimeoutMs);
      deadline.addEventListener('abort', onDeadline, { once: true });

      model
        .invoke({ role: agent.role, prompt, apiKey, signal: controller.signal })
        .then(finish, (e: unknown) => finish({ kind: 'transient', reason: errorMessage(e) }));
    });
  }

  async function runAgent(
    agent: AgentDefinition,
    input: DispatchInput,
    deadline: AbortSignal,
  ): Promise<AgentRun> {
    const log = logger.child({ agent: agent.name });
    const prompt = buildAgentPrompt(agent, input.diff.text);
    const diffFiles = input.diff.files.map((f) => f.filename);

    for (let attempt = 0; ; attempt++) {
      if (deadline.aborted) {
        return { agent: agent.name, status: 'timeout', findings: [], attempts: attempt, reason: 'run deadline reached' };
      }

      const result = await attemptCall(agent, prompt, input.credential.reveal(), deadline);
      const attempts = attempt + 1;

      if (result.kind === 'ok') {
        const parsed = parseAgentResponse(agent.name, result.text, diffFiles);
        if (!parsed.ok) {
          log.warn({ attempts, err: parsed.error.message }, 'agent response dropped');
          return { agent: agent.name, status: 'error', findings: [], attempts, reason: parsed.error.message };
        }
        return { agent: agent.name, status: 'ok', findings: parsed.value, attempts };
      }

      if (result.kind === 'permanent') {
        log.warn({ attempts, reason: result.reason }, 'agent call failed permanently');
        return { agent: agent.name, status: 'error', findings: [], attempts, reason: result.reason };
      }

      const reason = result.kind === 'timeout' ? 'call timed out' : result.reason;
      const finalStatus: AgentStatus = result.kind === 'timeout' ? 'timeout' : 'error';
      if (attempt >= options.maxRetries) {
        log.warn({ attempts, reason }, 'agent retries exhausted');
        return { agent: agent.name, status: finalStatus, findings: [], attempts, reason };
      }

      const hinted = result.kind === 'transient' ? result.retryAfterMs : undefined;
      const delayMs =
        hinted !== undefined
          ? Math.min(hinted, options.maxDelayMs)
          : calculateBackoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      log.info({ attempt: attempts, delayMs, reason }, 'retrying agent call');

      if (!(await sleepUnlessAborted(delayMs, deadline))) {
        return { agent: agent.name, status: 'timeout', findings: [], attempts, reason: 'run deadline reached' };
      }
    }
  }

  return {
    async run(input) {
      const agents = getAgents(input.agents);
      const deadline = new AbortController();
      const deadlineTimer = setTimeout(() => deadline.abort(), options.deadlineMs);
      const onCallerDeadline = () => deadline.abort();
      if (input.signal?.aborted) deadline.abort();
      else input.signal?.addEventListener('abort', onCallerDeadline, { once: true });
      const limit = pLimit(Math.max(1, agents.length));

      let runs: AgentRun[];
      try {
        runs = await Promise.all(agents.map((agent) => limit(() => runAgent(agent, input, deadline.signal))));
      } finally {
        clearTimeout(deadlineTimer);
        input.signal?.removeEventListener('abort', onCallerDeadline);
      }

      const perAgentStatus: Partial<Record<AgentName, AgentStatus>> = {};
      for (const r of runs) perAgentStatus[r.agent] = r.status;

      logger.info({ perAgentStatus }, 'agent dispatch finished');

      if (runs.length > 0 && runs.every((r) => r.status !== 'ok')) {
        return err(new AllAgentsFailedError(perAgentStatus));
      }

      return ok({
        findings: runs.flatMap((r) => r.findings),
        perAgentStatus,
        runs,
      });
    },
  };
}
