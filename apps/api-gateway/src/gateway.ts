import { z } from 'zod';
import { MalformedPayloadError } from './errors.js';
import { createChildLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { ReviewPipeline } from './pipeline.js';
import type { InstallationRepository } from './repositories/installation-repository.js';
import type { ReviewRepository } from './repositories/review-repository.js';
import { verifySignature } from './signature.js';
import type { OwnerType, PullRequestEvent } from './types.js';

export type WebhookRequest = {
  rawBody: Buffer | undefined;
  headers: Record<string, string | string[] | undefined>;
};

export type GatewayOutcome =
  | { kind: 'processed'; reviewId: string; status: 'completed' | 'failed' }
  | { kind: 'installation'; action: string }
  | { kind: 'ignored'; reason: string }
  | { kind: 'rejected'; status: 401 | 422; error: string };

export interface WebhookGateway {
  handle(req: WebhookRequest): Promise<GatewayOutcome>;
}

const REVIEWED_ACTIONS = new Set(['opened', 'synchronize']);

const accountSchema = z.object({
  login: z.string().min(1),
  type: z.string().optional(),
});

const pullRequestPayloadSchema = z.object({
  action: z.string(),
  pull_request: z.object({
    number: z.number().int().positive(),
    title: z.string().nullish(),
    head: z.object({ sha: z.string().regex(/^[0-9a-f]{7,64}$/i, 'must be a commit sha') }),
  }),
  repository: z.object({
    full_name: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'must be "owner/name"'),
    owner: accountSchema.optional(),
  }),
  installation: z.object({
    id: z.number().int().positive(),
    account: accountSchema.optional(),
  }),
});

const installationPayloadSchema = z.object({
  action: z.string(),
  installation: z.object({
    id: z.number().int().positive(),
    account: accountSchema,
  }),
});

const actionSchema = z.object({ action: z.string() });

function header(headers: WebhookRequest['headers'], name: string): string | undefined {
  const value = headers[name] ?? headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

function toOwnerType(type: string | undefined): OwnerType {
  return type === 'Organization' ? 'Organization' : 'User';
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
}

function parseJson(raw: Buffer): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw.toString('utf8')) };
  } catch {
    return { ok: false };
  }
}

/** Maps an outcome to the HTTP response the platform receives. */
export function toHttpResponse(outcome: GatewayOutcome): { status: number; body: Record<string, unknown> } {
  switch (outcome.kind) {
    case 'rejected':
      return { status: outcome.status, body: { error: outcome.error } };
    case 'ignored':
      return { status: 200, body: { outcome: 'ignored', reason: outcome.reason } };
    case 'installation':
      return { status: 200, body: { outcome: 'installation', action: outcome.action } };
    case 'processed':
      return { status: 200, body: { outcome: 'processed', reviewId: outcome.reviewId, status: outcome.status } };
  }
}

export function createWebhookGateway(deps: {
  secret: string;
  installations: InstallationRepository;
  reviews: Pick<ReviewRepository, 'create'>;
  pipeline: ReviewPipeline;
  logger: Logger;
}): WebhookGateway {
  async function handleInstallation(payload: unknown, log: Logger): Promise<GatewayOutcome> {
    const parsed = installationPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      const error = new MalformedPayloadError(issuesOf(parsed.error));
      log.warn({ code: error.code, issues: error.issues }, 'rejected installation event');
      return { kind: 'rejected', status: 422, error: error.message };
    }

    const { action, installation } = parsed.data;
    switch (action) {
      case 'created':
      case 'new_permissions_accepted':
        await deps.installations.upsert({
          externalInstallationId: installation.id,
          ownerLogin: installation.account.login,
          ownerType: toOwnerType(installation.account.type),
        });
        break;
      case 'deleted':
      case 'suspend':
        await deps.installations.setEnabled(installation.id, false);
        break;
      case 'unsuspend':
        await deps.installations.setEnabled(installation.id, true);
        break;
      default:
        return { kind: 'ignored', reason: `installation action ${action}` };
    }

    log.info({ installationId: installation.id, action }, 'installation updated');
    return { kind: 'installation', action };
  }

  async function handlePullRequest(payload: unknown, deliveryId: string, log: Logger): Promise<GatewayOutcome> {
    const head = actionSchema.safeParse(payload);
    if (!head.success) {
      return { kind: 'rejected', status: 422, error: new MalformedPayloadError(issuesOf(head.error)).message };
    }
    if (!REVIEWED_ACTIONS.has(head.data.action)) {
      return { kind: 'ignored', reason: `pull_request action ${head.data.action}` };
    }

    const parsed = pullRequestPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      const error = new MalformedPayloadError(issuesOf(parsed.error));
      log.warn({ code: error.code, issues: error.issues }, 'rejected pull request event');
      return { kind: 'rejected', status: 422, error: error.message };
    }

    const p = parsed.data;
    const account = p.installation.account ?? p.repository.owner;
    const event: PullRequestEvent = {
      deliveryId,
      action: p.action,
      installationId: p.installation.id,
      repoFullName: p.repository.full_name,
      prNumber: p.pull_request.number,
      prTitle: p.pull_request.title ?? null,
      commitSha: p.pull_request.head.sha,
      ownerLogin: account?.login ?? p.repository.full_name.split('/')[0],
      ownerType: toOwnerType(account?.type),
    };

    const installation = await deps.installations.findOrCreate({
      externalInstallationId: event.installationId,
      ownerLogin: event.ownerLogin,
      ownerType: event.ownerType,
    });
    if (!installation.enabled) {
      log.info({ installationId: event.installationId }, 'installation disabled, skipping review');
      return { kind: 'ignored', reason: 'installation disabled' };
    }

    const review = await deps.reviews.create({
      installationId: installation.id,
      repoFullName: event.repoFullName,
      prNumber: event.prNumber,
      prTitle: event.prTitle,
      commitSha: event.commitSha,
    });

    const outcome = await deps.pipeline.run(event, installation, review);
    return { kind: 'processed', reviewId: outcome.reviewId, status: outcome.status };
  }

  return {
    async handle(req) {
      const deliveryId = header(req.headers, 'x-github-delivery') ?? '';
      const eventType = header(req.headers, 'x-github-event') ?? '';
      const log = createChildLogger(deps.logger, { deliveryId, event: eventType });

      if (!verifySignature(deps.secret, req.rawBody, header(req.headers, 'x-hub-signature-256'))) {
        log.warn('webhook signature mismatch');
        return { kind: 'rejected', status: 401, error: 'invalid signature' };
      }

      if (eventType !== 'pull_request' && eventType !== 'installation') {
        return { kind: 'ignored', reason: `event ${eventType || '(none)'}` };
      }

      // verifySignature already required a body
      const body = parseJson(req.rawBody ?? Buffer.alloc(0));
      if (!body.ok) {
        return { kind: 'rejected', status: 422, error: 'body is not valid JSON' };
      }

      if (eventType === 'installation') return handleInstallation(body.value, log);
      return handlePullRequest(body.value, deliveryId, log);
    },
  };
}
