import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import type { CredentialVault } from './credential-vault.js';
import { toHttpResponse } from './gateway.js';
import type { WebhookGateway } from './gateway.js';
import type { Logger } from './logger.js';
import type { InstallationRepository } from './repositories/installation-repository.js';
import type { ReviewRepository } from './repositories/review-repository.js';
import { createInstallationsRouter } from './routes/installations.js';
import { createReviewRouter } from './routes/review.js';

export type AppDeps = {
  gateway: WebhookGateway;
  installations: InstallationRepository;
  reviews: ReviewRepository;
  vault: Pick<CredentialVault, 'encrypt'>;
  logger: Logger;
};

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.get('/healthz', (_req, res) => res.json({ ok: true }));

  // the signature covers the exact bytes, so the webhook body stays a Buffer
  app.post('/webhooks/github', bodyParser.raw({ type: '*/*', limit: '5mb' }), async (req, res, next) => {
    try {
      const rawBody: Buffer | undefined = Buffer.isBuffer(req.body) ? req.body : undefined;
      const outcome = await deps.gateway.handle({ rawBody, headers: req.headers });
      const { status, body } = toHttpResponse(outcome);
      return res.status(status).json(body);
    } catch (err) {
      return next(err);
    }
  });

  app.use(bodyParser.json({ limit: '100kb' }));
  app.use('/reviews', createReviewRouter(deps.reviews));
  app.use(
    '/installations',
    createInstallationsRouter({
      installations: deps.installations,
      reviews: deps.reviews,
      vault: deps.vault,
      logger: deps.logger,
    }),
  );

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    deps.logger.error({ err, method: req.method, path: req.path }, 'request failed');
    if (res.headersSent) return;
    res.status(500).json({ error: 'internal' });
  });

  return app;
}
