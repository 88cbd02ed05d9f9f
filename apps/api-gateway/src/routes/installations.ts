import { Router } from 'express';
import { z } from 'zod';
import type { CredentialVault } from '../credential-vault.js';
import type { Logger } from '../logger.js';
import type { InstallationRepository } from '../repositories/installation-repository.js';
import type { ReviewRepository } from '../repositories/review-repository.js';
import { normalizeSettings, parseSettingsPatch } from '../settings.js';
import type { Installation } from '../types.js';

const externalIdSchema = z.coerce.number().int().positive();
const apiKeySchema = z.object({ apiKey: z.string().trim().min(1, 'apiKey is required') }).strict();
const daysSchema = z.coerce.number().int().min(1).max(365).default(30);

// the stored ciphertext never leaves the service, only whether one exists
function present(installation: Installation) {
  return {
    id: installation.id,
    externalInstallationId: installation.externalInstallationId,
    ownerLogin: installation.ownerLogin,
    ownerType: installation.ownerType,
    enabled: installation.enabled,
    settings: installation.settings,
    hasApiKey: Boolean(installation.encryptedApiKey),
  };
}

export function createInstallationsRouter(deps: {
  installations: InstallationRepository;
  reviews: Pick<ReviewRepository, 'stats'>;
  vault: Pick<CredentialVault, 'encrypt'>;
  logger: Logger;
}): Router {
  const router = Router();

  router.get('/:externalId', async (req, res, next) => {
    try {
      const id = externalIdSchema.safeParse(req.params.externalId);
      if (!id.success) return res.status(404).json({ error: 'not found' });

      const installation = await deps.installations.findByExternalId(id.data);
      if (!installation) return res.status(404).json({ error: 'not found' });
      return res.json(present(installation));
    } catch (err) {
      return next(err);
    }
  });

  router.put('/:externalId/settings', async (req, res, next) => {
    try {
      const id = externalIdSchema.safeParse(req.params.externalId);
      if (!id.success) return res.status(404).json({ error: 'not found' });

      const patch = parseSettingsPatch(req.body);
      if (!patch.ok) return res.status(422).json({ error: 'invalid settings', issues: patch.issues });

      const current = await deps.installations.findByExternalId(id.data);
      if (!current) return res.status(404).json({ error: 'not found' });

      const updated = await deps.installations.updateSettings(
        id.data,
        normalizeSettings({ ...current.settings, ...patch.patch }, current.settings),
      );
      if (!updated) return res.status(404).json({ error: 'not found' });

      deps.logger.info({ installationId: id.data, settings: updated.settings }, 'settings updated');
      return res.json(present(updated));
    } catch (err) {
      return next(err);
    }
  });

  router.put('/:externalId/api-key', async (req, res, next) => {
    try {
      const id = externalIdSchema.safeParse(req.params.externalId);
      if (!id.success) return res.status(404).json({ error: 'not found' });

      const body = apiKeySchema.safeParse(req.body);
      if (!body.success) {
        return res.status(422).json({ error: 'invalid api key', issues: body.error.issues.map((i) => i.message) });
      }

      const stored = await deps.installations.setEncryptedApiKey(id.data, deps.vault.encrypt(body.data.apiKey));
      if (!stored) return res.status(404).json({ error: 'not found' });

      deps.logger.info({ installationId: id.data }, 'api key stored');
      return res.json({ hasApiKey: true });
    } catch (err) {
      return next(err);
    }
  });

  router.get('/:externalId/stats', async (req, res, next) => {
    try {
      const id = externalIdSchema.safeParse(req.params.externalId);
      if (!id.success) return res.status(404).json({ error: 'not found' });

      const days = daysSchema.safeParse(req.query.days);
      if (!days.success) return res.status(422).json({ error: 'days must be an integer between 1 and 365' });

      const installation = await deps.installations.findByExternalId(id.data);
      if (!installation) return res.status(404).json({ error: 'not found' });

      const stats = await deps.reviews.stats(installation.id, days.data);
      return res.json({ days: days.data, ...stats });
    } catch (err) {
      return next(err);
    }
  });

  return router;
}
