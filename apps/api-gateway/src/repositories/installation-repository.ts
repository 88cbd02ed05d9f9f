import type { Queryable } from '../db.js';
import { DEFAULT_SETTINGS, normalizeSettings } from '../settings.js';
import type { Installation, InstallationSettings, OwnerType } from '../types.js';

export interface InstallationRepository {
  findByExternalId(externalInstallationId: number): Promise<Installation | null>;
  /** Insert or refresh the owner; re-enables a soft-disabled installation. */
  upsert(input: InstallationOwner): Promise<Installation>;
  /** Insert with defaults when absent, otherwise return the stored row untouched. */
  findOrCreate(input: InstallationOwner): Promise<Installation>;
  setEnabled(externalInstallationId: number, enabled: boolean): Promise<boolean>;
  updateSettings(externalInstallationId: number, settings: InstallationSettings): Promise<Installation | null>;
  setEncryptedApiKey(externalInstallationId: number, ciphertext: string): Promise<boolean>;
}

export type InstallationOwner = {
  externalInstallationId: number;
  ownerLogin: string;
  ownerType: OwnerType;
};

type InstallationRow = {
  id: string;
  external_installation_id: string | number; // BIGINT comes back as text
  owner_login: string;
  owner_type: string;
  api_key_encrypted: string | null;
  enabled: boolean;
  settings: unknown;
};

const COLUMNS = 'id, external_installation_id, owner_login, owner_type, api_key_encrypted, enabled, settings';

function toInstallation(row: InstallationRow): Installation {
  return {
    id: row.id,
    externalInstallationId: Number(row.external_installation_id),
    ownerLogin: row.owner_login,
    ownerType: row.owner_type === 'Organization' ? 'Organization' : 'User',
    encryptedApiKey: row.api_key_encrypted || null,
    enabled: row.enabled,
    settings: normalizeSettings(row.settings),
  };
}

export function createInstallationRepository(db: Queryable): InstallationRepository {
  return {
    async findByExternalId(externalInstallationId) {
      const rows = await db.query<InstallationRow>(
        `SELECT ${COLUMNS} FROM installations WHERE external_installation_id = $1`,
        [externalInstallationId],
      );
      return rows.length ? toInstallation(rows[0]) : null;
    },

    async upsert({ externalInstallationId, ownerLogin, ownerType }) {
      const rows = await db.query<InstallationRow>(
        `INSERT INTO installations (external_installation_id, owner_login, owner_type, settings)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (external_installation_id)
         DO UPDATE SET owner_login = EXCLUDED.owner_login,
                       owner_type = EXCLUDED.owner_type,
                       enabled = true
         RETURNING ${COLUMNS}`,
        [externalInstallationId, ownerLogin, ownerType, DEFAULT_SETTINGS],
      );
      return toInstallation(rows[0]);
    },

    async findOrCreate({ externalInstallationId, ownerLogin, ownerType }) {
      // the no-op update makes RETURNING yield the existing row on conflict
      const rows = await db.query<InstallationRow>(
        `INSERT INTO installations (external_installation_id, owner_login, owner_type, settings)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (external_installation_id)
         DO UPDATE SET owner_login = installations.owner_login
         RETURNING ${COLUMNS}`,
        [externalInstallationId, ownerLogin, ownerType, DEFAULT_SETTINGS],
      );
      return toInstallation(rows[0]);
    },

    async setEnabled(externalInstallationId, enabled) {
      const rows = await db.query<{ id: string }>(
        `UPDATE installations SET enabled = $2 WHERE external_installation_id = $1 RETURNING id`,
        [externalInstallationId, enabled],
      );
      return rows.length > 0;
    },

    async updateSettings(externalInstallationId, settings) {
      const rows = await db.query<InstallationRow>(
        `UPDATE installations SET settings = $2 WHERE external_installation_id = $1 RETURNING ${COLUMNS}`,
        [externalInstallationId, normalizeSettings(settings)],
      );
      return rows.length ? toInstallation(rows[0]) : null;
    },

    async setEncryptedApiKey(externalInstallationId, ciphertext) {
      const rows = await db.query<{ id: string }>(
        `UPDATE installations SET api_key_encrypted = $2 WHERE external_installation_id = $1 RETURNING id`,
        [externalInstallationId, ciphertext],
      );
      return rows.length > 0;
    },
  };
}
