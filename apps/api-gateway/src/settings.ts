import { z } from 'zod';
import { AGENT_NAMES } from './types.js';
import type { AgentName, InstallationSettings } from './types.js';

export const DEFAULT_SETTINGS: Readonly<InstallationSettings> = Object.freeze({
  style: true,
  security: true,
  performance: true,
  logic: true,
  autoApprove: false,
});

const partialSettingsSchema = z
  .object({
    style: z.boolean(),
    security: z.boolean(),
    performance: z.boolean(),
    logic: z.boolean(),
    autoApprove: z.boolean(),
  })
  .partial();

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export type SettingsPatch = z.infer<typeof partialSettingsSchema>;

/**
 * Coerce whatever is stored (or sent by the config UI) into exactly the four
 * agent flags plus autoApprove. Missing agents default to enabled; unknown
 * keys are dropped; non-boolean values fall back to the default.
 */
export function normalizeSettings(raw: unknown, base: InstallationSettings = DEFAULT_SETTINGS): InstallationSettings {
  const source: Record<string, unknown> = isRecord(raw) ? raw : {};
  const pick = (key: keyof InstallationSettings): boolean => {
    const value = source[key];
    return typeof value === 'boolean' ? value : base[key];
  };

  return {
    style: pick('style'),
    security: pick('security'),
    performance: pick('performance'),
    logic: pick('logic'),
    autoApprove: pick('autoApprove'),
  };
}

export function parseSettingsPatch(body: unknown): { ok: true; patch: SettingsPatch } | { ok: false; issues: string[] } {
  const result = partialSettingsSchema.strict().safeParse(body);
  if (!result.success) {
    return { ok: false, issues: result.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`) };
  }
  return { ok: true, patch: result.data };
}

export function enabledAgents(settings: InstallationSettings): AgentName[] {
  return AGENT_NAMES.filter((name) => settings[name]);
}
