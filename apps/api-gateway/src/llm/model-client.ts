import { z } from 'zod';
import type { Logger } from '../logger.js';

export type ModelRequest = {
  role: string;
  prompt: string;
  apiKey: string;
  signal: AbortSignal;
};

/** Outcome of a single model call; the client never throws for provider failures. */
export type ModelCallResult =
  | { kind: 'ok'; text: string }
  | { kind: 'transient'; reason: string; retryAfterMs?: number }
  | { kind: 'permanent'; reason: string };

export interface ModelClient {
  invoke(request: ModelRequest): Promise<ModelCallResult>;
}

const TRANSIENT_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

const generateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

/** Retry-After is either delta-seconds or an HTTP date. */
export function parseRetryAfter(header: string | null, now = Date.now()): number | undefined {
  if (!header) return undefined;
  const value = header.trim();
  if (/^\d+$/.test(value)) return Number(value) * 1000;
  const at = Date.parse(value);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

export function classifyStatus(status: number): 'transient' | 'permanent' {
  return TRANSIENT_STATUSES.has(status) ? 'transient' : 'permanent';
}

export type GeminiClientOptions = {
  baseUrl: string;
  model: string;
  logger: Logger;
  temperature?: number;
  fetchImpl?: typeof fetch;
};

/**
 * Model client for the Gemini generateContent REST endpoint.
 * The key goes in a header so it never appears in a logged URL.
 */
export function createGeminiClient(opts: GeminiClientOptions): ModelClient {
  const doFetch = opts.fetchImpl ?? fetch;
  const url = `${opts.baseUrl.replace(/\/+$/, '')}/models/${encodeURIComponent(opts.model)}:generateContent`;

  return {
    async invoke({ role, prompt, apiKey, signal }) {
      let res: Response;
      try {
        res = await doFetch(url, {
          method: 'POST',
          signal,
          headers: {
            'Content-Type': 'application/json',
            'x-goog-api-key': apiKey,
          },
          body: JSON.stringify({
            systemInstruction: { parts: [{ text: `You are the ${role} on a pull request review panel.` }] },
            contents: [{ role: 'user', parts: [{ text: prompt }] }],
            generationConfig: {
              temperature: opts.temperature ?? 0.2,
              responseMimeType: 'application/json',
            },
          }),
        });
      } catch (e) {
        const reason = signal.aborted ? 'request aborted' : `network error: ${e instanceof Error ? e.message : String(e)}`;
        return { kind: 'transient', reason };
      }

      if (!res.ok) {
        const text = (await res.text().catch(() => '')).slice(0, 200);
        const reason = `model API responded ${res.status}${text ? `: ${text}` : ''}`;
        if (classifyStatus(res.status) === 'permanent') {
          return { kind: 'permanent', reason };
        }
        const retryAfterMs = parseRetryAfter(res.headers.get('retry-after'));
        return retryAfterMs === undefined ? { kind: 'transient', reason } : { kind: 'transient', reason, retryAfterMs };
      }

      let payload: unknown;
      try {
        payload = await res.json();
      } catch (e) {
        return { kind: 'transient', reason: `unreadable model response: ${e instanceof Error ? e.message : String(e)}` };
      }

      const parsed = generateContentSchema.safeParse(payload);
      if (!parsed.success) {
        return { kind: 'permanent', reason: 'unexpected model response shape' };
      }

      const blockReason = parsed.data.promptFeedback?.blockReason;
      if (blockReason) {
        return { kind: 'permanent', reason: `prompt blocked: ${blockReason}` };
      }

      const parts = parsed.data.candidates?.[0]?.content?.parts ?? [];
      const text = parts.map((p) => p.text ?? '').join('');
      if (!text) {
        opts.logger.debug({ role, finishReason: parsed.data.candidates?.[0]?.finishReason }, 'model returned no text');
        return { kind: 'permanent', reason: 'model returned no text' };
      }
      return { kind: 'ok', text };
    },
  };
}
