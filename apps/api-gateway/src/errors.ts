/**
 * Error taxonomy for the review pipeline.
 *
 * Expected failures travel as `Result` values; the classes carry a
 * machine-readable `code` so callers and logs can branch on it.
 */

export type Result<T, E = ReviewError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export type ReviewErrorCode =
  | 'SIGNATURE_INVALID'
  | 'MALFORMED_PAYLOAD'
  | 'NOT_CONFIGURED'
  | 'DECRYPTION_FAILED'
  | 'AGENT_TRANSIENT'
  | 'AGENT_PERMANENT'
  | 'AGENT_TIMEOUT'
  | 'SYNTHESIS_PARSE'
  | 'DIFF_UNAVAILABLE'
  | 'ALL_AGENTS_FAILED'
  | 'RUN_DEADLINE'
  | 'PERSISTENCE';

export class ReviewError extends Error {
  constructor(
    message: string,
    public readonly code: ReviewErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ReviewError';
  }
}

export class SignatureInvalidError extends ReviewError {
  constructor() {
    super('invalid signature', 'SIGNATURE_INVALID');
    this.name = 'SignatureInvalidError';
  }
}

export class MalformedPayloadError extends ReviewError {
  constructor(public readonly issues: string[]) {
    super(`malformed payload: ${issues.join('; ')}`, 'MALFORMED_PAYLOAD');
    this.name = 'MalformedPayloadError';
  }
}

export class NotConfiguredError extends ReviewError {
  constructor(public readonly installationId: number) {
    super(
      'No model API key is configured for this installation. Add one in the review app settings to enable reviews.',
      'NOT_CONFIGURED',
    );
    this.name = 'NotConfiguredError';
  }
}

export class DecryptionFailedError extends ReviewError {
  constructor(public readonly installationId: number, cause?: unknown) {
    super(
      'The stored model API key could not be decrypted. Save the key again in the review app settings.',
      'DECRYPTION_FAILED',
      cause,
    );
    this.name = 'DecryptionFailedError';
  }
}

export type CredentialError = NotConfiguredError | DecryptionFailedError;

export class SynthesisParseError extends ReviewError {
  constructor(public readonly agentName: string, detail: string) {
    super(`${agentName} agent returned an unparseable response: ${detail}`, 'SYNTHESIS_PARSE');
    this.name = 'SynthesisParseError';
  }
}

export class DiffUnavailableError extends ReviewError {
  constructor(detail: string, cause?: unknown) {
    super(`could not fetch pull request diff: ${detail}`, 'DIFF_UNAVAILABLE', cause);
    this.name = 'DiffUnavailableError';
  }
}

export class AllAgentsFailedError extends ReviewError {
  constructor(public readonly statuses: Readonly<Record<string, string | undefined>>) {
    super(
      `every enabled agent failed (${Object.entries(statuses)
        .map(([name, status]) => `${name}: ${status}`)
        .join(', ')})`,
      'ALL_AGENTS_FAILED',
    );
    this.name = 'AllAgentsFailedError';
  }
}

export class RunDeadlineError extends ReviewError {
  constructor(public readonly deadlineMs: number, stage: string) {
    super(`run deadline of ${deadlineMs}ms reached during ${stage}`, 'RUN_DEADLINE');
    this.name = 'RunDeadlineError';
  }
}

export class PersistenceError extends ReviewError {
  constructor(operation: string, cause?: unknown) {
    super(`${operation} failed: ${errorMessage(cause)}`, 'PERSISTENCE', cause);
    this.name = 'PersistenceError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
