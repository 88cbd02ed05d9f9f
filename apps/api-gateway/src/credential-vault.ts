import crypto from 'crypto';
import { DecryptionFailedError, NotConfiguredError, err, ok } from './errors.js';
import type { CredentialError, Result } from './errors.js';
import type { InstallationRepository } from './repositories/installation-repository.js';

const ALGORITHM = 'aes-256-gcm';
const KEY_LENGTH = 32; // 256 bits
const IV_LENGTH = 16;
const AUTH_TAG_LENGTH = 16;

/**
 * A decrypted API key that lives for one pipeline run. The plaintext sits in a
 * Buffer that is zeroed on release; reads after release throw.
 */
export class ScopedCredential {
  private secret: Buffer | null;

  constructor(secret: Buffer) {
    this.secret = secret;
  }

  get released(): boolean {
    return this.secret === null;
  }

  reveal(): string {
    if (!this.secret) throw new Error('credential has been released');
    return this.secret.toString('utf8');
  }

  release(): void {
    this.secret?.fill(0);
    this.secret = null;
  }

  toJSON(): string {
    return '[credential]';
  }
}

/**
 * Encrypts and decrypts per-installation model API keys with a process-wide
 * AES-256-GCM key. Stored format: base64(IV | authTag | ciphertext).
 */
export class CredentialVault {
  private readonly key: Buffer;

  constructor(
    key: Buffer,
    private readonly installations: Pick<InstallationRepository, 'findByExternalId'>,
  ) {
    if (key.length !== KEY_LENGTH) {
      throw new Error(`encryption key must be ${KEY_LENGTH} bytes, got ${key.length}`);
    }
    this.key = Buffer.from(key);
  }

  static fromHex(hexKey: string, installations: Pick<InstallationRepository, 'findByExternalId'>): CredentialVault {
    return new CredentialVault(Buffer.from(hexKey, 'hex'), installations);
  }

  encrypt(plaintext: string): string {
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.key, iv);
    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    return Buffer.concat([iv, cipher.getAuthTag(), encrypted]).toString('base64');
  }

  /** Throws when the data is truncated, tampered with, or sealed under another key. */
  decrypt(encryptedData: string): Buffer {
    const combined = Buffer.from(encryptedData, 'base64');
    if (combined.length < IV_LENGTH + AUTH_TAG_LENGTH) {
      throw new Error('ciphertext too short');
    }

    const iv = combined.subarray(0, IV_LENGTH);
    const authTag = combined.subarray(IV_LENGTH, IV_LENGTH + AUTH_TAG_LENGTH);
    const ciphertext = combined.subarray(IV_LENGTH + AUTH_TAG_LENGTH);

    const decipher = crypto.createDecipheriv(ALGORITHM, this.key, iv);
    decipher.setAuthTag(authTag);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  }

  async resolve(externalInstallationId: number): Promise<Result<ScopedCredential, CredentialError>> {
    const installation = await this.installations.findByExternalId(externalInstallationId);
    if (!installation || !installation.encryptedApiKey) {
      return err(new NotConfiguredError(externalInstallationId));
    }

    try {
      const plaintext = this.decrypt(installation.encryptedApiKey);
      if (plaintext.length === 0) {
        return err(new NotConfiguredError(externalInstallationId));
      }
      return ok(new ScopedCredential(plaintext));
    } catch (e) {
      return err(new DecryptionFailedError(externalInstallationId, e));
    }
  }

  /**
   * Resolve the credential, hand it to `use`, and release it once `use`
   * settles, whichever way it settles.
   */
  async withCredential<T>(
    externalInstallationId: number,
    use: (credential: ScopedCredential) => Promise<T>,
  ): Promise<Result<T, CredentialError>> {
    const resolved = await this.resolve(externalInstallationId);
    if (!resolved.ok) return resolved;

    const credential = resolved.value;
    try {
      return ok(await use(credential));
    } finally {
      credential.release();
    }
  }
}
