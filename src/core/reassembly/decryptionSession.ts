/**
 * Decryption Session
 *
 * Holds the password for one reconstruction run. The password is requested
 * lazily, once, when the first encrypted record is met. If that first record
 * cannot be decrypted the password is assumed wrong and requested again; once
 * a password has worked, a later failure is reported for that record only.
 */

import type { EncryptedRecord } from '../codec/codec.types.js';
import type { CryptoEngineLike } from '../crypto/crypto.types.js';
import type { DecryptionSessionOptions, PasswordProvider } from './reassembly.types.js';
import { DecryptionError, InputError } from '../../utils/errors.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import { DEFAULT_PASSWORD_ATTEMPTS } from '../../utils/constants.js';

export class DecryptionSession {
  private password: string | undefined;
  private attempts = 0;
  private confirmed = false;
  private exhausted = false;
  private readonly maxAttempts: number;
  private readonly logger: Logger;

  constructor(
    private readonly provider?: PasswordProvider,
    options: DecryptionSessionOptions = {}
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_PASSWORD_ATTEMPTS);
    this.logger = options.logger ?? createLogger('decrypt');
  }

  /**
   * Number of times the provider was asked for a password
   */
  get promptCount(): number {
    return this.attempts;
  }

  /**
   * Decrypts one record's payload to its plaintext body
   */
  async decrypt(engine: CryptoEngineLike, record: EncryptedRecord): Promise<string> {
    if (this.exhausted) {
      throw new DecryptionError('Password rejected; decryption stopped for this run');
    }

    const { ciphertext, salt, iv } = engine.decodeFromTransport(record.payload);

    for (;;) {
      const password = await this.obtainPassword();
      try {
        const plaintext = await engine.decrypt(ciphertext, salt, iv, password);
        this.confirmed = true;
        return plaintext;
      } catch (error) {
        if (!(error instanceof DecryptionError) || this.confirmed) {
          throw error;
        }

        this.password = undefined;
        if (this.attempts >= this.maxAttempts) {
          this.exhausted = true;
          throw error;
        }
        this.logger.warn(
          `Could not decrypt ${record.filename} part ${record.index}; the password looks wrong`
        );
      }
    }
  }

  private async obtainPassword(): Promise<string> {
    if (this.password !== undefined) return this.password;
    if (!this.provider) {
      throw new InputError('Encrypted records found but no password was supplied');
    }
    this.attempts++;
    this.password = await this.provider(this.attempts);
    return this.password;
  }

  /**
   * Drops the password; call when the run is over
   */
  close(): void {
    this.password = undefined;
  }
}

/**
 * Provider for a password known up front (a CLI flag, say)
 */
export function staticPassword(password: string): PasswordProvider {
  return async () => password;
}
