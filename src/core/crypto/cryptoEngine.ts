/**
 * Crypto Engine
 *
 * AES-256-CBC with PKCS7 padding; keys come from PBKDF2-HMAC-SHA256 over the
 * password and a per-call random salt. The transport form of an encrypted chunk
 * is base64(salt || iv || ciphertext).
 *
 * There is no authentication tag, so a wrong password is only detected when the
 * padding or the UTF-8 decode comes out invalid.
 */

import { createCipheriv, createDecipheriv, pbkdf2, randomBytes } from 'crypto';
import { promisify, TextDecoder } from 'util';
import type {
  CryptoEngineLike,
  CryptoEngineOptions,
  EncryptedPayload,
} from './crypto.types.js';
import { DecryptionError, TransportDecodeError, formatError } from '../../utils/errors.js';
import {
  BLOCK_SIZE,
  CIPHER_ALGORITHM,
  IV_LENGTH,
  KEY_LENGTH,
  PBKDF2_DIGEST,
  PBKDF2_ITERATIONS,
  SALT_LENGTH,
} from '../../utils/constants.js';

const pbkdf2Async = promisify(pbkdf2);

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const HEADER_LENGTH = SALT_LENGTH + IV_LENGTH;

/**
 * Decrypts and strips PKCS7 padding; an invalid final block means a wrong key or corrupted data
 */
function runDecipher(key: Buffer, iv: Buffer, ciphertext: Buffer): Buffer {
  try {
    const decipher = createDecipheriv(CIPHER_ALGORITHM, key, iv);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (error) {
    throw new DecryptionError('Decryption failed (wrong password or corrupted data)', {
      cause: error,
    });
  }
}

export class CryptoEngine implements CryptoEngineLike {
  private readonly iterations: number;

  constructor(options: CryptoEngineOptions = {}) {
    this.iterations = options.iterations ?? PBKDF2_ITERATIONS;
  }

  /**
   * Derives a 256-bit key from the password and salt
   */
  async deriveKey(password: string, salt: Buffer): Promise<Buffer> {
    return pbkdf2Async(password, salt, this.iterations, KEY_LENGTH, PBKDF2_DIGEST);
  }

  async encrypt(plaintext: string, password: string): Promise<EncryptedPayload> {
    const salt = randomBytes(SALT_LENGTH);
    const iv = randomBytes(IV_LENGTH);
    const key = await this.deriveKey(password, salt);

    try {
      // Node's default auto padding is PKCS7
      const cipher = createCipheriv(CIPHER_ALGORITHM, key, iv);
      const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
      return { ciphertext, salt, iv };
    } finally {
      key.fill(0);
    }
  }

  async decrypt(ciphertext: Buffer, salt: Buffer, iv: Buffer, password: string): Promise<string> {
    if (iv.length !== IV_LENGTH) {
      throw new DecryptionError(`Invalid IV length: ${iv.length}`);
    }
    if (ciphertext.length === 0 || ciphertext.length % BLOCK_SIZE !== 0) {
      throw new DecryptionError(
        `Ciphertext length ${ciphertext.length} is not a positive multiple of ${BLOCK_SIZE}`
      );
    }

    const key = await this.deriveKey(password, salt);
    let padded: Buffer;

    try {
      padded = runDecipher(key, iv, ciphertext);
    } finally {
      key.fill(0);
    }

    try {
      return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(padded);
    } catch (error) {
      throw new DecryptionError(
        `Decrypted data is not valid UTF-8 (wrong password?): ${formatError(error)}`,
        { cause: error }
      );
    } finally {
      padded.fill(0);
    }
  }

  encodeForTransport(payload: EncryptedPayload): string {
    return Buffer.concat([payload.salt, payload.iv, payload.ciphertext]).toString('base64');
  }

  decodeFromTransport(text: string): EncryptedPayload {
    const compact = text.replace(/\s+/g, '');
    if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
      throw new TransportDecodeError('Encrypted payload is not valid base64');
    }

    const combined = Buffer.from(compact, 'base64');
    if (combined.length < HEADER_LENGTH) {
      throw new TransportDecodeError(
        `Encrypted payload too short: ${combined.length} bytes, need at least ${HEADER_LENGTH}`
      );
    }

    return {
      salt: combined.subarray(0, SALT_LENGTH),
      iv: combined.subarray(SALT_LENGTH, HEADER_LENGTH),
      ciphertext: combined.subarray(HEADER_LENGTH),
    };
  }
}
