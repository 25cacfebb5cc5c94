/**
 * Crypto Types
 */

/**
 * Output of one encryption call. Salt and IV are fresh for every call.
 */
export interface EncryptedPayload {
  ciphertext: Buffer;
  salt: Buffer;
  iv: Buffer;
}

export interface CryptoEngineOptions {
  /** PBKDF2 iteration count (default 100000) */
  iterations?: number;
}

/**
 * Engine and password used to encrypt the chunks of one file
 */
export interface EncryptionOptions {
  engine: CryptoEngineLike;
  password: string;
}

/**
 * Structural view of the engine, so tests can substitute a failing one
 */
export interface CryptoEngineLike {
  encrypt(plaintext: string, password: string): Promise<EncryptedPayload>;
  decrypt(ciphertext: Buffer, salt: Buffer, iv: Buffer, password: string): Promise<string>;
  encodeForTransport(payload: EncryptedPayload): string;
  decodeFromTransport(text: string): EncryptedPayload;
}
