/**
 * Crypto Module
 * Password-based chunk encryption
 */

export { CryptoEngine } from './cryptoEngine.js';
export { checkPassword, validatePassword, validatePasswordConfirmation } from './password.js';
export type {
  EncryptedPayload,
  CryptoEngineOptions,
  EncryptionOptions,
  CryptoEngineLike,
} from './crypto.types.js';
