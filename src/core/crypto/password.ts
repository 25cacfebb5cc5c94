import { MIN_PASSWORD_LENGTH } from '../../utils/constants.js';
import { PasswordMismatchError, WeakPasswordError } from '../../utils/errors.js';

/**
 * Returns true or a message describing why the password is rejected.
 * Shaped for prompt validators.
 */
export function checkPassword(password: string): true | string {
  if (password.length < MIN_PASSWORD_LENGTH) {
    return `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`;
  }
  return true;
}

export function validatePassword(password: string): void {
  const result = checkPassword(password);
  if (result !== true) {
    throw new WeakPasswordError(result);
  }
}

/**
 * Both entries of an interactive password prompt must satisfy the policy and match
 */
export function validatePasswordConfirmation(password: string, confirmation: string): void {
  validatePassword(password);
  if (password !== confirmation) {
    throw new PasswordMismatchError();
  }
}
