import { createHash, randomBytes } from 'node:crypto';
import type { CodeChallengeMethod, PkceChallenge } from '../types/tokens.js';

export const MIN_VERIFIER_LENGTH = 43;
export const MAX_VERIFIER_LENGTH = 128;

/**
 * Generates a code verifier of `length` unreserved characters (RFC 7636 §4.1).
 * base64url output only contains [A-Za-z0-9-_], a subset of the unreserved set.
 */
export function generateCodeVerifier(length: number = MAX_VERIFIER_LENGTH): string {
  if (!Number.isInteger(length) || length < MIN_VERIFIER_LENGTH || length > MAX_VERIFIER_LENGTH) {
    throw new RangeError(
      `Code verifier length must be an integer between ${MIN_VERIFIER_LENGTH} and ${MAX_VERIFIER_LENGTH}`,
    );
  }
  const bytes = randomBytes(Math.ceil((length * 3) / 4));
  return bytes.toString('base64url').slice(0, length);
}

/**
 * S256: BASE64URL(SHA256(verifier)) without padding. plain: the verifier itself.
 */
export function generateCodeChallenge(
  verifier: string,
  method: CodeChallengeMethod = 'S256',
): string {
  if (method === 'plain') {
    return verifier;
  }
  return createHash('sha256').update(verifier, 'ascii').digest('base64url');
}

export function generateState(): string {
  return randomBytes(16).toString('hex');
}

export function createPkceChallenge(method: CodeChallengeMethod = 'S256'): PkceChallenge {
  const codeVerifier = generateCodeVerifier();
  return {
    codeVerifier,
    codeChallenge: generateCodeChallenge(codeVerifier, method),
    codeChallengeMethod: method,
    state: generateState(),
  };
}
