import {
  createPkceChallenge,
  generateCodeChallenge,
  generateCodeVerifier,
  generateState,
} from '../lib/pkce.js';

const UNRESERVED = /^[A-Za-z0-9\-._~]+$/;

describe('generateCodeVerifier', () => {
  it('defaults to 128 unreserved characters', () => {
    const verifier = generateCodeVerifier();
    expect(verifier).toHaveLength(128);
    expect(verifier).toMatch(UNRESERVED);
  });

  it('accepts the minimum length', () => {
    expect(generateCodeVerifier(43)).toHaveLength(43);
  });

  it('rejects lengths outside 43-128', () => {
    expect(() => generateCodeVerifier(42)).toThrow(RangeError);
    expect(() => generateCodeVerifier(129)).toThrow(RangeError);
    expect(() => generateCodeVerifier(50.5)).toThrow(RangeError);
  });

  it('produces a different verifier each time', () => {
    expect(generateCodeVerifier()).not.toBe(generateCodeVerifier());
  });
});

describe('generateCodeChallenge', () => {
  // RFC 7636 Appendix B
  const verifier = 'dBjftJeZ4CVP-mJ92K9Z-1VSPIT7m6JWwSEVRO5GMvk';

  it('hashes the verifier with S256 by default', () => {
    expect(generateCodeChallenge(verifier)).toBe('E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM');
  });

  it('returns the verifier unchanged for plain', () => {
    expect(generateCodeChallenge(verifier, 'plain')).toBe(verifier);
  });

  it('never pads the challenge', () => {
    expect(generateCodeChallenge(generateCodeVerifier())).not.toContain('=');
  });
});

describe('generateState', () => {
  it('returns 32 hex characters', () => {
    expect(generateState()).toMatch(/^[0-9a-f]{32}$/);
  });

  it('is unique per call', () => {
    expect(generateState()).not.toBe(generateState());
  });
});

describe('createPkceChallenge', () => {
  it('derives an S256 challenge from its verifier', () => {
    const challenge = createPkceChallenge('S256');
    expect(challenge.codeChallengeMethod).toBe('S256');
    expect(challenge.codeChallenge).toBe(generateCodeChallenge(challenge.codeVerifier, 'S256'));
    expect(challenge.codeChallenge).not.toBe(challenge.codeVerifier);
  });

  it('uses the verifier as the challenge for plain', () => {
    const challenge = createPkceChallenge('plain');
    expect(challenge.codeChallengeMethod).toBe('plain');
    expect(challenge.codeChallenge).toBe(challenge.codeVerifier);
  });

  it('gives every challenge its own verifier and state', () => {
    const a = createPkceChallenge();
    const b = createPkceChallenge();
    expect(a.codeVerifier).not.toBe(b.codeVerifier);
    expect(a.state).not.toBe(b.state);
  });
});
