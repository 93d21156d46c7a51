import { describe, it, expect } from 'vitest';
import { SecretVerifier, secretVerifierFromConfig } from '../src/core/auth.js';
import { UnauthorizedError } from '../src/core/errors.js';

describe('SecretVerifier', () => {
  it('rejects everything when no secret is configured', () => {
    const verifier = new SecretVerifier([]);
    expect(verifier.configured).toBe(false);
    for (const secret of ['', 'test-secret', 'anything']) {
      expect(() => verifier.verify(secret)).toThrow('Unauthorized (no secret configured)');
    }
  });

  it('accepts only exact matches', () => {
    const verifier = new SecretVerifier(['alpha', 'beta']);
    expect(() => verifier.verify('alpha')).not.toThrow();
    expect(() => verifier.verify('beta')).not.toThrow();
    expect(() => verifier.verify('alph')).toThrow('Unauthorized (invalid secret)');
    expect(() => verifier.verify('alpha ')).toThrow(UnauthorizedError);
  });

  it('prefers the list over the single-secret fallback', () => {
    const verifier = secretVerifierFromConfig({ DEPLOYER_ACCEPTED_SECRETS: 'one, two', DEPLOYER_SECRET: 'three' });
    expect(() => verifier.verify('two')).not.toThrow();
    expect(() => verifier.verify('three')).toThrow('Unauthorized (invalid secret)');
  });

  it('falls back to the single secret', () => {
    const verifier = secretVerifierFromConfig({ DEPLOYER_ACCEPTED_SECRETS: undefined, DEPLOYER_SECRET: 'three' });
    expect(() => verifier.verify('three')).not.toThrow();
  });
});
