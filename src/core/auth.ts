import { timingSafeEqual } from 'node:crypto';
import { splitList, type DeployerConfig } from './config.js';
import { UnauthorizedError } from './errors.js';

/**
 * Checks submitted secrets against the server-held allow-list.
 *
 * Fail-closed: with no configured secret every submission is rejected.
 */
export class SecretVerifier {
  private readonly accepted: Buffer[];

  constructor(secrets: readonly string[]) {
    this.accepted = secrets.filter((s) => s.length > 0).map((s) => Buffer.from(s, 'utf8'));
  }

  get configured(): boolean {
    return this.accepted.length > 0;
  }

  verify(secret: string): void {
    if (!this.configured) {
      throw new UnauthorizedError('Unauthorized (no secret configured)');
    }
    const submitted = Buffer.from(secret, 'utf8');
    const match = this.accepted.some(
      (candidate) => candidate.length === submitted.length && timingSafeEqual(candidate, submitted)
    );
    if (!match) {
      throw new UnauthorizedError('Unauthorized (invalid secret)');
    }
  }
}

// DEPLOYER_ACCEPTED_SECRETS wins; DEPLOYER_SECRET is the single-value fallback.
export function secretVerifierFromConfig(
  cfg: Pick<DeployerConfig, 'DEPLOYER_ACCEPTED_SECRETS' | 'DEPLOYER_SECRET'>
): SecretVerifier {
  return new SecretVerifier(splitList(cfg.DEPLOYER_ACCEPTED_SECRETS ?? cfg.DEPLOYER_SECRET));
}
