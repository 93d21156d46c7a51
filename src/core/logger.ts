import pino from 'pino';
import type { DeployerConfig } from './config.js';

export const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'secret',
  '*.secret'
];

export function createLogger(cfg: Pick<DeployerConfig, 'DEPLOYER_LOG_LEVEL'>) {
  return pino({
    level: cfg.DEPLOYER_LOG_LEVEL,
    redact: {
      paths: REDACT_PATHS,
      remove: true
    }
  });
}
