import 'dotenv/config';
import Fastify from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { nanoid } from 'nanoid';

import { loadConfig } from './core/config.js';
import { createLogger, REDACT_PATHS } from './core/logger.js';
import { secretVerifierFromConfig } from './core/auth.js';
import { buildOrchestrator } from './bootstrap.js';
import { registerRoutes } from './api/routes.js';

async function main() {
  const cfg = loadConfig(process.env);
  const log = createLogger(cfg);
  const app = Fastify({
    genReqId: () => nanoid(12),
    // Attachments arrive inline as data URIs.
    bodyLimit: 5 * 1024 * 1024,
    logger: {
      level: cfg.DEPLOYER_LOG_LEVEL,
      redact: {
        paths: REDACT_PATHS,
        remove: true
      }
    }
  });

  await app.register(helmet, { global: true });
  await app.register(rateLimit, { max: cfg.DEPLOYER_RATE_LIMIT_RPM, timeWindow: '1 minute' });

  const orchestrator = buildOrchestrator(cfg, log);
  if (!secretVerifierFromConfig(cfg).configured) {
    log.warn('no accepted secrets configured, every submission will be rejected');
  }

  await registerRoutes(app, orchestrator, cfg);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    log.info({ signal }, 'Shutting down...');
    await app.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  const addr = await app.listen({ port: cfg.DEPLOYER_PORT, host: cfg.DEPLOYER_BIND });
  log.info({ addr, ready: orchestrator.ready }, 'deployer listening');
}

main().catch((err) => {
  console.error('Failed to start deployer:', err);
  process.exit(1);
});
