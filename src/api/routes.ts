import type { FastifyError, FastifyInstance } from 'fastify';
import { TaskSubmissionSchema } from './schemas.js';
import { splitList, type DeployerConfig } from '../core/config.js';
import { DeployerError, ValidationError, type ErrorCode } from '../core/errors.js';
import type { TaskOrchestrator } from '../core/domain/orchestrator.js';
import type { ServiceStatus } from '../core/types.js';

export const SERVICE_NAME = 'llm-app-deployer';
export const SERVICE_VERSION = '0.1.0';

function bad(code: ErrorCode, message: string) {
  return { ok: false as const, code, error: message };
}

/**
 * Returns the value for `Access-Control-Allow-Origin`, or null when the
 * origin is not allowed.
 */
export function resolveAllowedOrigin(allowed: string[], origin: string | undefined): string | null {
  if (allowed.length === 0 || allowed.includes('*')) return '*';
  if (origin && allowed.includes(origin)) return origin;
  return null;
}

export async function registerRoutes(
  app: FastifyInstance,
  orchestrator: TaskOrchestrator,
  cfg: Pick<DeployerConfig, 'DEPLOYER_ALLOW_ORIGINS'>
) {
  const allowedOrigins = splitList(cfg.DEPLOYER_ALLOW_ORIGINS);

  app.addHook('onRequest', async (request, reply) => {
    const origin = resolveAllowedOrigin(allowedOrigins, request.headers.origin);
    if (origin) {
      reply.header('Access-Control-Allow-Origin', origin);
      reply.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      reply.header('Access-Control-Allow-Headers', 'Content-Type');
      if (origin !== '*') reply.header('Vary', 'Origin');
    }
    if (request.method === 'OPTIONS') {
      return reply.status(204).send();
    }
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof DeployerError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error, code: error.code }, 'request failed');
      } else {
        request.log.warn({ code: error.code, message: error.message }, 'request rejected');
      }
      return reply.status(error.statusCode).send(bad(error.code, error.message));
    }

    const status = typeof error.statusCode === 'number' && error.statusCode >= 400 ? error.statusCode : 500;
    if (status >= 500) {
      request.log.error({ err: error }, 'unhandled error');
      return reply.status(500).send(bad('INTERNAL_ERROR', `Failed to process request: ${error.message}`));
    }
    return reply.status(status).send(bad('VALIDATION_ERROR', error.message));
  });

  app.get('/', async (): Promise<ServiceStatus> => ({
    status: 'ok',
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    dependencies: orchestrator.ready
  }));

  app.post('/tasks', async (req) => {
    const parsed = TaskSubmissionSchema.safeParse(req.body);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
    }
    return orchestrator.handle(parsed.data, req.log);
  });
}
