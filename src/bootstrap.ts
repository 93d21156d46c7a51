import type { Logger } from 'pino';
import type { DeployerConfig } from './core/config.js';
import { secretVerifierFromConfig } from './core/auth.js';
import { toError } from './core/errors.js';
import { CallbackNotifier, GenerationAdapter, RepositoryPublisher, TaskOrchestrator } from './core/domain/index.js';
import type { AppGenerator, AppPublisher } from './core/types.js';
import { createLlmClient } from './infra/llm.js';
import { createGitHubHost } from './infra/github.js';
import { UndiciCallbackTransport } from './infra/http.js';

/**
 * Builds a dependency, or logs why it could not be built. The server still
 * starts; submissions answer 503 until the configuration is fixed.
 */
function tryInit<T>(name: string, log: Logger, build: () => T): T | null {
  try {
    return build();
  } catch (err) {
    log.fatal({ err: toError(err), dependency: name }, `${name} initialization failed`);
    return null;
  }
}

export function buildOrchestrator(cfg: DeployerConfig, log: Logger): TaskOrchestrator {
  const generator: AppGenerator | null = tryInit('generator', log, () => {
    const llmLog = log.child({ component: 'llm' });
    return new GenerationAdapter(createLlmClient(cfg, llmLog), log.child({ component: 'generator' }));
  });

  const publisher: AppPublisher | null = tryInit('publisher', log, () => {
    const pubLog = log.child({ component: 'publisher' });
    return new RepositoryPublisher(createGitHubHost(cfg, pubLog), pubLog, cfg.DEPLOYER_REPO_PREFIX);
  });

  const notifier = new CallbackNotifier(new UndiciCallbackTransport(), log.child({ component: 'notifier' }), {
    maxAttempts: cfg.CALLBACK_MAX_ATTEMPTS,
    baseDelayMs: cfg.CALLBACK_BASE_DELAY_MS,
    timeoutMs: cfg.CALLBACK_TIMEOUT_MS
  });

  return new TaskOrchestrator(
    { secrets: secretVerifierFromConfig(cfg), generator, publisher, notifier },
    log.child({ component: 'orchestrator' })
  );
}
