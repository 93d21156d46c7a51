/**
 * Domain module exports - the four pipeline services.
 *
 * @module domain
 *
 * @example
 * ```typescript
 * import { GenerationAdapter, RepositoryPublisher, CallbackNotifier, TaskOrchestrator } from './domain/index.js';
 *
 * const orchestrator = new TaskOrchestrator(
 *   {
 *     secrets,
 *     generator: new GenerationAdapter(llm, log),
 *     publisher: new RepositoryPublisher(host, log),
 *     notifier: new CallbackNotifier(transport, log)
 *   },
 *   log
 * );
 * ```
 */

// Base utilities
export { type BaseService, now, sleep, clipText, MAX_INLINE_CHARS } from './base.js';

/**
 * Turns a submission into a generated file set through the language model.
 * @see {@link GenerationAdapter}
 */
export { GenerationAdapter, buildMessages, parseFileSet, decodeTextDataUri, SYSTEM_PROMPT } from './generation.js';

/**
 * Creates or reuses the target repository, commits files and enables static hosting.
 * @see {@link RepositoryPublisher}
 */
export { RepositoryPublisher, PUBLISH_BRANCH } from './publisher.js';

/**
 * Posts the result payload to the caller with bounded exponential backoff.
 * @see {@link CallbackNotifier}
 */
export {
  CallbackNotifier,
  retryDelay,
  DEFAULT_RETRY_POLICY,
  type CallbackTransport,
  type RetryPolicy
} from './notifier.js';

/**
 * Drives authentication, generation, publishing and notification for one submission.
 * @see {@link TaskOrchestrator}
 */
export { TaskOrchestrator, formatDuration, type OrchestratorDeps } from './orchestrator.js';
